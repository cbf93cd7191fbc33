export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface EndpointTemplate {
  method: string;
  /** Contains the placeholder marker exactly once. */
  url: string;
  headers: Readonly<Record<string, string>>;
  body?: JsonValue;
}
