import { variableName } from "../classification/identity";
import type { SecretRecord } from "../report/types";

export interface CredentialStore {
  $schema: string;
  dev: Record<string, string>;
}

/**
 * Map every known record's variable name to its raw value. A later record
 * with the same variable name overwrites an earlier one.
 */
export function buildCredentialStore(
  known: readonly SecretRecord[],
  schemaUrl: string,
): CredentialStore {
  const variables: Record<string, string> = {};
  for (const record of known) {
    variables[variableName(record.groupId, record.detectorType)] = record.rawValue;
  }
  return { $schema: schemaUrl, dev: variables };
}

export function renderCredentialStore(store: CredentialStore): string {
  return `${JSON.stringify(store, null, 2)}\n`;
}
