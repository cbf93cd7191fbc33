import { readFile } from "node:fs/promises";
import { z } from "zod";
import { PLACEHOLDER } from "./endpoints";
import type { EndpointTemplate, JsonValue } from "./types";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const endpointTemplateSchema = z
  .object({
    method: z.string().min(1).transform((m) => m.toUpperCase()),
    url: z.string().min(1),
    headers: z.record(z.string()).default({}),
    body: jsonValueSchema.optional(),
  })
  .refine(
    (t) =>
      t.url.includes(PLACEHOLDER) ||
      Object.values(t.headers).some((v) => v.includes(PLACEHOLDER)),
    { message: `url or a header must contain ${PLACEHOLDER}` },
  );

export const endpointOverridesSchema = z.record(endpointTemplateSchema);

/**
 * Read extra catalog entries from a JSON file keyed by detector type.
 */
export async function loadEndpointOverrides(
  path: string,
): Promise<Record<string, EndpointTemplate>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new Error(`Failed to read endpoint catalog ${path}: ${(err as Error).message}`, {
      cause: err,
    });
  }

  const result = endpointOverridesSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid endpoint catalog ${path}: ${issues}`);
  }
  return result.data;
}
