import { PLACEHOLDER, normalizeDetectorType, type EndpointCatalog } from "../catalog/endpoints";
import type { EndpointTemplate, JsonValue } from "../catalog/types";
import { variableName } from "../classification/identity";
import type { SecretRecord } from "../report/types";

function withReference(pattern: string, reference: string): string {
  return pattern.split(PLACEHOLDER).join(reference);
}

function bodyWithReference(value: JsonValue, reference: string): JsonValue {
  if (typeof value === "string") return withReference(value, reference);
  if (Array.isArray(value)) return value.map((v) => bodyWithReference(v, reference));
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, v] of Object.entries(value)) {
      out[key] = bodyWithReference(v, reference);
    }
    return out;
  }
  return value;
}

/**
 * One request block in kulala/JetBrains `.http` syntax. The credential is
 * only ever referenced as `{{<variable>}}`; the raw value is not an input.
 */
export function renderRequest(
  record: Pick<SecretRecord, "detectorType" | "groupId">,
  template: EndpointTemplate,
): string {
  const reference = `{{${variableName(record.groupId, record.detectorType)}}}`;
  const lines = [
    `### ${record.detectorType} (${record.groupId})`,
    `${template.method} ${withReference(template.url, reference)} HTTP/1.1`,
  ];

  for (const [name, value] of Object.entries(template.headers)) {
    lines.push(`${name}: ${withReference(value, reference)}`);
  }

  lines.push(
    `>> responses/${record.groupId}/${normalizeDetectorType(record.detectorType)}.json`,
  );

  if (template.body !== undefined && template.body !== null) {
    lines.push("");
    lines.push(JSON.stringify(bodyWithReference(template.body, reference), null, 2));
  }

  lines.push("");
  return lines.join("\n");
}

export function renderHttpFile(
  known: readonly SecretRecord[],
  catalog: EndpointCatalog,
): string {
  let output = "";
  for (const record of known) {
    const template = catalog.get(record.detectorType);
    if (!template) continue;
    output += `${renderRequest(record, template)}\n`;
  }
  return output;
}
