import type { SecretRecord } from "../report/types";

export function renderUnknownSecret(record: SecretRecord): string {
  const lines = [
    `Unknown Secret Type: ${record.detectorType}`,
    `Extension: ${record.groupId}`,
    `Raw Value: ${record.rawValue}`,
    `File: ${record.filePath}`,
  ];
  if (record.lineNumber) {
    lines.push(`Line: ${record.lineNumber}`);
  }
  for (const [key, value] of record.extraFields) {
    lines.push(`${key}: ${value}`);
  }
  lines.push(`Verified: ${record.verified ? "Yes" : "No"}`);
  return `${lines.join("\n")}\n\n`;
}

export function renderUnknownFile(unknown: readonly SecretRecord[]): string {
  return unknown.map(renderUnknownSecret).join("");
}
