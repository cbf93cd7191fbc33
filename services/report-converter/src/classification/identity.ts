import { normalizeDetectorType } from "../catalog/endpoints";
import type { ReportEntry, SecretRecord } from "../report/types";

export const UNKNOWN_GROUP = "unknown";

const EXTENSION_SEGMENT = /(?:^|\/)extensions\/([^/]+)\//;

/**
 * Owning extension id: the path segment right after `extensions/`.
 * "foo/extensions/abc123/src/file.js" -> "abc123".
 */
export function resolveGroup(filePath: string): string {
  if (!filePath) return UNKNOWN_GROUP;
  const match = filePath.match(EXTENSION_SEGMENT);
  return match ? match[1] : UNKNOWN_GROUP;
}

export function variableName(groupId: string, detectorType: string): string {
  return `${groupId}_${normalizeDetectorType(detectorType)}`;
}

export function resolveIdentities(entries: readonly ReportEntry[]): SecretRecord[] {
  return entries.map((entry) => ({ ...entry, groupId: resolveGroup(entry.filePath) }));
}
