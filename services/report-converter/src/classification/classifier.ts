import type { EndpointCatalog } from "../catalog/endpoints";
import type { ReportEntry } from "../report/types";

export interface Partition<T> {
  known: T[];
  unknown: T[];
}

/**
 * Drop records whose raw value was already seen, keeping the first.
 */
export function dedupBySecret<T extends Pick<ReportEntry, "rawValue">>(
  records: readonly T[],
): T[] {
  const seen = new Set<string>();
  return records.filter((r) => {
    if (seen.has(r.rawValue)) return false;
    seen.add(r.rawValue);
    return true;
  });
}

/**
 * Deduplicate, then split records by whether the catalog has a request
 * template for their detector type. Order is preserved on both sides.
 */
export function partitionRecords<T extends Pick<ReportEntry, "rawValue" | "detectorType">>(
  records: readonly T[],
  catalog: EndpointCatalog,
): Partition<T> {
  const partition: Partition<T> = { known: [], unknown: [] };
  for (const record of dedupBySecret(records)) {
    if (catalog.has(record.detectorType)) {
      partition.known.push(record);
    } else {
      partition.unknown.push(record);
    }
  }
  return partition;
}
