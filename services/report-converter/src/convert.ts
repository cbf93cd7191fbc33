import { readFile } from "node:fs/promises";
import type { ArtifactPaths } from "./config";
import { ENDPOINT_CATALOG, type EndpointCatalog } from "./catalog/endpoints";
import { partitionRecords } from "./classification/classifier";
import { resolveIdentities, variableName } from "./classification/identity";
import { decodeReport, parseReport } from "./report/parser";
import type { SecretRecord } from "./report/types";
import { ensureResponseDirectories } from "./artifacts/responses";
import { renderHttpFile } from "./artifacts/http";
import { buildCredentialStore, renderCredentialStore } from "./artifacts/env";
import { renderUnknownFile } from "./artifacts/unknown";
import { writeArtifact } from "./artifacts/writer";

export interface ConversionOptions {
  catalog?: EndpointCatalog;
  schemaUrl: string;
}

export interface ConversionResult {
  parsed: number;
  duplicates: number;
  known: number;
  unknown: number;
  groups: string[];
  /** Variable names bound to more than one distinct secret; the store keeps the last. */
  collisions: string[];
}

/**
 * Variable names shared by known records with different raw values.
 */
export function findCollisions(known: readonly SecretRecord[]): string[] {
  const valuesByName = new Map<string, Set<string>>();
  for (const record of known) {
    const name = variableName(record.groupId, record.detectorType);
    const values = valuesByName.get(name) ?? new Set<string>();
    values.add(record.rawValue);
    valuesByName.set(name, values);
  }
  return [...valuesByName]
    .filter(([, values]) => values.size > 1)
    .map(([name]) => name);
}

async function readReport(path: string): Promise<string> {
  try {
    return decodeReport(await readFile(path));
  } catch (err) {
    throw new Error(`Failed to read report ${path}: ${(err as Error).message}`, {
      cause: err,
    });
  }
}

export async function runConversion(
  paths: ArtifactPaths,
  options: ConversionOptions,
): Promise<ConversionResult> {
  const catalog = options.catalog ?? ENDPOINT_CATALOG;

  // 1. Parse
  const entries = parseReport(await readReport(paths.report));
  console.log(`Parsed ${entries.length} secrets from ${paths.report}`);

  // 2. Dedup and classify
  const partition = partitionRecords(entries, catalog);
  const known = resolveIdentities(partition.known);
  const unknown = resolveIdentities(partition.unknown);
  const duplicates = entries.length - known.length - unknown.length;
  console.log(
    `Classified ${known.length} known and ${unknown.length} unknown (${duplicates} duplicates dropped)`,
  );

  const collisions = findCollisions(known);
  for (const name of collisions) {
    console.warn(`Variable ${name} is bound to several secrets; keeping the last one`);
  }

  // 3. Response directories
  const groups = await ensureResponseDirectories(known, paths.responsesDir);
  console.log(`Ensured ${groups.length} response directories under ${paths.responsesDir}`);

  // 4. Artifacts
  await writeArtifact("http", paths.httpFile, renderHttpFile(known, catalog));
  console.log(`Wrote ${known.length} requests to ${paths.httpFile}`);

  const store = buildCredentialStore(known, options.schemaUrl);
  await writeArtifact("credential-store", paths.credentialStore, renderCredentialStore(store));
  console.log(
    `Wrote ${Object.keys(store.dev).length} credentials to ${paths.credentialStore}`,
  );

  await writeArtifact("unknown", paths.unknownFile, renderUnknownFile(unknown));
  console.log(`Wrote ${unknown.length} unknown secrets to ${paths.unknownFile}`);

  return {
    parsed: entries.length,
    duplicates,
    known: known.length,
    unknown: unknown.length,
    groups,
    collisions,
  };
}
