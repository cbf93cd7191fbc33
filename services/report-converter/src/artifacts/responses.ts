import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { SecretRecord } from "../report/types";
import { ArtifactError } from "./errors";

/**
 * Make sure `root/<groupId>` exists for every group in `known`, so the
 * `>> responses/...` redirects have somewhere to land. Returns the group
 * ids in first-seen order.
 */
export async function ensureResponseDirectories(
  known: readonly SecretRecord[],
  root: string,
): Promise<string[]> {
  const groups = [...new Set(known.map((r) => r.groupId))];

  for (const dir of [root, ...groups.map((g) => join(root, g))]) {
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new ArtifactError("responses", dir, err);
    }
  }

  return groups;
}
