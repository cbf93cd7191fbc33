import { randomBytes } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { ArtifactError, type ArtifactKind } from "./errors";

/**
 * Write `content` to `path` through a temporary sibling file and a rename,
 * so readers see either the old file or the complete new one.
 */
export async function writeArtifact(
  artifact: ArtifactKind,
  path: string,
  content: string,
): Promise<void> {
  const tempPath = join(
    dirname(path),
    `.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`,
  );

  try {
    await writeFile(tempPath, content, { encoding: "utf-8", mode: 0o600 });
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw new ArtifactError(artifact, path, err);
  }
}
