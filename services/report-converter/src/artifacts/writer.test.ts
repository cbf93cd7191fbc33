import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { writeArtifact } from "./writer";
import { ArtifactError } from "./errors";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "report-converter-writer-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("writeArtifact", () => {
  it("writes the content", async () => {
    const path = join(tempDir, "converted.http");
    await writeArtifact("http", path, "### OpenAI (abc)\n");
    expect(await readFile(path, "utf-8")).toBe("### OpenAI (abc)\n");
  });

  it("replaces an existing file without leaving temp files", async () => {
    const path = join(tempDir, "http-client.env.json");
    await writeFile(path, '{"old": true}');
    await writeArtifact("credential-store", path, '{"new": true}\n');
    expect(await readFile(path, "utf-8")).toBe('{"new": true}\n');
    expect(await readdir(tempDir)).toEqual(["http-client.env.json"]);
  });

  it("names the artifact and path when the directory is missing", async () => {
    const path = join(tempDir, "missing", "unknown.txt");
    const result = writeArtifact("unknown", path, "x");
    await expect(result).rejects.toBeInstanceOf(ArtifactError);
    await expect(result).rejects.toThrow(
      `Failed to write unknown secrets report at ${path}: `,
    );
  });

  it("removes the temp file when the rename fails", async () => {
    const target = join(tempDir, "occupied");
    await mkdir(join(target, "child"), { recursive: true });

    await expect(writeArtifact("credential-store", target, "new")).rejects.toMatchObject({
      artifact: "credential-store",
      path: target,
    });
    expect(await readdir(tempDir)).toEqual(["occupied"]);
    expect(await readdir(target)).toEqual(["child"]);
  });
});
