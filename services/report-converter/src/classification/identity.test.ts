import { describe, it, expect } from "vitest";
import { UNKNOWN_GROUP, resolveGroup, resolveIdentities, variableName } from "./identity";
import type { ReportEntry } from "../report/types";

function makeEntry(filePath: string): ReportEntry {
  return {
    detectorType: "OpenAI",
    decoderType: "PLAIN",
    rawValue: "sk-test",
    filePath,
    lineNumber: "",
    verified: true,
    extraFields: [],
  };
}

describe("resolveGroup", () => {
  it("returns the segment after extensions/", () => {
    expect(resolveGroup("foo/extensions/abc123/src/file.js")).toBe("abc123");
  });

  it("handles relative paths starting with extensions/", () => {
    expect(resolveGroup("extensions/xyz/manifest.json")).toBe("xyz");
  });

  it("returns unknown when there is no extensions segment", () => {
    expect(resolveGroup("/tmp/file.js")).toBe(UNKNOWN_GROUP);
  });

  it("returns unknown for an empty path", () => {
    expect(resolveGroup("")).toBe("unknown");
  });

  it("requires a directory after the extension id", () => {
    expect(resolveGroup("/data/extensions/abc")).toBe("unknown");
  });

  it("does not match a directory merely ending in extensions", () => {
    expect(resolveGroup("/data/myextensions/abc/file.js")).toBe("unknown");
  });
});

describe("variableName", () => {
  it("joins group id and normalised detector type", () => {
    expect(variableName("abc", "OpenAI")).toBe("abc_openai");
    expect(variableName("unknown", "Twitch Access-Token")).toBe("unknown_twitchaccesstoken");
  });
});

describe("resolveIdentities", () => {
  it("adds a group id without touching the entry", () => {
    const entry = makeEntry("/x/extensions/abc/y.js");
    const [record] = resolveIdentities([entry]);
    expect(record.groupId).toBe("abc");
    expect(record.rawValue).toBe("sk-test");
    expect(entry).not.toHaveProperty("groupId");
  });
});
