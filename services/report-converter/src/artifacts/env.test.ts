import { describe, it, expect } from "vitest";
import { buildCredentialStore, renderCredentialStore } from "./env";
import type { SecretRecord } from "../report/types";

const SCHEMA = "https://schemas.example/http-client.env.schema.json";

function makeRecord(overrides: Partial<SecretRecord> = {}): SecretRecord {
  return {
    detectorType: "OpenAI",
    decoderType: "PLAIN",
    rawValue: "sk-test123",
    filePath: "/x/extensions/abc/y.js",
    lineNumber: "",
    verified: true,
    extraFields: [],
    groupId: "abc",
    ...overrides,
  };
}

describe("buildCredentialStore", () => {
  it("maps variable names to raw values under dev", () => {
    const store = buildCredentialStore(
      [makeRecord(), makeRecord({ detectorType: "Snyk Key", rawValue: "snyk-1", groupId: "def" })],
      SCHEMA,
    );
    expect(store).toEqual({
      $schema: SCHEMA,
      dev: { abc_openai: "sk-test123", def_snykkey: "snyk-1" },
    });
  });

  it("keeps the later value when variable names collide", () => {
    const store = buildCredentialStore(
      [makeRecord({ rawValue: "sk-first" }), makeRecord({ rawValue: "sk-second" })],
      SCHEMA,
    );
    expect(store.dev).toEqual({ abc_openai: "sk-second" });
  });

  it("builds an empty environment for no records", () => {
    expect(buildCredentialStore([], SCHEMA)).toEqual({ $schema: SCHEMA, dev: {} });
  });
});

describe("renderCredentialStore", () => {
  it("renders indented JSON with a trailing newline", () => {
    const text = renderCredentialStore({ $schema: SCHEMA, dev: { abc_openai: "sk-test123" } });
    expect(text).toBe(
      `{\n  "$schema": "${SCHEMA}",\n  "dev": {\n    "abc_openai": "sk-test123"\n  }\n}\n`,
    );
  });
});
