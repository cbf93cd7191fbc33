import type { ReportEntry } from "./types";

const VERIFIED_MARKER = "Found verified result";
const UNVERIFIED_MARKER = "Found unverified result";

type FieldName = "detectorType" | "decoderType" | "rawValue" | "filePath" | "lineNumber";

const FIELD_PREFIXES: ReadonlyArray<readonly [string, FieldName]> = [
  ["Detector Type:", "detectorType"],
  ["Decoder Type:", "decoderType"],
  ["Raw result:", "rawValue"],
  ["File:", "filePath"],
  ["Line:", "lineNumber"],
];

interface Draft {
  detectorType: string;
  decoderType: string;
  rawValue: string;
  filePath: string;
  lineNumber: string;
  verified: boolean;
  extraFields: [string, string][];
}

type ParserState =
  | { kind: "idle" }
  | { kind: "accumulating"; draft: Draft };

/**
 * Decode report bytes as UTF-8. Invalid sequences become U+FFFD instead of
 * failing the whole report.
 */
export function decodeReport(bytes: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: false }).decode(bytes);
}

function markerOf(line: string): "verified" | "unverified" | null {
  // "unverified" contains "verified", so check it first
  if (line.includes(UNVERIFIED_MARKER)) return "unverified";
  if (line.includes(VERIFIED_MARKER)) return "verified";
  return null;
}

function valueAfterColon(line: string): string {
  return line.slice(line.indexOf(":") + 1).trim();
}

function openDraft(verified: boolean): Draft {
  return {
    detectorType: "",
    decoderType: "",
    rawValue: "",
    filePath: "",
    lineNumber: "",
    verified,
    extraFields: [],
  };
}

function applyLine(draft: Draft, line: string): void {
  for (const [prefix, field] of FIELD_PREFIXES) {
    if (line.startsWith(prefix)) {
      draft[field] = valueAfterColon(line);
      return;
    }
  }

  const colon = line.indexOf(":");
  if (colon === -1 || /^\s/.test(line)) return;

  const key = line.slice(0, colon).trim();
  const value = line.slice(colon + 1).trim();
  const existing = draft.extraFields.findIndex(([k]) => k === key);
  if (existing === -1) {
    draft.extraFields.push([key, value]);
  } else {
    draft.extraFields[existing] = [key, value];
  }
}

function close(state: ParserState, entries: ReportEntry[]): void {
  if (state.kind === "accumulating" && state.draft.rawValue !== "") {
    entries.push(state.draft);
  }
}

/**
 * Recover secret records from a trufflehog-style text report.
 *
 * Each "Found verified result" / "Found unverified result" line starts a
 * new record; the field lines that follow fill it in. Blocks without a raw
 * result are dropped, and anything before the first marker is ignored.
 */
export function parseReport(text: string): ReportEntry[] {
  const entries: ReportEntry[] = [];
  let state: ParserState = { kind: "idle" };

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = rawLine.trimEnd();

    const marker = markerOf(line);
    if (marker) {
      close(state, entries);
      state = { kind: "accumulating", draft: openDraft(marker === "verified") };
      continue;
    }

    if (state.kind === "accumulating") {
      applyLine(state.draft, line);
    }
  }

  close(state, entries);
  return entries;
}
