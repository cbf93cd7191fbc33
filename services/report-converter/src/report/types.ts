/** One credential occurrence as read from the scanner report. */
export interface ReportEntry {
  detectorType: string;
  decoderType: string;
  /** The secret itself. Only the credential store and unknown report may contain it. */
  rawValue: string;
  filePath: string;
  lineNumber: string;
  verified: boolean;
  /** Any other `key: value` lines of the block, in encounter order. */
  extraFields: ReadonlyArray<readonly [string, string]>;
}

export interface SecretRecord extends ReportEntry {
  /** Owning extension id derived from `filePath`, or "unknown". */
  groupId: string;
}
