export type ArtifactKind = "responses" | "http" | "credential-store" | "unknown";

const ARTIFACT_LABELS: Record<ArtifactKind, string> = {
  responses: "response directories",
  http: "HTTP request file",
  "credential-store": "credential store",
  unknown: "unknown secrets report",
};

/** A generator step could not write its artifact. */
export class ArtifactError extends Error {
  readonly artifact: ArtifactKind;
  readonly path: string;

  constructor(artifact: ArtifactKind, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${ARTIFACT_LABELS[artifact]} at ${path}: ${reason}`, { cause });
    this.name = "ArtifactError";
    this.artifact = artifact;
    this.path = path;
  }
}
