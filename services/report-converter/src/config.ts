import { join } from "node:path";
import { z } from "zod";

export const DEFAULT_ENV_SCHEMA_URL =
  "https://raw.githubusercontent.com/mistweaverco/kulala.nvim/main/schemas/http-client.env.schema.json";

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  REPORT_PATH: z.string().min(1).default("scan.txt"),
  OUTPUT_DIR: z.string().min(1).default("."),
  ENV_SCHEMA_URL: z.string().url().default(DEFAULT_ENV_SCHEMA_URL),
  ENDPOINTS_PATH: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = configSchema.parse(process.env);
  }
  return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}

export function resetConfig(): void {
  config = null;
}

export interface ArtifactPaths {
  report: string;
  httpFile: string;
  credentialStore: string;
  unknownFile: string;
  responsesDir: string;
}

/**
 * Output file names follow the kulala.nvim layout: requests in
 * `converted.http`, variables in `http-client.env.json` next to it.
 */
export function resolveArtifactPaths(config: Config): ArtifactPaths {
  return {
    report: config.REPORT_PATH,
    httpFile: join(config.OUTPUT_DIR, "converted.http"),
    credentialStore: join(config.OUTPUT_DIR, "http-client.env.json"),
    unknownFile: join(config.OUTPUT_DIR, "unknown.txt"),
    responsesDir: join(config.OUTPUT_DIR, "responses"),
  };
}
