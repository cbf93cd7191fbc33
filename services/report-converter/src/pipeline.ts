import { getConfig, resolveArtifactPaths } from "./config";
import { createEndpointCatalog, ENDPOINT_CATALOG } from "./catalog/endpoints";
import { loadEndpointOverrides } from "./catalog/loader";
import { runConversion, type ConversionResult } from "./convert";

/**
 * Run a conversion with paths and catalog taken from the environment.
 */
export async function runConfiguredConversion(): Promise<ConversionResult> {
  const config = getConfig();

  const catalog = config.ENDPOINTS_PATH
    ? createEndpointCatalog(await loadEndpointOverrides(config.ENDPOINTS_PATH))
    : ENDPOINT_CATALOG;

  return runConversion(resolveArtifactPaths(config), {
    catalog,
    schemaUrl: config.ENV_SCHEMA_URL,
  });
}
