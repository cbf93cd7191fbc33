import type { EndpointTemplate } from "./types";

/** Substitution point for the credential in URLs, headers and bodies. */
export const PLACEHOLDER = "{{var}}";

const JSON_HEADERS = { "Content-Type": "application/json" };
const ETH_BLOCK_NUMBER = { jsonrpc: "2.0", method: "eth_blockNumber", params: [], id: 1 };

const BUILTIN_ENDPOINTS: Record<string, EndpointTemplate> = {
  openai: {
    method: "GET",
    url: "https://api.openai.com/v1/models",
    headers: { Authorization: `Bearer ${PLACEHOLDER}` },
  },
  telegrambottoken: {
    method: "GET",
    url: `https://api.telegram.org/bot${PLACEHOLDER}/getMe`,
    headers: {},
  },
  alchemy: {
    method: "POST",
    url: `https://eth-mainnet.g.alchemy.com/v2/${PLACEHOLDER}`,
    headers: JSON_HEADERS,
    body: ETH_BLOCK_NUMBER,
  },
  infura: {
    method: "POST",
    url: `https://mainnet.infura.io/v3/${PLACEHOLDER}`,
    headers: JSON_HEADERS,
    body: ETH_BLOCK_NUMBER,
  },
  openweather: {
    method: "GET",
    url: `https://api.openweathermap.org/data/2.5/weather?q=London&appid=${PLACEHOLDER}`,
    headers: {},
  },
  cryptocompare: {
    method: "GET",
    url: `https://min-api.cryptocompare.com/data/price?fsym=BTC&tsyms=USD&api_key=${PLACEHOLDER}`,
    headers: {},
  },
  weatherstack: {
    method: "GET",
    url: `http://api.weatherstack.com/current?access_key=${PLACEHOLDER}&query=London`,
    headers: {},
  },
  flickr: {
    method: "GET",
    url: `https://api.flickr.com/services/rest/?method=flickr.test.echo&api_key=${PLACEHOLDER}&format=json&nojsoncallback=1`,
    headers: {},
  },
  newsapi: {
    method: "GET",
    url: `https://newsapi.org/v2/top-headlines?country=us&apiKey=${PLACEHOLDER}`,
    headers: {},
  },
  miro: {
    method: "GET",
    url: "https://api.miro.com/v1/boards",
    headers: { Authorization: `Bearer ${PLACEHOLDER}` },
  },
  twitchaccesstoken: {
    method: "GET",
    url: "https://id.twitch.tv/oauth2/validate",
    headers: { Authorization: `OAuth ${PLACEHOLDER}` },
  },
  onesignal: {
    method: "GET",
    url: "https://onesignal.com/api/v1/apps",
    headers: { Authorization: `Basic ${PLACEHOLDER}` },
  },
  rapidapi: {
    method: "GET",
    url: "https://rapidapi.com/api/health",
    headers: { "X-RapidAPI-Key": PLACEHOLDER },
  },
  snykkey: {
    method: "GET",
    url: "https://api.snyk.io/v1/user/me",
    headers: { Authorization: `token ${PLACEHOLDER}` },
  },
  ipstack: {
    method: "GET",
    url: `http://api.ipstack.com/check?access_key=${PLACEHOLDER}`,
    headers: {},
  },
  fixerio: {
    method: "GET",
    url: `http://data.fixer.io/api/latest?access_key=${PLACEHOLDER}`,
    headers: {},
  },
  sumologickey: {
    method: "GET",
    url: "https://api.sumologic.com/api/v1/users",
    headers: { Authorization: `Basic ${PLACEHOLDER}` },
  },
  atlassian: {
    method: "GET",
    url: "https://api.atlassian.com/me",
    headers: { Authorization: `Bearer ${PLACEHOLDER}` },
  },
};

/**
 * Catalog key for a scanner detector type: lowercased, spaces and hyphens
 * removed. "Twitch Access-Token" -> "twitchaccesstoken".
 */
export function normalizeDetectorType(detectorType: string): string {
  return detectorType.toLowerCase().replace(/[ -]/g, "");
}

export interface EndpointCatalog {
  get(detectorType: string): EndpointTemplate | undefined;
  has(detectorType: string): boolean;
  keys(): string[];
}

/**
 * Build a read-only catalog from the built-in table plus optional extra
 * entries. Extra entries win over built-in ones with the same key; keys
 * are normalised on the way in.
 */
export function createEndpointCatalog(
  overrides: Record<string, EndpointTemplate> = {},
): EndpointCatalog {
  const entries = new Map<string, EndpointTemplate>();
  for (const [key, template] of Object.entries(BUILTIN_ENDPOINTS)) {
    entries.set(key, template);
  }
  for (const [key, template] of Object.entries(overrides)) {
    entries.set(normalizeDetectorType(key), template);
  }

  return {
    get(detectorType: string): EndpointTemplate | undefined {
      return entries.get(normalizeDetectorType(detectorType));
    },
    has(detectorType: string): boolean {
      return entries.has(normalizeDetectorType(detectorType));
    },
    keys(): string[] {
      return [...entries.keys()];
    },
  };
}

export const ENDPOINT_CATALOG: EndpointCatalog = createEndpointCatalog();
