/**
 * Shared constants for the propctl client.
 */

/** Library version reported in the default User-Agent */
export const VERSION = "0.1.0";

/** Default User-Agent sent with every request unless overridden */
export const DEFAULT_USER_AGENT = `propctl-core/${VERSION} node/${process.versions.node}`;

/** GET requests under this prefix are always retried on 429 */
export const RATE_LIMITED_PATH_PREFIX = "/papi/";

/** Header names the session and clients care about */
export const HEADERS = {
  accept: "Accept",
  authorization: "Authorization",
  contentType: "Content-Type",
  userAgent: "User-Agent",
  date: "Date",
  location: "Location",
  retryAfter: "Retry-After",
  rateLimitNext: "X-RateLimit-Next",
  usePrefixes: "PAPI-Use-Prefixes",
} as const;

/** Media type used for request and response bodies */
export const JSON_MEDIA_TYPE = "application/json";

const PAPI_PATH = "/papi/v1";
const SITE_SHIELD_PATH = "/siteshield/v1";

/**
 * API endpoint paths (relative to the configured host).
 *
 * Path parameters are percent-encoded here so callers can pass raw ids.
 */
export const API_ENDPOINTS = {
  papi: {
    /** Rule tree of one property version (GET, PUT) */
    ruleTree: (propertyId: string, propertyVersion: number) =>
      `${PAPI_PATH}/properties/${encodeURIComponent(propertyId)}/versions/${propertyVersion}/rules`,
    /** Available rule formats (GET) */
    ruleFormats: `${PAPI_PATH}/rule-formats`,
    /** Property search (POST) */
    search: `${PAPI_PATH}/search/find-by-value`,
  },
  siteShield: {
    /** All maps visible to the credentials (GET) */
    maps: `${SITE_SHIELD_PATH}/maps`,
    /** One map (GET) */
    map: (uniqueId: number) => `${SITE_SHIELD_PATH}/maps/${uniqueId}`,
    /** Acknowledge proposed CIDR changes (POST) */
    acknowledge: (uniqueId: number) =>
      `${SITE_SHIELD_PATH}/maps/${uniqueId}/acknowledge`,
  },
} as const;
