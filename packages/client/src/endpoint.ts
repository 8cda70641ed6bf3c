/**
 * Process-wide API endpoint.
 *
 * Seeded from `DAGKIT_API_URL` when this module loads.
 *
 * Requests read the endpoint once when they start; `setApiEndpoint` swaps
 * the whole value, so an in-flight request never sees a partial update.
 */

export const DEFAULT_API_ENDPOINT = "http://127.0.0.1:5001/api/v0/";

/** Environment variable that seeds the process-wide endpoint */
export const API_ENDPOINT_ENV = "DAGKIT_API_URL";

/**
 * Validate an endpoint URL and make sure it ends in "/", so request paths
 * resolve beneath it rather than replacing its last segment.
 *
 * @throws Error if the URL is not http(s)
 */
export const normalizeEndpoint = (endpoint: string | URL): string => {
  const url = new URL(endpoint.toString());
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`Unsupported API endpoint protocol: ${url.protocol}`);
  }
  url.search = "";
  url.hash = "";
  if (!url.pathname.endsWith("/")) {
    url.pathname = `${url.pathname}/`;
  }
  return url.toString();
};

/**
 * Normalized endpoint from `DAGKIT_API_URL`, or undefined when it is unset
 * or empty.
 */
export const readEndpointFromEnv = (env: NodeJS.ProcessEnv = process.env): string | undefined => {
  const value = env[API_ENDPOINT_ENV];
  return value === undefined || value === "" ? undefined : normalizeEndpoint(value);
};

let apiEndpoint = readEndpointFromEnv() ?? DEFAULT_API_ENDPOINT;

/**
 * Current API endpoint
 */
export const getApiEndpoint = (): string => apiEndpoint;

/**
 * Replace the API endpoint for all subsequent requests.
 */
export const setApiEndpoint = (endpoint: string | URL): void => {
  apiEndpoint = normalizeEndpoint(endpoint);
};

/**
 * Restore the default endpoint
 */
export const resetApiEndpoint = (): void => {
  apiEndpoint = DEFAULT_API_ENDPOINT;
};

/**
 * Set the endpoint from `DAGKIT_API_URL` when it is present.
 *
 * @returns The endpoint now in effect
 */
export const loadEndpointFromEnv = (env: NodeJS.ProcessEnv = process.env): string => {
  const value = readEndpointFromEnv(env);
  if (value !== undefined) {
    apiEndpoint = value;
  }
  return apiEndpoint;
};
