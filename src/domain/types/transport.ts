/**
 * How the API key is presented: `x-api-key: <key>` or `Authorization: Bearer <key>`
 */
export interface AuthConfig {
  header: string;
  scheme?: string;
}

export interface Credentials {
  apiKey: string;
  auth: AuthConfig;
  /** Static headers required by the provider, e.g. an API version */
  headers?: Record<string, string>;
}

export interface TransportOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Carries one JSON request to a provider and returns the raw response body.
 * Implementations reject with TransportError.
 */
export interface Transport {
  send(endpoint: string, payload: unknown, credentials: Credentials, options?: TransportOptions): Promise<string>;
}

export function buildAuthHeader(credentials: Credentials): Record<string, string> {
  const { apiKey, auth } = credentials;
  if (!apiKey) return {};
  const value = auth.scheme ? `${auth.scheme} ${apiKey}`.trim() : apiKey;
  return { [auth.header]: value };
}

// HTTP status constants
export const HTTP_STATUS = {
  OK: 200,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  REQUEST_TIMEOUT: 408,
  TOO_MANY_REQUESTS: 429,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
  OVERLOADED: 529,
} as const;

// Content type constants
export const CONTENT_TYPES = {
  JSON: 'application/json',
} as const;
