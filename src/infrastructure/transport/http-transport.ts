import fetch from 'node-fetch';
import { TransportError } from '../../shared/errors/index.js';
import type { Credentials, Transport, TransportOptions } from '../../domain/types/transport.js';
import { buildAuthHeader, CONTENT_TYPES, HTTP_STATUS } from '../../domain/types/transport.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

const DEFAULT_TIMEOUT_MS = 60_000;

export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Map a non-2xx status to a TransportError kind
 */
export function classifyStatus(status: number, body: string, retryAfter: string | null = null): TransportError {
  const details = { status, body };
  switch (status) {
    case HTTP_STATUS.UNAUTHORIZED:
    case HTTP_STATUS.FORBIDDEN:
      return new TransportError('Unauthorized', `Provider rejected credentials (${status})`, details);
    case HTTP_STATUS.TOO_MANY_REQUESTS:
      return new TransportError('RateLimited', 'Provider rate limit exceeded', {
        ...details,
        retryAfterMs: parseRetryAfter(retryAfter),
      });
    case HTTP_STATUS.SERVICE_UNAVAILABLE:
    case HTTP_STATUS.OVERLOADED:
      return new TransportError('Overloaded', `Provider is overloaded (${status})`, {
        ...details,
        retryAfterMs: parseRetryAfter(retryAfter),
      });
    case HTTP_STATUS.REQUEST_TIMEOUT:
    case HTTP_STATUS.GATEWAY_TIMEOUT:
      return new TransportError('Timeout', `Provider timed out (${status})`, details);
    default:
      return new TransportError('RequestRejected', `Provider API error: ${status} - ${body}`, details);
  }
}

/**
 * Default Transport: one JSON POST per call over node-fetch
 */
export class HttpTransport implements Transport {
  constructor(
    private readonly defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS,
    private readonly logger: Logger = defaultLogger
  ) {}

  async send(endpoint: string, payload: unknown, credentials: Credentials, options: TransportOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const headers = {
      'Content-Type': CONTENT_TYPES.JSON,
      ...credentials.headers,
      ...buildAuthHeader(credentials),
    };

    try {
      this.logger.debug('POST', { operation: 'transport_send', endpoint, timeoutMs, module: 'http-transport' });

      const response = await fetch(endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      const body = await response.text();

      if (!response.ok) {
        throw classifyStatus(response.status, body, response.headers.get('retry-after'));
      }
      return body;
    } catch (error) {
      if (error instanceof TransportError) {
        this.logger.error('Provider request failed', error, { endpoint, module: 'http-transport' });
        throw error;
      }
      if (timedOut) {
        throw new TransportError('Timeout', `Request timed out after ${timeoutMs}ms`, { timeoutMs });
      }
      // Cancellation by the caller propagates unchanged
      if (options.signal?.aborted) throw error;

      this.logger.error('Network failure', error, { endpoint, module: 'http-transport' });
      throw new TransportError('NetworkFailure', error instanceof Error ? error.message : String(error), {
        cause: error instanceof Error ? error.name : undefined,
      });
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
