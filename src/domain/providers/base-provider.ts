import type { ChatRequest, ChatResponse, EmbeddingRequest, EmbeddingResponse } from '../../canonical/types/index.js';
import type { FormatType } from '../../canonical/format-adapter.js';
import type { ProviderName } from '../../canonical/adapters/registry.js';
import { ConfigurationError, TransportError } from '../../shared/errors/index.js';
import type { AuthConfig, Credentials, Transport, TransportOptions } from '../types/transport.js';

export interface ProviderSettings {
  name: ProviderName;
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Converts canonical values to one provider's wire format and back,
 * and issues the call through the injected Transport.
 */
export abstract class BaseProvider {
  abstract readonly format: FormatType;

  constructor(
    protected readonly settings: ProviderSettings,
    protected readonly transport: Transport
  ) {}

  get name(): ProviderName {
    return this.settings.name;
  }

  // Template method pattern: providers customize auth and static headers
  protected abstract getAuth(): AuthConfig;

  protected getStaticHeaders(): Record<string, string> {
    return {};
  }

  protected getChatCompletionEndpoint(): string {
    return '/chat/completions';
  }

  protected getEmbeddingsEndpoint(): string | undefined {
    return undefined;
  }

  // Provider-specific transformations
  abstract transformRequest(request: ChatRequest): unknown;
  abstract transformResponse(response: unknown): ChatResponse;

  protected transformEmbeddingRequest(request: EmbeddingRequest): unknown {
    throw this.embeddingsUnsupported(request.model);
  }

  protected transformEmbeddingResponse(response: unknown, expectedCount: number): EmbeddingResponse {
    throw this.embeddingsUnsupported(`${expectedCount} inputs`);
  }

  protected credentials(): Credentials {
    return {
      apiKey: this.settings.apiKey,
      auth: this.getAuth(),
      headers: this.getStaticHeaders(),
    };
  }

  protected url(endpoint: string): string {
    return `${this.settings.baseUrl.replace(/\/+$/, '')}${endpoint}`;
  }

  protected async post(endpoint: string, payload: unknown, options: CallOptions): Promise<unknown> {
    const transportOptions: TransportOptions = { timeoutMs: this.settings.timeoutMs, signal: options.signal };
    const body = await this.transport.send(this.url(endpoint), payload, this.credentials(), transportOptions);
    return parseBody(body);
  }

  /** Send an already-converted payload; resolves with the parsed JSON body */
  async sendChatPayload(payload: unknown, options: CallOptions = {}): Promise<unknown> {
    return this.post(this.getChatCompletionEndpoint(), payload, options);
  }

  async createEmbeddings(request: EmbeddingRequest, options: CallOptions = {}): Promise<EmbeddingResponse> {
    const endpoint = this.getEmbeddingsEndpoint();
    if (!endpoint) throw this.embeddingsUnsupported(request.model);

    const payload = this.transformEmbeddingRequest(request);
    const raw = await this.post(endpoint, payload, options);
    const expected = typeof request.input === 'string' ? 1 : request.input.length;
    return this.transformEmbeddingResponse(raw, expected);
  }

  private embeddingsUnsupported(detail: string): ConfigurationError {
    return new ConfigurationError(`${this.name} does not provide an embeddings endpoint`, { detail });
  }
}

function parseBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new TransportError('MalformedResponse', 'Provider response is not valid JSON', {
      body: body.slice(0, 500),
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}
