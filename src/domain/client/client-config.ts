import { PROVIDER_FORMATS } from '../../canonical/adapters/registry.js';
import type { ProviderName } from '../../canonical/adapters/registry.js';
import type { FormatType } from '../../canonical/format-adapter.js';
import { ConfigurationError } from '../../shared/errors/index.js';

export const DEFAULT_MAX_TOKENS = 16384;
export const ANTHROPIC_TIMEOUT_MS = 180_000;
export const OPENAI_COMPATIBLE_TIMEOUT_MS = 60_000;

/**
 * Base URLs of the built-in providers
 */
export const PROVIDER_BASE_URLS: Readonly<Record<ProviderName, string>> = {
  anthropic: 'https://api.anthropic.com/v1',
  openai: 'https://api.openai.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  xai: 'https://api.x.ai/v1',
  ollama: 'http://localhost:11434/v1',
};

// Local servers run without credentials
const KEYLESS_PROVIDERS: ReadonlySet<ProviderName> = new Set<ProviderName>(['ollama']);

export interface ClientConfigValues {
  provider: ProviderName;
  baseUrl: string;
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  /** Default embeddings model; embeddings are disabled when unset */
  embeddingsModel?: string;
  /** Target accepts `reasoning_effort` (OpenAI-compatible providers only) */
  reasoningEffort: boolean;
}

/**
 * Immutable client configuration. Every `with*` method returns a validated copy.
 */
export class ClientConfig implements Readonly<ClientConfigValues> {
  readonly provider: ProviderName;
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly maxTokens: number;
  readonly timeoutMs: number;
  readonly embeddingsModel?: string;
  readonly reasoningEffort: boolean;

  private constructor(values: ClientConfigValues) {
    validate(values);
    this.provider = values.provider;
    this.baseUrl = values.baseUrl.replace(/\/+$/, '');
    this.apiKey = values.apiKey;
    this.model = values.model;
    this.maxTokens = values.maxTokens;
    this.timeoutMs = values.timeoutMs;
    if (values.embeddingsModel !== undefined) this.embeddingsModel = values.embeddingsModel;
    this.reasoningEffort = values.reasoningEffort;
    Object.freeze(this);
  }

  static anthropic(apiKey: string, model: string): ClientConfig {
    return ClientConfig.forProvider('anthropic', apiKey, model);
  }

  /**
   * Any server speaking the OpenAI chat completions API at `baseUrl`
   */
  static openaiCompatible(baseUrl: string, apiKey: string, model: string): ClientConfig {
    return new ClientConfig({
      provider: 'openai',
      baseUrl,
      apiKey,
      model,
      maxTokens: DEFAULT_MAX_TOKENS,
      timeoutMs: OPENAI_COMPATIBLE_TIMEOUT_MS,
      reasoningEffort: false,
    });
  }

  static forProvider(provider: ProviderName, apiKey: string, model: string): ClientConfig {
    if (!Object.hasOwn(PROVIDER_BASE_URLS, provider)) {
      throw new ConfigurationError(`Unknown provider: ${provider}`, { provider });
    }
    return new ClientConfig({
      provider,
      baseUrl: PROVIDER_BASE_URLS[provider],
      apiKey,
      model,
      maxTokens: DEFAULT_MAX_TOKENS,
      timeoutMs: provider === 'anthropic' ? ANTHROPIC_TIMEOUT_MS : OPENAI_COMPATIBLE_TIMEOUT_MS,
      reasoningEffort: false,
    });
  }

  get format(): FormatType {
    return PROVIDER_FORMATS[this.provider];
  }

  get embeddingsEnabled(): boolean {
    return this.embeddingsModel !== undefined;
  }

  withTimeout(timeoutMs: number): ClientConfig {
    return this.with({ timeoutMs });
  }

  withMaxTokens(maxTokens: number): ClientConfig {
    return this.with({ maxTokens });
  }

  withBaseUrl(baseUrl: string): ClientConfig {
    return this.with({ baseUrl });
  }

  withEmbeddings(model: string): ClientConfig {
    if (this.format !== 'openai') {
      throw new ConfigurationError(`${this.provider} does not provide an embeddings endpoint`, {
        provider: this.provider,
      });
    }
    return this.with({ embeddingsModel: model });
  }

  withReasoningEffort(enabled = true): ClientConfig {
    return this.with({ reasoningEffort: enabled });
  }

  toJSON(): ClientConfigValues {
    return { ...this.values(), apiKey: this.apiKey ? '[redacted]' : '' };
  }

  private values(): ClientConfigValues {
    const values: ClientConfigValues = {
      provider: this.provider,
      baseUrl: this.baseUrl,
      apiKey: this.apiKey,
      model: this.model,
      maxTokens: this.maxTokens,
      timeoutMs: this.timeoutMs,
      reasoningEffort: this.reasoningEffort,
    };
    if (this.embeddingsModel !== undefined) values.embeddingsModel = this.embeddingsModel;
    return values;
  }

  private with(changes: Partial<ClientConfigValues>): ClientConfig {
    return new ClientConfig({ ...this.values(), ...changes });
  }
}

function validate(values: ClientConfigValues): void {
  if (!values.apiKey.trim() && !KEYLESS_PROVIDERS.has(values.provider)) {
    throw new ConfigurationError(`An API key is required for ${values.provider}`, { provider: values.provider });
  }
  if (!values.model.trim()) {
    throw new ConfigurationError('Model id must not be empty', { provider: values.provider });
  }
  if (values.embeddingsModel !== undefined && !values.embeddingsModel.trim()) {
    throw new ConfigurationError('Embeddings model id must not be empty');
  }
  if (!isHttpUrl(values.baseUrl)) {
    throw new ConfigurationError(`Invalid base URL: ${values.baseUrl}`, { baseUrl: values.baseUrl });
  }
  if (!Number.isInteger(values.maxTokens) || values.maxTokens <= 0) {
    throw new ConfigurationError('maxTokens must be a positive integer', { maxTokens: values.maxTokens });
  }
  if (!Number.isFinite(values.timeoutMs) || values.timeoutMs <= 0) {
    throw new ConfigurationError('timeoutMs must be positive', { timeoutMs: values.timeoutMs });
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
