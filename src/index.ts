export * from './canonical/index.js';
export * from './shared/errors/index.js';

export { ClientConfig, PROVIDER_BASE_URLS, DEFAULT_MAX_TOKENS } from './domain/client/client-config.js';
export type { ClientConfigValues } from './domain/client/client-config.js';
export { LlmClient, hasToolUse, responseText, responseThinking, responseToolUses } from './domain/client/llm-client.js';
export type { CallPhase, ChatOptions, EmbedOptions } from './domain/client/llm-client.js';
export { AnthropicProvider, OpenAICompatibleProvider, BaseProvider, createProvider } from './domain/providers/index.js';
export type { Transport, TransportOptions, Credentials, AuthConfig } from './domain/types/transport.js';
export { HttpTransport, classifyStatus, parseRetryAfter } from './infrastructure/transport/http-transport.js';
export { AppConfig, getConfig, resetConfig } from './infrastructure/config/app-config.js';
export { createLogger, logger } from './infrastructure/utils/logger.js';
export type { Logger, LogContext } from './infrastructure/utils/logger.js';
