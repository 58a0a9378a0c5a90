export * from './types/index.js';
export type { FormatAdapter, EmbeddingFormatAdapter, FormatType } from './format-adapter.js';
export {
  parseChatRequest,
  parseChatResponse,
  parseEmbeddingRequest,
  parseEmbeddingResponse,
  normalizeMessage,
} from './validation/canonical-validator.js';
export type { ChatRequestInput, MessageInput, ValidationResult } from './validation/canonical-validator.js';
export {
  TOOL_NAME_PATTERN,
  MAX_TOOL_NAME_LENGTH,
  isValidToolName,
  validateToolName,
  validateToolDefinitions,
  assertTransportable,
} from './validation/request-rules.js';
export * from './adapters/anthropic/index.js';
export * from './adapters/openai/index.js';
export * from './adapters/registry.js';
export * from './proxy/cache-control.js';
export * from './proxy/tool-names.js';
