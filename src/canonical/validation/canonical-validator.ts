import AjvModule from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type {
  ChatRequest,
  ChatResponse,
  ContentBlock,
  EmbeddingRequest,
  EmbeddingResponse,
  Message,
} from '../types/index.js';
import type { OpenAIChatRequest, OpenAIChatResponse } from '../adapters/openai/index.js';
import type { OpenAIEmbeddingResponse } from '../adapters/openai/embeddings.js';
import { ConversionError } from '../../shared/errors/index.js';

// ajv and ajv-formats ship CommonJS; under NodeNext their class/plugin is the `default` member
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const schemasDir = join(dirname(fileURLToPath(import.meta.url)), '../schemas');

/** A message as accepted on decode: string content is shorthand for one text block */
export interface MessageInput {
  role: Message['role'];
  content: string | ContentBlock[];
}

export type ChatRequestInput = Omit<ChatRequest, 'messages'> & { messages: MessageInput[] };

export interface ValidationResult<T> {
  valid: boolean;
  data?: T;
  errors?: string[];
}

class CanonicalValidator {
  private ajv: InstanceType<typeof Ajv>;
  private chatRequestValidator: ValidateFunction<ChatRequestInput>;
  private chatResponseValidator: ValidateFunction<ChatResponse>;
  private embeddingRequestValidator: ValidateFunction<EmbeddingRequest>;
  private embeddingResponseValidator: ValidateFunction<EmbeddingResponse>;
  private openaiEmbeddingResponseValidator: ValidateFunction<OpenAIEmbeddingResponse>;
  private openaiChatRequestValidator: ValidateFunction<OpenAIChatRequest>;
  private openaiChatResponseValidator: ValidateFunction<OpenAIChatResponse>;

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      removeAdditional: false,
      useDefaults: false,
      coerceTypes: false,
      strict: false // Allow draft-07 schemas
    });

    // Add format validators (uri, etc.)
    addFormats(this.ajv);

    // chat-response refers to definitions in chat-request, so compile it first
    this.chatRequestValidator = this.ajv.compile<ChatRequestInput>(loadSchema('chat-request.schema.json'));
    this.chatResponseValidator = this.ajv.compile<ChatResponse>(loadSchema('chat-response.schema.json'));
    this.embeddingRequestValidator = this.ajv.compile<EmbeddingRequest>(loadSchema('embedding-request.schema.json'));
    this.embeddingResponseValidator = this.ajv.compile<EmbeddingResponse>(loadSchema('embedding-response.schema.json'));
    this.openaiEmbeddingResponseValidator = this.ajv.compile<OpenAIEmbeddingResponse>(loadSchema('openai-embedding-response.schema.json'));
    this.openaiChatRequestValidator = this.ajv.compile<OpenAIChatRequest>(loadSchema('openai-chat-request.schema.json'));
    this.openaiChatResponseValidator = this.ajv.compile<OpenAIChatResponse>(loadSchema('openai-chat-response.schema.json'));
  }

  validateChatRequest(data: unknown): ValidationResult<ChatRequestInput> {
    return run(this.chatRequestValidator, data, 'Request');
  }

  validateChatResponse(data: unknown): ValidationResult<ChatResponse> {
    return run(this.chatResponseValidator, data, 'Response');
  }

  validateEmbeddingRequest(data: unknown): ValidationResult<EmbeddingRequest> {
    return run(this.embeddingRequestValidator, data, 'Embedding request');
  }

  validateEmbeddingResponse(data: unknown): ValidationResult<EmbeddingResponse> {
    return run(this.embeddingResponseValidator, data, 'Embedding response');
  }

  validateOpenAIEmbeddingResponse(data: unknown): ValidationResult<OpenAIEmbeddingResponse> {
    return run(this.openaiEmbeddingResponseValidator, data, 'Embedding list');
  }

  validateOpenAIChatRequest(data: unknown): ValidationResult<OpenAIChatRequest> {
    return run(this.openaiChatRequestValidator, data, 'Chat completion request');
  }

  validateOpenAIChatResponse(data: unknown): ValidationResult<OpenAIChatResponse> {
    return run(this.openaiChatResponseValidator, data, 'Chat completion');
  }
}

function loadSchema(file: string): SchemaObject {
  try {
    return JSON.parse(readFileSync(join(schemasDir, file), 'utf8'));
  } catch (error) {
    throw new Error(`Failed to load schema ${file}`, { cause: error });
  }
}

function run<T>(validate: ValidateFunction<T>, data: unknown, label: string): ValidationResult<T> {
  if (data === null || data === undefined) {
    return { valid: false, errors: [`${label} data is null or undefined`] };
  }

  if (validate(data)) {
    return { valid: true, data };
  }

  const errors = validate.errors?.map(error =>
    `${error.instancePath || '/'} ${error.message}`
  ) || ['Unknown validation error'];
  return { valid: false, errors };
}

// Singleton instance
const canonicalValidator = new CanonicalValidator();
export default canonicalValidator;

function schemaViolation(label: string, errors: string[] | undefined): ConversionError {
  return new ConversionError('SchemaViolation', `${label} failed schema validation`, { errors });
}

export function normalizeMessage(message: MessageInput): Message {
  return {
    role: message.role,
    content: typeof message.content === 'string'
      ? [{ type: 'text', text: message.content }]
      : message.content,
  };
}

/**
 * Validate untyped JSON as a canonical chat request.
 * String message content is normalized into a single text block.
 */
export function parseChatRequest(raw: unknown): ChatRequest {
  const result = canonicalValidator.validateChatRequest(raw);
  if (!result.valid || !result.data) throw schemaViolation('Chat request', result.errors);
  return { ...result.data, messages: result.data.messages.map(normalizeMessage) };
}

export function parseChatResponse(raw: unknown): ChatResponse {
  const result = canonicalValidator.validateChatResponse(raw);
  if (!result.valid || !result.data) throw schemaViolation('Chat response', result.errors);
  return result.data;
}

export function parseEmbeddingRequest(raw: unknown): EmbeddingRequest {
  const result = canonicalValidator.validateEmbeddingRequest(raw);
  if (!result.valid || !result.data) throw schemaViolation('Embedding request', result.errors);
  const { model, input, dimensions } = result.data;
  return { model, input, ...(dimensions !== undefined && { dimensions }) };
}

export function parseEmbeddingResponse(raw: unknown): EmbeddingResponse {
  const result = canonicalValidator.validateEmbeddingResponse(raw);
  if (!result.valid || !result.data) throw schemaViolation('Embedding response', result.errors);
  return result.data;
}
