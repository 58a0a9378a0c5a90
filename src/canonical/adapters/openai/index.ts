import type { FormatAdapter } from '../../format-adapter.js';
import type { ChatRequest, ChatResponse, ContentBlock } from '../../types/index.js';
import canonicalValidator from '../../validation/canonical-validator.js';
import { ConversionError } from '../../../shared/errors/index.js';
import {
  fromOpenAIUsage,
  fromReasoningEffort,
  mapFinishReason,
  mapStopReason,
  toOpenAIUsage,
  toReasoningEffort,
} from './maps.js';
import type { OpenAIReasoningEffort, OpenAIUsage } from './maps.js';
import { fromOpenAIMessages, toOpenAIMessages } from './messages.js';
import type { OpenAIMessage } from './messages.js';
import {
  fromOpenAIToolCall,
  fromOpenAITools,
  fromOpenAIToolChoice,
  toOpenAIToolCall,
  toOpenAIToolChoice,
  toOpenAITools,
} from './tools.js';
import type { OpenAIFunctionTool, OpenAITool, OpenAIToolCall, OpenAIToolChoice } from './tools.js';
import { openaiEmbeddingAdapter } from './embeddings.js';

/**
 * OpenAI chat completion request
 */
export interface OpenAIChatRequest {
  model: string;
  messages: OpenAIMessage[];
  /** Non-standard top-level system prompt some clients send */
  system?: string;
  max_tokens?: number;
  max_completion_tokens?: number;
  temperature?: number;
  top_p?: number;
  stop?: string | string[];
  stream?: boolean;
  tools?: OpenAITool[];
  tool_choice?: OpenAIToolChoice;
  parallel_tool_calls?: boolean;
  reasoning_effort?: OpenAIReasoningEffort;
  user?: string;
}

/** Request as produced by this adapter: only function tools */
export interface OpenAIProviderRequest extends OpenAIChatRequest {
  tools?: OpenAIFunctionTool[];
}

export interface OpenAIResponseMessage {
  role: 'assistant';
  content: string | null;
  refusal?: string | null;
  tool_calls?: OpenAIToolCall[];
  /** Reasoning text, emitted by some compatible servers */
  reasoning_content?: string | null;
}

export interface OpenAIChoice {
  index?: number;
  message: OpenAIResponseMessage;
  finish_reason: string | null;
  logprobs?: null;
}

export interface OpenAIChatResponse {
  id: string;
  object?: 'chat.completion';
  created?: number;
  model: string;
  choices: OpenAIChoice[];
  usage?: OpenAIUsage;
  system_fingerprint?: string;
}

export interface OpenAIAdapterOptions {
  /** Used when an inbound request carries neither max_tokens nor max_completion_tokens */
  defaultMaxTokens?: number;
  /** Target accepts `reasoning_effort`; otherwise thinking configuration is dropped */
  supportsReasoningEffort?: boolean;
  /** Emit the token limit as max_completion_tokens instead of max_tokens */
  useMaxCompletionTokens?: boolean;
  /** Emit thinking text as `reasoning_content` on responses */
  includeReasoning?: boolean;
  /** Response timestamp in seconds; defaults to the current time */
  created?: () => number;
}

const REASONING_EFFORTS: ReadonlySet<string> = new Set(['none', 'minimal', 'low', 'medium', 'high']);

function isReasoningEffort(value: string): value is OpenAIReasoningEffort {
  return REASONING_EFFORTS.has(value);
}

/**
 * Client → Canonical
 * The request is validated first; structural problems are MalformedInput.
 */
export function openaiRequestToCanonical(clientRequest: unknown, options: OpenAIAdapterOptions = {}): ChatRequest {
  const validation = canonicalValidator.validateOpenAIChatRequest(clientRequest);
  if (!validation.valid || !validation.data) {
    throw new ConversionError('MalformedInput', 'Chat completion request is malformed', {
      errors: validation.errors,
    });
  }
  const request = validation.data;

  const { system, messages } = fromOpenAIMessages(request.messages, request.system);

  const maxTokens = request.max_completion_tokens ?? request.max_tokens ?? options.defaultMaxTokens;
  if (maxTokens === undefined) {
    throw new ConversionError('SchemaViolation', 'max_tokens is required by the canonical format', {
      path: 'max_tokens',
    });
  }

  const result: ChatRequest = { model: request.model, max_tokens: maxTokens, messages };
  if (system !== undefined) result.system = system;

  if (request.tools) result.tools = fromOpenAITools(request.tools);
  const toolChoice = fromOpenAIToolChoice(request);
  if (toolChoice) result.tool_choice = toolChoice;

  if (request.reasoning_effort !== undefined) {
    if (!isReasoningEffort(request.reasoning_effort)) {
      throw new ConversionError('UnsupportedConstruct', `Unknown reasoning_effort "${request.reasoning_effort}"`, {
        path: 'reasoning_effort',
      });
    }
    Object.assign(result, fromReasoningEffort(request.reasoning_effort));
  }

  if (request.temperature !== undefined) result.temperature = request.temperature;
  if (request.top_p !== undefined) result.top_p = request.top_p;
  if (request.stop !== undefined) {
    result.stop_sequences = typeof request.stop === 'string' ? [request.stop] : request.stop;
  }
  if (request.stream !== undefined) result.stream = request.stream;
  if (request.user !== undefined) result.metadata = { user_id: request.user };

  return result;
}

/**
 * Canonical → Provider
 * top_k and cache_control have no counterpart and are dropped.
 */
export function canonicalRequestToOpenAI(canonical: ChatRequest, options: OpenAIAdapterOptions = {}): OpenAIProviderRequest {
  const result: OpenAIProviderRequest = {
    model: canonical.model,
    messages: toOpenAIMessages(canonical.messages, canonical.system),
  };

  if (options.useMaxCompletionTokens) {
    result.max_completion_tokens = canonical.max_tokens;
  } else {
    result.max_tokens = canonical.max_tokens;
  }

  if (canonical.tools) result.tools = toOpenAITools(canonical.tools);
  Object.assign(result, toOpenAIToolChoice(canonical.tool_choice));

  if (options.supportsReasoningEffort) {
    const effort = toReasoningEffort(canonical.thinking, canonical.output_config);
    if (effort) result.reasoning_effort = effort;
  }

  if (canonical.temperature !== undefined) result.temperature = canonical.temperature;
  if (canonical.top_p !== undefined) result.top_p = canonical.top_p;
  if (canonical.stop_sequences !== undefined) result.stop = canonical.stop_sequences;
  if (canonical.stream !== undefined) result.stream = canonical.stream;
  if (canonical.metadata?.user_id !== undefined) result.user = canonical.metadata.user_id;

  return result;
}

/**
 * Provider → Canonical
 * The first choice is used; reasoning_content is ignored.
 */
export function openaiResponseToCanonical(providerResponse: unknown): ChatResponse {
  const validation = canonicalValidator.validateOpenAIChatResponse(providerResponse);
  if (!validation.valid || !validation.data) {
    throw new ConversionError('MalformedInput', 'Chat completion response is malformed', {
      errors: validation.errors,
    });
  }
  const response = validation.data;

  const [choice] = response.choices;
  if (!choice) {
    throw new ConversionError('MalformedInput', 'Chat completion response has no choices', { path: 'choices' });
  }

  const { message } = choice;
  const toolCalls = message.tool_calls ?? [];
  const content: ContentBlock[] = [];

  if (typeof message.content === 'string' && (message.content !== '' || toolCalls.length === 0)) {
    content.push({ type: 'text', text: message.content });
  }
  if (message.refusal) content.push({ type: 'text', text: message.refusal });
  toolCalls.forEach((call, k) => {
    content.push(fromOpenAIToolCall(call, `choices[0].message.tool_calls[${k}]`));
  });

  const result: ChatResponse = {
    id: response.id,
    type: 'message',
    role: 'assistant',
    model: response.model,
    content,
    stop_reason: mapFinishReason(choice.finish_reason),
  };
  if (response.usage) result.usage = fromOpenAIUsage(response.usage);
  return result;
}

/**
 * Canonical → Client
 * Text blocks are joined into one string; thinking becomes reasoning_content when enabled.
 */
export function canonicalResponseToOpenAI(canonical: ChatResponse, options: OpenAIAdapterOptions = {}): OpenAIChatResponse {
  const texts: string[] = [];
  const reasoning: string[] = [];
  const toolCalls: OpenAIToolCall[] = [];

  canonical.content.forEach((block, j) => {
    switch (block.type) {
      case 'text':
        texts.push(block.text);
        break;
      case 'tool_use':
        toolCalls.push(toOpenAIToolCall(block));
        break;
      case 'thinking':
        reasoning.push(block.thinking);
        break;
      case 'redacted_thinking':
        break;
      default:
        throw new ConversionError('UnsupportedConstruct', `${block.type} cannot appear in a chat completion`, {
          path: `content[${j}]`,
        });
    }
  });

  const message: OpenAIResponseMessage = {
    role: 'assistant',
    content: texts.length > 0 ? texts.join('') : null,
  };
  if (toolCalls.length > 0) message.tool_calls = toolCalls;
  if (options.includeReasoning && reasoning.length > 0) message.reasoning_content = reasoning.join('');

  const response: OpenAIChatResponse = {
    id: canonical.id,
    object: 'chat.completion',
    created: options.created ? options.created() : Math.floor(Date.now() / 1000),
    model: canonical.model,
    choices: [{
      index: 0,
      message,
      finish_reason: mapStopReason(canonical.stop_reason),
      logprobs: null,
    }],
  };
  if (canonical.usage) response.usage = toOpenAIUsage(canonical.usage);
  return response;
}

export type OpenAIFormatAdapter = FormatAdapter<OpenAIChatRequest, OpenAIChatResponse, OpenAIProviderRequest> & {
  readonly options: Readonly<OpenAIAdapterOptions>;
  readonly embeddings: typeof openaiEmbeddingAdapter;
};

/**
 * OpenAI format adapter bound to a set of options
 */
export function createOpenAIAdapter(options: OpenAIAdapterOptions = {}): OpenAIFormatAdapter {
  const bound = Object.freeze({ ...options });
  return {
    formatType: 'openai',
    options: bound,
    clientToCanonical: (clientRequest) => openaiRequestToCanonical(clientRequest, bound),
    canonicalToClient: (canonical) => canonicalResponseToOpenAI(canonical, bound),
    canonicalToProvider: (canonical) => canonicalRequestToOpenAI(canonical, bound),
    providerToCanonical: (providerResponse) => openaiResponseToCanonical(providerResponse),
    embeddings: openaiEmbeddingAdapter,
  };
}

export const openaiAdapter: OpenAIFormatAdapter = createOpenAIAdapter();

export * from './maps.js';
export * from './messages.js';
export * from './tools.js';
export * from './embeddings.js';
