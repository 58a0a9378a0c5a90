import type {
  ChatRequest,
  ChatResponse,
  EmbeddingRequest,
  EmbeddingResponse,
  ThinkingConfig,
  ToolChoice,
  ToolDefinition,
  ToolUseBlock,
} from '../../canonical/types/index.js';
import { buildThinkingParams, normalizeStopReason } from '../../canonical/adapters/anthropic/index.js';
import { normalizeMessage } from '../../canonical/validation/canonical-validator.js';
import type { MessageInput } from '../../canonical/validation/canonical-validator.js';
import { assertTransportable } from '../../canonical/validation/request-rules.js';
import { ConfigurationError, ConversionError } from '../../shared/errors/index.js';
import { HttpTransport } from '../../infrastructure/transport/http-transport.js';
import { logger as defaultLogger } from '../../infrastructure/utils/logger.js';
import type { Logger } from '../../infrastructure/utils/logger.js';
import type { Transport } from '../types/transport.js';
import { createProvider } from '../providers/index.js';
import type { BaseProvider } from '../providers/index.js';
import type { ClientConfig } from './client-config.js';

export type CallPhase = 'idle' | 'building' | 'sent' | 'awaiting' | 'completed' | 'failed';

export interface CallOptions {
  signal?: AbortSignal;
  /** Observes the lifecycle of this call */
  onPhase?: (phase: CallPhase) => void;
}

export interface ChatOptions extends CallOptions {
  system?: ChatRequest['system'];
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
  thinking?: ThinkingConfig;
  temperature?: number;
  stopSequences?: string[];
  /** Overrides the configured maxTokens for this call */
  maxTokens?: number;
}

export interface EmbedOptions extends CallOptions {
  dimensions?: number;
}

/**
 * Chat and embeddings client for one configured provider.
 * Holds only its configuration; every call converts, sends and converts back independently.
 */
export class LlmClient {
  private readonly provider: BaseProvider;
  private readonly logger: Logger;

  constructor(
    readonly config: ClientConfig,
    transport: Transport = new HttpTransport(config.timeoutMs),
    logger: Logger = defaultLogger
  ) {
    this.provider = createProvider(config, transport);
    this.logger = logger.child({ module: 'llm-client', provider: config.provider });
  }

  /**
   * Single-turn request: one user message under an optional system prompt
   */
  async complete(system: string, userText: string, options: ChatOptions = {}): Promise<ChatResponse> {
    return this.chat([{ role: 'user', content: userText }], {
      ...options,
      ...(system !== '' && { system }),
    });
  }

  async chat(messages: MessageInput[], options: ChatOptions = {}): Promise<ChatResponse> {
    return this.run('chat', options, async (phase) => {
      const request = this.buildChatRequest(messages, options);
      assertTransportable(request);
      const payload = this.provider.transformRequest(request);

      phase('sent');
      const pending = this.provider.sendChatPayload(payload, { signal: options.signal });
      phase('awaiting');
      const raw = await pending;

      const response = this.provider.transformResponse(raw);
      this.checkStopReason(response);
      return response;
    });
  }

  async embed(input: string | string[], model?: string, options: EmbedOptions = {}): Promise<EmbeddingResponse> {
    const defaultModel = this.config.embeddingsModel;
    if (defaultModel === undefined) {
      throw new ConfigurationError('Embeddings are not enabled for this client', { provider: this.config.provider });
    }

    return this.run('embed', options, async (phase) => {
      const request: EmbeddingRequest = { model: model ?? defaultModel, input };
      if (options.dimensions !== undefined) request.dimensions = options.dimensions;

      phase('sent');
      const pending = this.provider.createEmbeddings(request, { signal: options.signal });
      phase('awaiting');
      return pending;
    });
  }

  private buildChatRequest(messages: MessageInput[], options: ChatOptions): ChatRequest {
    const request: ChatRequest = {
      model: this.config.model,
      max_tokens: options.maxTokens ?? this.config.maxTokens,
      messages: messages.map(normalizeMessage),
      ...buildThinkingParams(options.thinking),
    };
    if (options.system !== undefined) request.system = options.system;
    if (options.tools) request.tools = options.tools;
    if (options.toolChoice) request.tool_choice = options.toolChoice;
    if (options.temperature !== undefined) request.temperature = options.temperature;
    if (options.stopSequences) request.stop_sequences = options.stopSequences;
    return request;
  }

  private checkStopReason(response: ChatResponse): void {
    if (response.stop_reason === null) return;
    const stopReason = normalizeStopReason(response.stop_reason);
    if (stopReason.kind === 'other') {
      this.logger.warn('Unknown stop reason', { stopReason: stopReason.raw, model: response.model });
    }
  }

  private async run<T>(
    operation: string,
    options: CallOptions,
    body: (phase: (next: CallPhase) => void) => Promise<T>
  ): Promise<T> {
    const endTimer = this.logger.timer(operation);
    const phase = (next: CallPhase): void => {
      this.logger.debug('Call phase', { operation, phase: next, model: this.config.model });
      options.onPhase?.(next);
    };

    phase('idle');
    phase('building');
    try {
      const result = await body(phase);
      phase('completed');
      return result;
    } catch (error) {
      phase('failed');
      if (error instanceof ConversionError) {
        this.logger.warn('Conversion failed', { operation, kind: error.kind });
      } else {
        this.logger.error(`${operation} failed`, error, { operation });
      }
      throw error;
    } finally {
      endTimer();
    }
  }
}

/**
 * Concatenated text of a response's text blocks
 */
export function responseText(response: ChatResponse): string {
  return response.content
    .flatMap(block => (block.type === 'text' ? [block.text] : []))
    .join('');
}

/**
 * Concatenated reasoning of a response's thinking blocks; undefined when it has none
 */
export function responseThinking(response: ChatResponse): string | undefined {
  const texts = response.content.flatMap(block => (block.type === 'thinking' ? [block.thinking] : []));
  return texts.length > 0 ? texts.join('') : undefined;
}

export function responseToolUses(response: ChatResponse): ToolUseBlock[] {
  return response.content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}

/** True when the model stopped to call tools */
export function hasToolUse(response: ChatResponse): boolean {
  return response.stop_reason === 'tool_use';
}
