import type { ChatRequest, ToolDefinition } from '../types/index.js';
import { MIN_THINKING_BUDGET } from '../types/index.js';
import { ConversionError } from '../../shared/errors/index.js';

/** Identifier grammar accepted by both providers */
export const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
export const MAX_TOOL_NAME_LENGTH = 64;

export function isValidToolName(name: string): boolean {
  return TOOL_NAME_PATTERN.test(name);
}

export function validateToolName(name: string, path = 'name'): void {
  if (!isValidToolName(name)) {
    throw new ConversionError(
      'SchemaViolation',
      `Tool name "${name}" must match ${TOOL_NAME_PATTERN.source}`,
      { path }
    );
  }
}

/**
 * Tool names must follow the identifier grammar and be unique within a request
 */
export function validateToolDefinitions(tools: readonly ToolDefinition[], basePath = 'tools'): void {
  const seen = new Set<string>();
  tools.forEach((tool, i) => {
    validateToolName(tool.name, `${basePath}[${i}].name`);
    if (seen.has(tool.name)) {
      throw new ConversionError('SchemaViolation', `Duplicate tool name "${tool.name}"`, {
        path: `${basePath}[${i}].name`,
      });
    }
    seen.add(tool.name);
  });
}

/**
 * Checks invariants that must hold before a request is sent to a provider.
 * Structural validity is assumed (see parseChatRequest).
 */
export function assertTransportable(request: ChatRequest): void {
  if (request.max_tokens <= 0) {
    throw new ConversionError('SchemaViolation', 'max_tokens must be positive', { path: 'max_tokens' });
  }

  if (request.messages.length === 0) {
    throw new ConversionError('SchemaViolation', 'Request has no messages', { path: 'messages' });
  }

  request.messages.forEach((message, i) => {
    if (message.content.length === 0) {
      throw new ConversionError('SchemaViolation', 'Message content is empty', {
        path: `messages[${i}].content`,
      });
    }
  });

  if (request.tools) validateToolDefinitions(request.tools);

  const thinking = request.thinking;
  if (thinking?.type === 'enabled') {
    if (thinking.budget_tokens < MIN_THINKING_BUDGET) {
      throw new ConversionError(
        'SchemaViolation',
        `Thinking budget must be at least ${MIN_THINKING_BUDGET} tokens`,
        { path: 'thinking.budget_tokens' }
      );
    }
    if (thinking.budget_tokens >= request.max_tokens) {
      throw new ConversionError('SchemaViolation', 'Thinking budget must be below max_tokens', {
        path: 'thinking.budget_tokens',
      });
    }
  }
}
