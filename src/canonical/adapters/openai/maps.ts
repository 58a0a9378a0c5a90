import type { ChatRequest, EffortLevel, OutputConfig, ThinkingParam, Usage } from '../../types/index.js';

/**
 * OpenAI finish reason mappings. Values missing from a table pass through unchanged.
 */
export const finishReasonToCanonical: Readonly<Record<string, string>> = {
  'stop': 'end_turn',
  'length': 'max_tokens',
  'tool_calls': 'tool_use',
  'function_call': 'tool_use',
};

export const stopReasonToFinishReason: Readonly<Record<string, string>> = {
  'end_turn': 'stop',
  'stop_sequence': 'stop',
  'max_tokens': 'length',
  'tool_use': 'tool_calls',
};

function lookup(table: Readonly<Record<string, string>>, key: string): string {
  return Object.hasOwn(table, key) ? table[key] : key;
}

export function mapFinishReason(finishReason: string | null | undefined): string | null {
  return finishReason == null ? null : lookup(finishReasonToCanonical, finishReason);
}

export function mapStopReason(stopReason: string | null): string | null {
  return stopReason === null ? null : lookup(stopReasonToFinishReason, stopReason);
}

export interface OpenAIUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  prompt_tokens_details?: { cached_tokens?: number };
  completion_tokens_details?: { reasoning_tokens?: number };
}

/**
 * Usage token mappings. Cache creation has no OpenAI counterpart and is omitted.
 */
export function toOpenAIUsage(usage: Usage): OpenAIUsage {
  const out: OpenAIUsage = {
    prompt_tokens: usage.input_tokens,
    completion_tokens: usage.output_tokens,
    total_tokens: usage.input_tokens + usage.output_tokens,
  };
  if (usage.cache_read_input_tokens !== undefined) {
    out.prompt_tokens_details = { cached_tokens: usage.cache_read_input_tokens };
  }
  if (usage.thinking_tokens !== undefined) {
    out.completion_tokens_details = { reasoning_tokens: usage.thinking_tokens };
  }
  return out;
}

export function fromOpenAIUsage(usage: OpenAIUsage): Usage {
  const out: Usage = {
    input_tokens: usage.prompt_tokens,
    output_tokens: usage.completion_tokens,
  };
  const cached = usage.prompt_tokens_details?.cached_tokens;
  if (cached !== undefined) out.cache_read_input_tokens = cached;
  const reasoning = usage.completion_tokens_details?.reasoning_tokens;
  if (reasoning !== undefined) out.thinking_tokens = reasoning;
  return out;
}

export type OpenAIReasoningEffort = 'none' | 'minimal' | 'low' | 'medium' | 'high';

/**
 * Budget bands used when a manual thinking budget is expressed as an effort level
 */
export function effortForBudget(budgetTokens: number): OpenAIReasoningEffort {
  if (budgetTokens <= 2048) return 'low';
  if (budgetTokens <= 16384) return 'medium';
  return 'high';
}

export function toReasoningEffort(
  thinking: ThinkingParam | undefined,
  outputConfig: OutputConfig | undefined
): OpenAIReasoningEffort | undefined {
  if (!thinking) return undefined;
  switch (thinking.type) {
    case 'disabled':
      return undefined;
    case 'adaptive': {
      const effort = outputConfig?.effort ?? 'high';
      return effort === 'max' ? 'high' : effort;
    }
    case 'enabled':
      return effortForBudget(thinking.budget_tokens);
  }
}

export function fromReasoningEffort(
  effort: OpenAIReasoningEffort
): Pick<ChatRequest, 'thinking' | 'output_config'> {
  if (effort === 'none') return { thinking: { type: 'disabled' } };
  const level: EffortLevel = effort === 'minimal' ? 'low' : effort;
  return level === 'high'
    ? { thinking: { type: 'adaptive' } }
    : { thinking: { type: 'adaptive' }, output_config: { effort: level } };
}
