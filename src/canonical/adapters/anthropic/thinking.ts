import type { EffortLevel, OutputConfig, ThinkingConfig, ThinkingParam } from '../../types/index.js';
import { MIN_THINKING_BUDGET } from '../../types/index.js';
import { ConfigurationError } from '../../../shared/errors/index.js';

/** Effort applied by the provider when adaptive thinking carries no output_config */
export const DEFAULT_EFFORT: EffortLevel = 'high';

export interface ThinkingParams {
  thinking?: ThinkingParam;
  output_config?: OutputConfig;
}

/**
 * Convert a ThinkingConfig into the wire `thinking` and `output_config` fields.
 * The default effort is left implicit.
 */
export function buildThinkingParams(config: ThinkingConfig | undefined): ThinkingParams {
  if (!config) return {};

  switch (config.type) {
    case 'disabled':
      return { thinking: { type: 'disabled' } };
    case 'adaptive': {
      const effort = config.effort ?? DEFAULT_EFFORT;
      return effort === DEFAULT_EFFORT
        ? { thinking: { type: 'adaptive' } }
        : { thinking: { type: 'adaptive' }, output_config: { effort } };
    }
    case 'manual':
      if (!Number.isInteger(config.budgetTokens) || config.budgetTokens < MIN_THINKING_BUDGET) {
        throw new ConfigurationError(
          `Thinking budget must be an integer of at least ${MIN_THINKING_BUDGET} tokens`,
          { budgetTokens: config.budgetTokens }
        );
      }
      return { thinking: { type: 'enabled', budget_tokens: config.budgetTokens } };
  }
}

/**
 * Inverse of buildThinkingParams
 */
export function thinkingConfigFromParams(params: ThinkingParams): ThinkingConfig | undefined {
  const { thinking, output_config } = params;
  if (!thinking) return undefined;

  switch (thinking.type) {
    case 'disabled':
      return { type: 'disabled' };
    case 'adaptive':
      return { type: 'adaptive', effort: output_config?.effort ?? DEFAULT_EFFORT };
    case 'enabled':
      return { type: 'manual', budgetTokens: thinking.budget_tokens };
  }
}

const SUFFIX_WORDS = new Set([
  'none', 'off', 'disabled',
  'low', 'minimal',
  'medium', 'med',
  'high', 'xhigh', 'max',
  'auto',
]);

export interface ModelSuffix {
  model: string;
  effort?: string;
}

/**
 * Split an effort suffix off a model id: `claude-sonnet-4-5(medium)` or `model(8192)`.
 * Unrecognized suffixes are left as part of the model id.
 */
export function parseModelSuffix(model: string): ModelSuffix {
  const open = model.lastIndexOf('(');
  if (open === -1 || !model.endsWith(')')) return { model };

  const suffix = model.slice(open + 1, -1);
  const valid = SUFFIX_WORDS.has(suffix.toLowerCase()) || /^\d+$/.test(suffix);

  return valid ? { model: model.slice(0, open), effort: suffix } : { model };
}

export type ThinkingStyle = 'adaptive' | 'budget';

const BUDGETS: Record<string, number> = {
  low: 1024,
  minimal: 1024,
  medium: 8192,
  med: 8192,
  high: 32000,
  xhigh: 64000,
  max: 64000,
  auto: 16000,
};

const DEFAULT_BUDGET = 8192;

function effortForTokens(tokens: number): EffortLevel {
  if (tokens <= 2048) return 'low';
  if (tokens <= 16384) return 'medium';
  if (tokens <= 49152) return 'high';
  return 'max';
}

/**
 * Build a ThinkingConfig from a free-form effort string (as found in a model suffix).
 *
 * `adaptive` targets models that take an effort level, `budget` those that take
 * a token budget. Which one a model supports is the caller's decision.
 */
export function thinkingFromEffort(effort: string, style: ThinkingStyle): ThinkingConfig {
  const word = effort.trim().toLowerCase();
  const numeric = /^\d+$/.test(word) ? Number(word) : undefined;

  if (word === 'none' || word === 'off' || word === 'disabled' || numeric === 0) {
    return { type: 'disabled' };
  }

  if (style === 'adaptive') {
    switch (word) {
      case 'low':
      case 'minimal':
        return { type: 'adaptive', effort: 'low' };
      case 'medium':
      case 'med':
      case 'auto':
        return { type: 'adaptive', effort: 'medium' };
      case 'high':
        return { type: 'adaptive', effort: 'high' };
      case 'xhigh':
      case 'max':
        return { type: 'adaptive', effort: 'max' };
      default:
        return { type: 'adaptive', effort: numeric === undefined ? DEFAULT_EFFORT : effortForTokens(numeric) };
    }
  }

  const budget = Object.hasOwn(BUDGETS, word) ? BUDGETS[word] : numeric ?? DEFAULT_BUDGET;
  return { type: 'manual', budgetTokens: Math.max(budget, MIN_THINKING_BUDGET) };
}
