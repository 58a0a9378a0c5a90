import type { EffortLevel } from './request.types.js';

/** Smallest manual thinking budget the canonical provider accepts */
export const MIN_THINKING_BUDGET = 1024;

/**
 * Library-level reasoning configuration. Converted to the wire `thinking`
 * and `output_config` fields by `buildThinkingParams`.
 */
export type ThinkingConfig =
  | { type: 'disabled' }
  | { type: 'adaptive'; effort?: EffortLevel }
  | { type: 'manual'; budgetTokens: number };
