import type { StopReason, StopReasonKind } from '../../types/index.js';

const KNOWN_STOP_REASONS: ReadonlySet<string> = new Set<string>([
  'end_turn',
  'tool_use',
  'max_tokens',
  'stop_sequence',
]);

function isKnownStopReason(raw: string): raw is Exclude<StopReasonKind, 'other'> {
  return KNOWN_STOP_REASONS.has(raw);
}

/**
 * Typed view of a wire stop_reason. Unknown values map to `other` and keep the raw string.
 */
export function normalizeStopReason(raw: string): StopReason {
  return { kind: isKnownStopReason(raw) ? raw : 'other', raw };
}

export const ANTHROPIC_VERSION = '2023-06-01';
