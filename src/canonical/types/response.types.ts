import type { ContentBlock } from './content.types.js';

export interface Usage {
  input_tokens: number;
  output_tokens: number;
  cache_creation_input_tokens?: number;
  cache_read_input_tokens?: number;
  thinking_tokens?: number;
}

export interface ChatResponse {
  id: string;
  type: 'message';
  role: 'assistant';
  model: string;
  content: ContentBlock[];
  /** Raw wire value; see `normalizeStopReason` for the typed view */
  stop_reason: string | null;
  stop_sequence?: string | null;
  /** Absent when the provider reported none */
  usage?: Usage;
}

export type StopReasonKind = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence' | 'other';

export interface StopReason {
  kind: StopReasonKind;
  raw: string;
}
