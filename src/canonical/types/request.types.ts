import type { CacheControl, JsonObject, Message, TextBlock } from './content.types.js';

export interface ToolDefinition {
  name: string;
  description?: string;
  input_schema: JsonObject;
  cache_control?: CacheControl;
}

interface ToolChoiceBase {
  disable_parallel_tool_use?: boolean;
}

export type ToolChoice =
  | (ToolChoiceBase & { type: 'auto' | 'any' | 'none' })
  | (ToolChoiceBase & { type: 'tool'; name: string });

export type EffortLevel = 'low' | 'medium' | 'high' | 'max';

/** Wire form of the thinking parameter */
export type ThinkingParam =
  | { type: 'disabled' }
  | { type: 'adaptive' }
  | { type: 'enabled'; budget_tokens: number };

export interface OutputConfig {
  effort: EffortLevel;
}

export type SystemPrompt = string | TextBlock[];

export interface ChatRequest {
  model: string;
  max_tokens: number;
  messages: Message[];
  system?: SystemPrompt;
  tools?: ToolDefinition[];
  tool_choice?: ToolChoice;
  thinking?: ThinkingParam;
  output_config?: OutputConfig;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  stop_sequences?: string[];
  stream?: boolean;
  metadata?: { user_id?: string };
}
