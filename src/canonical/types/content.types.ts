/**
 * Canonical content model (Anthropic Messages wire shape)
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export interface CacheControl {
  type: 'ephemeral';
  ttl?: '5m' | '1h';
}

export interface TextBlock {
  type: 'text';
  text: string;
  cache_control?: CacheControl;
}

export interface Base64ImageSource {
  type: 'base64';
  media_type: string;
  data: string;
}

export interface UrlImageSource {
  type: 'url';
  url: string;
}

export type ImageSource = Base64ImageSource | UrlImageSource;

export interface ImageBlock {
  type: 'image';
  source: ImageSource;
  cache_control?: CacheControl;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: JsonObject;
  cache_control?: CacheControl;
}

export type ToolResultContent = string | Array<TextBlock | ImageBlock>;

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: ToolResultContent;
  is_error?: boolean;
  cache_control?: CacheControl;
}

export interface ThinkingBlock {
  type: 'thinking';
  thinking: string;
  signature?: string;
}

export interface RedactedThinkingBlock {
  type: 'redacted_thinking';
  data: string;
}

export type ContentBlock =
  | TextBlock
  | ImageBlock
  | ToolUseBlock
  | ToolResultBlock
  | ThinkingBlock
  | RedactedThinkingBlock;

export type ContentBlockType = ContentBlock['type'];

/** Blocks that may carry a cache_control marker */
export type CacheableBlock = TextBlock | ImageBlock | ToolUseBlock | ToolResultBlock;

export function isCacheableBlock(block: ContentBlock): block is CacheableBlock {
  return block.type !== 'thinking' && block.type !== 'redacted_thinking';
}

export type Role = 'user' | 'assistant' | 'system';

export interface Message {
  role: Role;
  content: ContentBlock[];
}
