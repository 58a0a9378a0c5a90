import type {
  ContentBlock,
  ImageBlock,
  ImageSource,
  Message,
  SystemPrompt,
  TextBlock,
  ToolResultBlock,
} from '../../types/index.js';
import { ConversionError } from '../../../shared/errors/index.js';
import { fromOpenAIToolCall, toOpenAIToolCall } from './tools.js';
import type { OpenAIToolCall } from './tools.js';

/**
 * OpenAI message format interfaces
 */
export interface OpenAITextPart {
  type: 'text';
  text: string;
}

export interface OpenAIImagePart {
  type: 'image_url';
  image_url: { url: string; detail?: 'low' | 'high' | 'auto' };
}

export interface OpenAIAudioPart {
  type: 'input_audio';
  input_audio: { data: string; format: string };
}

export interface OpenAIFilePart {
  type: 'file';
  file: { file_id?: string; file_data?: string; filename?: string };
}

export interface OpenAIRefusalPart {
  type: 'refusal';
  refusal: string;
}

export type OpenAIContentPart =
  | OpenAITextPart
  | OpenAIImagePart
  | OpenAIAudioPart
  | OpenAIFilePart
  | OpenAIRefusalPart;

export type OpenAIContent = string | OpenAIContentPart[];

export interface OpenAISystemMessage {
  role: 'system' | 'developer';
  content: OpenAIContent | null;
  name?: string;
}

export interface OpenAIUserMessage {
  role: 'user';
  content: OpenAIContent | null;
  name?: string;
}

export interface OpenAIAssistantMessage {
  role: 'assistant';
  content?: OpenAIContent | null;
  refusal?: string | null;
  tool_calls?: OpenAIToolCall[];
  function_call?: { name: string; arguments: string };
  name?: string;
}

export interface OpenAIToolMessage {
  role: 'tool';
  content: OpenAIContent;
  tool_call_id: string;
}

/** Legacy function-calling role; rejected on input */
export interface OpenAIFunctionMessage {
  role: 'function';
  content: string | null;
  name: string;
}

export type OpenAIMessage =
  | OpenAISystemMessage
  | OpenAIUserMessage
  | OpenAIAssistantMessage
  | OpenAIToolMessage
  | OpenAIFunctionMessage;

/** Carries `is_error` through the tool role, which has no error flag */
export const TOOL_ERROR_MARKER = '[ERROR] ';

const DATA_URL = /^data:([^;,]+);base64,(.*)$/s;

// ---------------------------------------------------------------------------
// Canonical → OpenAI
// ---------------------------------------------------------------------------

/**
 * Convert canonical messages to OpenAI format
 * @param system - leading system prompt, emitted as the first message
 */
export function toOpenAIMessages(messages: readonly Message[], system?: SystemPrompt): OpenAIMessage[] {
  const out: OpenAIMessage[] = [];

  if (system !== undefined) {
    if (typeof system !== 'string') requireBlocks(system, 'system');
    out.push({
      role: 'system',
      content: typeof system === 'string' ? system : system.map(toTextPart),
    });
  }

  messages.forEach((message, i) => {
    const path = `messages[${i}]`;
    switch (message.role) {
      case 'system':
        requireBlocks(message.content, `${path}.content`);
        out.push({ role: 'system', content: collapseParts(systemParts(message.content, path)) });
        break;
      case 'user':
        requireBlocks(message.content, `${path}.content`);
        out.push(...userToOpenAI(message.content, path));
        break;
      case 'assistant': {
        const converted = assistantToOpenAI(message.content, path);
        if (converted) out.push(converted);
        break;
      }
    }
  });

  if (out.length === 0) {
    throw new ConversionError('SchemaViolation', 'No messages are left to send', { path: 'messages' });
  }
  return out;
}

// Zero-block messages are invalid in both formats
function requireBlocks(content: readonly unknown[], path: string): void {
  if (content.length === 0) {
    throw new ConversionError('SchemaViolation', 'Content must hold at least one block', { path });
  }
}

function toTextPart(block: TextBlock): OpenAITextPart {
  return { type: 'text', text: block.text };
}

function imageToPart(source: ImageSource): OpenAIImagePart {
  const url = source.type === 'base64'
    ? `data:${source.media_type};base64,${source.data}`
    : source.url;
  return { type: 'image_url', image_url: { url } };
}

// A lone text part becomes a bare string
function collapseParts(parts: OpenAIContentPart[]): OpenAIContent {
  const [first] = parts;
  if (parts.length === 1 && first.type === 'text') return first.text;
  return parts;
}

function systemParts(content: readonly ContentBlock[], path: string): OpenAITextPart[] {
  return content.map((block, j) => {
    if (block.type !== 'text') {
      throw new ConversionError('UnsupportedConstruct', `System content must be text, got ${block.type}`, {
        path: `${path}.content[${j}]`,
      });
    }
    return toTextPart(block);
  });
}

/**
 * Each tool_result becomes its own tool message; the blocks around it stay in user messages.
 */
function userToOpenAI(content: readonly ContentBlock[], path: string): OpenAIMessage[] {
  const out: OpenAIMessage[] = [];
  let pending: OpenAIContentPart[] = [];

  const flush = () => {
    if (pending.length > 0) out.push({ role: 'user', content: collapseParts(pending) });
    pending = [];
  };

  content.forEach((block, j) => {
    const blockPath = `${path}.content[${j}]`;
    switch (block.type) {
      case 'text':
        pending.push(toTextPart(block));
        break;
      case 'image':
        pending.push(imageToPart(block.source));
        break;
      case 'tool_result':
        flush();
        out.push(toolResultToOpenAI(block, blockPath));
        break;
      case 'thinking':
      case 'redacted_thinking':
        break;
      case 'tool_use':
        throw new ConversionError('UnsupportedConstruct', 'tool_use is only valid in assistant messages', {
          path: blockPath,
        });
    }
  });
  flush();

  return out;
}

function toolResultToOpenAI(block: ToolResultBlock, path: string): OpenAIToolMessage {
  const marker = block.is_error ? TOOL_ERROR_MARKER : '';

  if (typeof block.content === 'string') {
    return { role: 'tool', tool_call_id: block.tool_use_id, content: marker + block.content };
  }

  const parts = block.content.map((part, k): OpenAITextPart => {
    if (part.type !== 'text') {
      throw new ConversionError('UnsupportedConstruct', 'Tool results can only carry text in this format', {
        path: `${path}.content[${k}]`,
      });
    }
    return toTextPart(part);
  });

  const [first, ...rest] = parts;
  if (!first) return { role: 'tool', tool_call_id: block.tool_use_id, content: marker };

  return {
    role: 'tool',
    tool_call_id: block.tool_use_id,
    content: [{ type: 'text', text: marker + first.text }, ...rest],
  };
}

/**
 * Thinking blocks have no counterpart and are dropped.
 * Returns undefined when nothing is left to send.
 */
function assistantToOpenAI(content: readonly ContentBlock[], path: string): OpenAIAssistantMessage | undefined {
  const texts: OpenAITextPart[] = [];
  const toolCalls: OpenAIToolCall[] = [];

  content.forEach((block, j) => {
    switch (block.type) {
      case 'text':
        texts.push(toTextPart(block));
        break;
      case 'tool_use':
        toolCalls.push(toOpenAIToolCall(block));
        break;
      case 'thinking':
      case 'redacted_thinking':
        break;
      default:
        throw new ConversionError('UnsupportedConstruct', `${block.type} is not valid in assistant messages`, {
          path: `${path}.content[${j}]`,
        });
    }
  });

  if (texts.length === 0 && toolCalls.length === 0) return undefined;

  const message: OpenAIAssistantMessage = {
    role: 'assistant',
    content: texts.length === 0 ? null : collapseParts(texts),
  };
  if (toolCalls.length > 0) message.tool_calls = toolCalls;
  return message;
}

// ---------------------------------------------------------------------------
// OpenAI → Canonical
// ---------------------------------------------------------------------------

export interface CanonicalConversation {
  system?: SystemPrompt;
  messages: Message[];
}

/**
 * Convert OpenAI messages back to canonical format.
 * Leading system/developer messages (and a top-level `system` string) form the system prompt.
 */
export function fromOpenAIMessages(openaiMessages: readonly OpenAIMessage[], topLevelSystem?: string): CanonicalConversation {
  const systemSources: SystemPrompt[] = topLevelSystem !== undefined ? [topLevelSystem] : [];

  let start = 0;
  for (; start < openaiMessages.length; start++) {
    const message = openaiMessages[start];
    if (message.role !== 'system' && message.role !== 'developer') break;
    systemSources.push(systemSource(message.content, `messages[${start}]`));
  }

  const messages: Message[] = [];
  // User message collecting consecutive tool results, if any
  let toolGroup: Message | undefined;

  for (let i = start; i < openaiMessages.length; i++) {
    const message = openaiMessages[i];
    const path = `messages[${i}]`;

    switch (message.role) {
      case 'system':
      case 'developer': {
        const text = systemSource(message.content, path);
        messages.push({ role: 'system', content: typeof text === 'string' ? [{ type: 'text', text }] : text });
        toolGroup = undefined;
        break;
      }
      case 'user': {
        const blocks = userContent(message.content, path);
        if (toolGroup) {
          toolGroup.content.push(...blocks);
        } else {
          messages.push({ role: 'user', content: blocks });
        }
        toolGroup = undefined;
        break;
      }
      case 'assistant':
        messages.push({ role: 'assistant', content: assistantContent(message, path) });
        toolGroup = undefined;
        break;
      case 'tool': {
        const block = toolResultFromOpenAI(message, path);
        if (toolGroup) {
          toolGroup.content.push(block);
        } else {
          toolGroup = { role: 'user', content: [block] };
          messages.push(toolGroup);
        }
        break;
      }
      case 'function':
        throw new ConversionError('UnsupportedConstruct', 'The legacy function role is not supported; use tool messages', {
          path,
        });
      default:
        throw new ConversionError('MalformedInput', 'Unknown message role', { path: `${path}.role` });
    }
  }

  return { system: mergeSystemSources(systemSources), messages };
}

function systemSource(content: OpenAIContent | null, path: string): SystemPrompt {
  if (content === null || content === undefined) {
    throw new ConversionError('MalformedInput', 'System message content is missing', { path: `${path}.content` });
  }
  if (typeof content === 'string') return content;
  requireBlocks(content, `${path}.content`);

  return content.map((part, j): TextBlock => {
    if (part.type !== 'text') {
      throw new ConversionError('UnsupportedConstruct', `System content must be text, got ${part.type}`, {
        path: `${path}.content[${j}]`,
      });
    }
    return { type: 'text', text: part.text };
  });
}

function mergeSystemSources(sources: SystemPrompt[]): SystemPrompt | undefined {
  if (sources.length === 0) return undefined;
  if (sources.length === 1) return sources[0];
  return sources
    .map(source => (typeof source === 'string' ? source : source.map(block => block.text).join('\n\n')))
    .join('\n\n');
}

function userContent(content: OpenAIContent | null, path: string): ContentBlock[] {
  if (content === null || content === undefined) {
    throw new ConversionError('MalformedInput', 'User message content is missing', { path: `${path}.content` });
  }
  if (typeof content === 'string') return [{ type: 'text', text: content }];
  requireBlocks(content, `${path}.content`);

  return content.map((part, j): TextBlock | ImageBlock => {
    const partPath = `${path}.content[${j}]`;
    switch (part.type) {
      case 'text':
        return { type: 'text', text: part.text };
      case 'image_url':
        return { type: 'image', source: parseImageUrl(part.image_url.url, partPath) };
      default:
        throw new ConversionError('UnsupportedConstruct', `Content part "${part.type}" has no canonical counterpart`, {
          path: partPath,
        });
    }
  });
}

/**
 * data:<media_type>;base64,<data> becomes an inline source; anything else is referenced by URL
 */
export function parseImageUrl(url: string, path = 'image_url'): ImageSource {
  if (url.startsWith('data:')) {
    const match = DATA_URL.exec(url);
    if (!match) {
      throw new ConversionError('MalformedInput', 'Image data URL must be base64 encoded', { path });
    }
    return { type: 'base64', media_type: match[1], data: match[2] };
  }
  return { type: 'url', url };
}

function assistantContent(message: OpenAIAssistantMessage, path: string): ContentBlock[] {
  if (message.function_call) {
    throw new ConversionError('UnsupportedConstruct', 'Legacy function_call is not supported; use tool_calls', {
      path: `${path}.function_call`,
    });
  }

  const blocks: ContentBlock[] = [];
  const toolCalls = message.tool_calls ?? [];
  const { content } = message;

  if (typeof content === 'string') {
    if (content !== '' || toolCalls.length === 0) blocks.push({ type: 'text', text: content });
  } else if (Array.isArray(content)) {
    content.forEach((part, j) => {
      switch (part.type) {
        case 'text':
          blocks.push({ type: 'text', text: part.text });
          break;
        case 'refusal':
          blocks.push({ type: 'text', text: part.refusal });
          break;
        default:
          throw new ConversionError('UnsupportedConstruct', `Assistant content part "${part.type}" is not supported`, {
            path: `${path}.content[${j}]`,
          });
      }
    });
  }

  if (message.refusal) blocks.push({ type: 'text', text: message.refusal });

  toolCalls.forEach((call, k) => {
    blocks.push(fromOpenAIToolCall(call, `${path}.tool_calls[${k}]`));
  });

  if (blocks.length === 0) {
    throw new ConversionError('MalformedInput', 'Assistant message has neither content nor tool calls', { path });
  }
  return blocks;
}

function toolResultFromOpenAI(message: OpenAIToolMessage, path: string): ToolResultBlock {
  if (!message.tool_call_id) {
    throw new ConversionError('MalformedInput', 'Tool message is missing tool_call_id', {
      path: `${path}.tool_call_id`,
    });
  }

  const { content } = message;
  if (content === null || content === undefined) {
    throw new ConversionError('MalformedInput', 'Tool message content is missing', { path: `${path}.content` });
  }

  if (typeof content === 'string') {
    const isError = content.startsWith(TOOL_ERROR_MARKER);
    return withErrorFlag({
      type: 'tool_result',
      tool_use_id: message.tool_call_id,
      content: isError ? content.slice(TOOL_ERROR_MARKER.length) : content,
    }, isError);
  }

  const texts = content.map((part, j): TextBlock => {
    if (part.type !== 'text') {
      throw new ConversionError('UnsupportedConstruct', `Tool content part "${part.type}" is not supported`, {
        path: `${path}.content[${j}]`,
      });
    }
    return { type: 'text', text: part.text };
  });

  const [first, ...rest] = texts;
  const isError = first !== undefined && first.text.startsWith(TOOL_ERROR_MARKER);
  return withErrorFlag({
    type: 'tool_result',
    tool_use_id: message.tool_call_id,
    content: isError ? [{ type: 'text', text: first.text.slice(TOOL_ERROR_MARKER.length) }, ...rest] : texts,
  }, isError);
}

function withErrorFlag(block: ToolResultBlock, isError: boolean): ToolResultBlock {
  return isError ? { ...block, is_error: true } : block;
}
