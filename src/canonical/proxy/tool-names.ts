import { createHash } from 'node:crypto';
import type { ChatRequest, ChatResponse, ContentBlock, Message } from '../types/index.js';
import { MAX_TOOL_NAME_LENGTH, TOOL_NAME_PATTERN } from '../validation/request-rules.js';
import { ConfigurationError, ConversionError, TransformError } from '../../shared/errors/index.js';

/** Shortened names an instance remembers before evicting the least recently used */
export const DEFAULT_MAX_HASHED_NAMES = 1024;

export interface ToolNameTransformOptions {
  /** Prepended to every encoded name, e.g. `mcp_` */
  prefix?: string;
  /** Capacity of the table that restores shortened names */
  maxHashedNames?: number;
}

const SAFE_CHAR = /^[A-Za-z0-9-]$/;
const PREFIX_PATTERN = /^[A-Za-z0-9_-]{0,32}$/;
const HASH_LENGTH = 16;
// Escaped bodies never contain two underscores in a row: every `_` is followed by two hex digits
const ESCAPE_MARKER = '__';
const HASH_SEPARATOR = '__';

/**
 * Reversible mapping from arbitrary tool identifiers to names matching `^[A-Za-z0-9_-]{1,64}$`.
 *
 * Names already in that grammar pass through behind the prefix, unless they start with `__`
 * or no longer fit once prefixed. Every other name is written as `__` followed by its
 * escaped form, where characters outside `[A-Za-z0-9-]` (including `_`) become `_xx` per
 * UTF-8 byte. Both forms decode without state, so any instance with the same prefix
 * restores them.
 *
 * Escaped forms longer than 64 characters are truncated and suffixed with a SHA-256
 * fragment. Only the producing instance can restore those, and it keeps at most
 * `maxHashedNames` of them.
 */
export class ToolNameTransform {
  private readonly prefix: string;
  private readonly maxHashedNames: number;
  private readonly hashed = new Map<string, string>();

  constructor(options: ToolNameTransformOptions = {}) {
    this.prefix = options.prefix ?? '';
    if (!PREFIX_PATTERN.test(this.prefix)) {
      throw new ConfigurationError('Tool name prefix must match [A-Za-z0-9_-] and be at most 32 characters', {
        prefix: this.prefix,
      });
    }
    this.maxHashedNames = options.maxHashedNames ?? DEFAULT_MAX_HASHED_NAMES;
    if (!Number.isInteger(this.maxHashedNames) || this.maxHashedNames < 1) {
      throw new ConfigurationError('maxHashedNames must be a positive integer', {
        maxHashedNames: this.maxHashedNames,
      });
    }
  }

  /** Number of shortened names this instance can currently restore */
  get hashedCount(): number {
    return this.hashed.size;
  }

  transform(name: string): string {
    if (name.length === 0) {
      throw new ConversionError('SchemaViolation', 'Tool name must not be empty');
    }

    const encoded = this.encode(name);
    if (encoded.length <= MAX_TOOL_NAME_LENGTH) return encoded;

    const digest = createHash('sha256').update(name, 'utf8').digest('hex').slice(0, HASH_LENGTH);
    const keep = MAX_TOOL_NAME_LENGTH - HASH_SEPARATOR.length - HASH_LENGTH;
    const shortened = encoded.slice(0, keep) + HASH_SEPARATOR + digest;
    this.remember(shortened, name);
    return shortened;
  }

  restore(encoded: string): string {
    if (!encoded.startsWith(this.prefix)) throw unknownName(encoded);

    const body = encoded.slice(this.prefix.length);
    if (!body.startsWith(ESCAPE_MARKER)) {
      if (!TOOL_NAME_PATTERN.test(body) || this.encode(body) !== encoded) throw unknownName(encoded);
      return body;
    }

    const original = this.hashed.get(encoded);
    if (original !== undefined) {
      this.remember(encoded, original);
      return original;
    }

    const decoded = unescapeName(body.slice(ESCAPE_MARKER.length));
    // Rejects non-canonical spellings such as uppercase hex or escaped safe characters
    if (decoded === undefined || decoded.length === 0 || this.encode(decoded) !== encoded) {
      throw unknownName(encoded);
    }
    return decoded;
  }

  /**
   * Encode tool definitions, a named tool_choice and tool_use blocks
   */
  transformRequest(request: ChatRequest): ChatRequest {
    return this.mapRequestNames(request, name => this.transform(name));
  }

  restoreRequest(request: ChatRequest): ChatRequest {
    return this.mapRequestNames(request, name => this.restore(name));
  }

  restoreResponse(response: ChatResponse): ChatResponse {
    return { ...response, content: this.mapBlocks(response.content, name => this.restore(name)) };
  }

  private mapRequestNames(request: ChatRequest, map: (name: string) => string): ChatRequest {
    const result: ChatRequest = {
      ...request,
      messages: request.messages.map((message): Message => ({
        ...message,
        content: this.mapBlocks(message.content, map),
      })),
    };
    if (request.tools) {
      result.tools = request.tools.map(tool => ({ ...tool, name: map(tool.name) }));
    }
    if (request.tool_choice?.type === 'tool') {
      result.tool_choice = { ...request.tool_choice, name: map(request.tool_choice.name) };
    }
    return result;
  }

  private mapBlocks(blocks: readonly ContentBlock[], map: (name: string) => string): ContentBlock[] {
    return blocks.map(block => (block.type === 'tool_use' ? { ...block, name: map(block.name) } : block));
  }

  private encode(name: string): string {
    if (
      TOOL_NAME_PATTERN.test(name) &&
      !name.startsWith(ESCAPE_MARKER) &&
      this.prefix.length + name.length <= MAX_TOOL_NAME_LENGTH
    ) {
      return this.prefix + name;
    }
    return this.prefix + ESCAPE_MARKER + escapeName(name);
  }

  // Least recently used entries are evicted first
  private remember(shortened: string, name: string): void {
    this.hashed.delete(shortened);
    this.hashed.set(shortened, name);
    if (this.hashed.size > this.maxHashedNames) {
      const oldest = this.hashed.keys().next();
      if (!oldest.done) this.hashed.delete(oldest.value);
    }
  }
}

function unknownName(encoded: string): TransformError {
  return new TransformError('UnknownEncodedName', `"${encoded}" was not produced by this transform`, {
    name: encoded,
  });
}

function escapeName(name: string): string {
  let out = '';
  for (const char of name) {
    if (SAFE_CHAR.test(char)) {
      out += char;
      continue;
    }
    for (const byte of Buffer.from(char, 'utf8')) {
      out += '_' + byte.toString(16).padStart(2, '0');
    }
  }
  return out;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function unescapeName(body: string): string | undefined {
  const bytes: number[] = [];
  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    if (char === '_') {
      const hex = body.slice(i + 1, i + 3);
      if (!/^[0-9a-f]{2}$/.test(hex)) return undefined;
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else if (SAFE_CHAR.test(char)) {
      bytes.push(char.charCodeAt(0));
    } else {
      return undefined;
    }
  }
  try {
    return utf8.decode(Uint8Array.from(bytes));
  } catch {
    return undefined;
  }
}
