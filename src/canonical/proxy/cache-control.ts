import type {
  CacheControl,
  ChatRequest,
  ContentBlock,
  Message,
  TextBlock,
  ToolDefinition,
} from '../types/index.js';
import { isCacheableBlock } from '../types/index.js';
import { ConfigurationError } from '../../shared/errors/index.js';

/** Maximum cache breakpoints the canonical provider accepts per request */
export const MAX_CACHE_BREAKPOINTS = 4;

export type CacheTarget = 'tools' | 'system' | 'penultimate_message' | 'last_message';

export const DEFAULT_CACHE_TARGETS: readonly CacheTarget[] = ['system', 'penultimate_message'];

export interface CacheControlOptions {
  targets?: readonly CacheTarget[];
  /** From 1 to MAX_CACHE_BREAKPOINTS */
  maxBreakpoints?: number;
  ttl?: CacheControl['ttl'];
}

type Position =
  | { kind: 'tool'; index: number }
  | { kind: 'system'; index: number }
  | { kind: 'message'; index: number; block: number };

function positionKey(position: Position): string {
  return position.kind === 'message'
    ? `message:${position.index}:${position.block}`
    : `${position.kind}:${position.index}`;
}

// Empty text blocks cannot carry a breakpoint
function canMark(block: ContentBlock): boolean {
  return isCacheableBlock(block) && !(block.type === 'text' && block.text === '');
}

function lastMarkableBlock(message: Message): number {
  for (let i = message.content.length - 1; i >= 0; i--) {
    if (canMark(message.content[i])) return i;
  }
  return -1;
}

function systemBlocks(system: ChatRequest['system']): TextBlock[] {
  if (system === undefined || system === '') return [];
  return typeof system === 'string' ? [{ type: 'text', text: system }] : system;
}

function resolveTarget(request: ChatRequest, target: CacheTarget): Position | undefined {
  switch (target) {
    case 'tools': {
      const count = request.tools?.length ?? 0;
      return count > 0 ? { kind: 'tool', index: count - 1 } : undefined;
    }
    case 'system': {
      const blocks = systemBlocks(request.system);
      for (let i = blocks.length - 1; i >= 0; i--) {
        if (blocks[i].text !== '') return { kind: 'system', index: i };
      }
      return undefined;
    }
    case 'penultimate_message':
    case 'last_message': {
      const index = request.messages.length - (target === 'last_message' ? 1 : 2);
      if (index < 0) return undefined;
      const block = lastMarkableBlock(request.messages[index]);
      return block === -1 ? undefined : { kind: 'message', index, block };
    }
  }
}

function existingPositions(request: ChatRequest): Position[] {
  const found: Position[] = [];
  request.tools?.forEach((tool, index) => {
    if (tool.cache_control) found.push({ kind: 'tool', index });
  });
  if (Array.isArray(request.system)) {
    request.system.forEach((block, index) => {
      if (block.cache_control) found.push({ kind: 'system', index });
    });
  }
  request.messages.forEach((message, index) => {
    message.content.forEach((block, b) => {
      if (isCacheableBlock(block) && block.cache_control) found.push({ kind: 'message', index, block: b });
    });
  });
  return found;
}

/**
 * Number of cache breakpoints already present on a request
 */
export function countCacheBreakpoints(request: ChatRequest): number {
  return existingPositions(request).length;
}

function mark<T extends { cache_control?: CacheControl }>(item: T, marker: CacheControl): T {
  return { ...item, cache_control: { ...marker } };
}

/**
 * Return a copy of the request with cache_control markers at the configured targets.
 * Markers already at a target position are overwritten, so applying twice is a no-op.
 * Throws ConfigurationError when the total number of breakpoints would exceed the limit.
 */
export function injectCacheControl(request: ChatRequest, options: CacheControlOptions = {}): ChatRequest {
  const targets = options.targets ?? DEFAULT_CACHE_TARGETS;
  const maxBreakpoints = options.maxBreakpoints ?? MAX_CACHE_BREAKPOINTS;
  if (!Number.isInteger(maxBreakpoints) || maxBreakpoints < 1 || maxBreakpoints > MAX_CACHE_BREAKPOINTS) {
    throw new ConfigurationError(`maxBreakpoints must be an integer from 1 to ${MAX_CACHE_BREAKPOINTS}`, {
      maxBreakpoints,
    });
  }
  const marker: CacheControl = options.ttl ? { type: 'ephemeral', ttl: options.ttl } : { type: 'ephemeral' };

  const planned = new Map<string, Position>();
  for (const target of targets) {
    const position = resolveTarget(request, target);
    if (position) planned.set(positionKey(position), position);
  }
  if (planned.size === 0) return request;

  const elsewhere = existingPositions(request).filter(p => !planned.has(positionKey(p))).length;
  const total = elsewhere + planned.size;
  if (total > maxBreakpoints) {
    throw new ConfigurationError(
      `Cache control would place ${total} breakpoints; the limit is ${maxBreakpoints}`,
      { existing: elsewhere, requested: planned.size, maxBreakpoints }
    );
  }

  const result: ChatRequest = { ...request };

  if (request.tools) {
    result.tools = request.tools.map((tool: ToolDefinition, index) =>
      planned.has(positionKey({ kind: 'tool', index })) ? mark(tool, marker) : tool
    );
  }

  if (request.system !== undefined && [...planned.values()].some(p => p.kind === 'system')) {
    result.system = systemBlocks(request.system).map((block, index) =>
      planned.has(positionKey({ kind: 'system', index })) ? mark(block, marker) : block
    );
  }

  result.messages = request.messages.map((message, index) => {
    const touched = message.content.some((_, block) => planned.has(positionKey({ kind: 'message', index, block })));
    if (!touched) return message;
    return {
      ...message,
      content: message.content.map((block, b) =>
        isCacheableBlock(block) && planned.has(positionKey({ kind: 'message', index, block: b }))
          ? mark(block, marker)
          : block
      ),
    };
  });

  return result;
}
