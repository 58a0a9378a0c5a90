import type { JsonObject, JsonValue, ToolChoice, ToolDefinition, ToolUseBlock } from '../../types/index.js';
import { ConversionError } from '../../../shared/errors/index.js';
import { validateToolDefinitions } from '../../validation/request-rules.js';

/**
 * OpenAI tool format interfaces
 */
export interface OpenAIFunctionTool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: JsonObject;
    strict?: boolean;
  };
}

/** Free-form tools; no canonical counterpart */
export interface OpenAICustomTool {
  type: 'custom';
  custom: { name: string; description?: string };
}

export type OpenAITool = OpenAIFunctionTool | OpenAICustomTool;

export type OpenAIToolChoice =
  | 'auto'
  | 'none'
  | 'required'
  | { type: 'function'; function: { name: string } };

export interface OpenAIToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

const EMPTY_PARAMETERS: JsonObject = { type: 'object', properties: {} };

/**
 * Convert canonical tools to OpenAI tools format
 */
export function toOpenAITools(tools: readonly ToolDefinition[]): OpenAIFunctionTool[] {
  validateToolDefinitions(tools);
  return tools.map(tool => ({
    type: 'function',
    function: {
      name: tool.name,
      ...(tool.description !== undefined && { description: tool.description }),
      parameters: tool.input_schema,
    },
  }));
}

/**
 * Convert OpenAI tools back to canonical format
 */
export function fromOpenAITools(tools: readonly OpenAITool[]): ToolDefinition[] {
  const converted = tools.map((tool, i): ToolDefinition => {
    if (tool.type !== 'function') {
      throw new ConversionError('UnsupportedConstruct', `Tool type "${tool.type}" has no canonical counterpart`, {
        path: `tools[${i}]`,
      });
    }
    const { name, description, parameters } = tool.function;
    return {
      name,
      ...(description !== undefined && { description }),
      input_schema: parameters ?? EMPTY_PARAMETERS,
    };
  });
  validateToolDefinitions(converted);
  return converted;
}

export interface OpenAIToolChoiceFields {
  tool_choice?: OpenAIToolChoice;
  parallel_tool_calls?: boolean;
}

/**
 * Convert canonical tool_choice to OpenAI tool_choice and parallel_tool_calls
 */
export function toOpenAIToolChoice(toolChoice: ToolChoice | undefined): OpenAIToolChoiceFields {
  if (!toolChoice) return {};

  const fields: OpenAIToolChoiceFields = {};
  switch (toolChoice.type) {
    case 'auto':
      fields.tool_choice = 'auto';
      break;
    case 'any':
      fields.tool_choice = 'required';
      break;
    case 'none':
      fields.tool_choice = 'none';
      break;
    case 'tool':
      fields.tool_choice = { type: 'function', function: { name: toolChoice.name } };
      break;
  }

  if (toolChoice.disable_parallel_tool_use !== undefined) {
    fields.parallel_tool_calls = !toolChoice.disable_parallel_tool_use;
  }
  return fields;
}

/**
 * Convert OpenAI tool_choice (and parallel_tool_calls) back to canonical.
 * A parallel_tool_calls flag without tool_choice implies `auto`.
 */
export function fromOpenAIToolChoice(fields: OpenAIToolChoiceFields): ToolChoice | undefined {
  const { tool_choice: choice, parallel_tool_calls: parallel } = fields;
  if (choice === undefined && parallel === undefined) return undefined;

  const flag = parallel === undefined ? {} : { disable_parallel_tool_use: !parallel };

  if (choice === undefined || choice === 'auto') return { type: 'auto', ...flag };
  if (choice === 'required') return { type: 'any', ...flag };
  if (choice === 'none') return { type: 'none', ...flag };
  if (typeof choice === 'object' && choice.type === 'function') {
    return { type: 'tool', name: choice.function.name, ...flag };
  }

  throw new ConversionError('UnsupportedConstruct', 'Unsupported tool_choice value', { path: 'tool_choice' });
}

export function toOpenAIToolCall(block: ToolUseBlock): OpenAIToolCall {
  return {
    id: block.id,
    type: 'function',
    function: { name: block.name, arguments: JSON.stringify(block.input) },
  };
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tool call arguments arrive as a JSON string and must decode to an object
 */
export function parseToolArguments(raw: string, path: string): JsonObject {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConversionError('MalformedInput', 'Tool call arguments are not valid JSON', {
      path,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  if (!isJsonObject(parsed)) {
    throw new ConversionError('SchemaViolation', 'Tool call arguments must be a JSON object', { path });
  }
  return parsed;
}

export function fromOpenAIToolCall(call: OpenAIToolCall, path: string): ToolUseBlock {
  if (!call.id) {
    throw new ConversionError('MalformedInput', 'Tool call is missing its id', { path: `${path}.id` });
  }
  if (!call.function || typeof call.function.name !== 'string') {
    throw new ConversionError('MalformedInput', 'Tool call is missing its function name', {
      path: `${path}.function`,
    });
  }
  return {
    type: 'tool_use',
    id: call.id,
    name: call.function.name,
    input: parseToolArguments(call.function.arguments, `${path}.function.arguments`),
  };
}
