/**
 * OpenAI Adapter Tests
 */

import { describe, test, expect } from 'vitest';
import {
  canonicalRequestToOpenAI,
  canonicalResponseToOpenAI,
  createOpenAIAdapter,
  openaiAdapter,
  openaiRequestToCanonical,
  openaiResponseToCanonical,
  toOpenAIUsage,
  effortForBudget,
} from '../../../adapters/openai/index.js';
import type { OpenAIChatRequest } from '../../../adapters/openai/index.js';
import type { ChatRequest, ChatResponse, Message } from '../../../types/index.js';
import {
  mockCanonicalRequest,
  mockCanonicalResponse,
  mockOpenAIRequest,
  mockOpenAIResponse,
  mockOpenAIToolRequest,
  mockOpenAIToolResponse,
} from '../../helpers/mock-data.js';
import { catchConversionError, expectConversionError } from '../../helpers/test-utils.js';

describe('OpenAI Adapter', () => {
  describe('clientToCanonical', () => {
    test('transforms basic request correctly', () => {
      const canonical = openaiAdapter.clientToCanonical(mockOpenAIRequest);

      expect(canonical).toEqual({
        model: 'gpt-4o-mini',
        max_tokens: 256,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'What is the weather like today?' }] }],
      });
    });

    test('handles tool requests correctly', () => {
      const canonical = openaiRequestToCanonical(mockOpenAIToolRequest);

      expect(canonical.system).toBe('You are helpful.');
      expect(canonical.tool_choice).toEqual({ type: 'auto' });
      expect(canonical.tools).toEqual([{
        name: 'get_current_weather',
        description: 'Get the current weather in a location',
        input_schema: {
          type: 'object',
          properties: { location: { type: 'string' } },
          required: ['location'],
        },
      }]);
      expect(canonical.messages).toEqual([
        { role: 'user', content: [{ type: 'text', text: 'Weather in Paris?' }] },
        {
          role: 'assistant',
          content: [{ type: 'tool_use', id: 'call_1', name: 'get_current_weather', input: { location: 'Paris' } }],
        },
        { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'call_1', content: '18C and sunny' }] },
      ]);
    });

    test('merges system sources in order', () => {
      const canonical = openaiRequestToCanonical({
        model: 'gpt-4o',
        max_tokens: 100,
        system: 'A',
        messages: [
          { role: 'system', content: 'B' },
          { role: 'developer', content: [{ type: 'text', text: 'C' }] },
          { role: 'user', content: 'hi' },
        ],
      });

      expect(canonical.system).toBe('A\n\nB\n\nC');
      expect(canonical.messages).toHaveLength(1);
    });

    test('keeps a single part-list system prompt as text blocks', () => {
      const canonical = openaiRequestToCanonical({
        model: 'gpt-4o',
        max_tokens: 100,
        messages: [
          { role: 'system', content: [{ type: 'text', text: 'X' }] },
          { role: 'user', content: 'hi' },
        ],
      });

      expect(canonical.system).toEqual([{ type: 'text', text: 'X' }]);
    });

    test('keeps system messages after the conversation starts in place', () => {
      const canonical = openaiRequestToCanonical({
        model: 'gpt-4o',
        max_tokens: 100,
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'system', content: 'be brief' },
        ],
      });

      expect(canonical.system).toBeUndefined();
      expect(canonical.messages[1]).toEqual({ role: 'system', content: [{ type: 'text', text: 'be brief' }] });
    });

    test('groups consecutive tool messages with the following user message', () => {
      const canonical = openaiRequestToCanonical({
        model: 'gpt-4o',
        max_tokens: 100,
        messages: [
          { role: 'user', content: 'q' },
          {
            role: 'assistant',
            content: null,
            tool_calls: [
              { id: 'c1', type: 'function', function: { name: 'a', arguments: '{}' } },
              { id: 'c2', type: 'function', function: { name: 'b', arguments: '{}' } },
            ],
          },
          { role: 'tool', tool_call_id: 'c1', content: 'r1' },
          { role: 'tool', tool_call_id: 'c2', content: 'r2' },
          { role: 'user', content: 'thanks' },
        ],
      });

      expect(canonical.messages).toHaveLength(3);
      expect(canonical.messages[2]).toEqual({
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'c1', content: 'r1' },
          { type: 'tool_result', tool_use_id: 'c2', content: 'r2' },
          { type: 'text', text: 'thanks' },
        ],
      });
    });

    test('recovers is_error from the error marker', () => {
      const canonical = openaiRequestToCanonical({
        model: 'gpt-4o',
        max_tokens: 100,
        messages: [{ role: 'tool', tool_call_id: 'tu_1', content: '[ERROR] disk full' }],
      });

      expect(canonical.messages[0].content).toEqual([
        { type: 'tool_result', tool_use_id: 'tu_1', content: 'disk full', is_error: true },
      ]);
    });

    test('converts data URLs to inline images and other URLs to references', () => {
      const canonical = openaiRequestToCanonical({
        model: 'gpt-4o',
        max_tokens: 100,
        messages: [{
          role: 'user',
          content: [
            { type: 'text', text: 'look' },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA' } },
            { type: 'image_url', image_url: { url: 'https://example.com/cat.png' } },
          ],
        }],
      });

      expect(canonical.messages[0].content).toEqual([
        { type: 'text', text: 'look' },
        { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'AAAA' } },
        { type: 'image', source: { type: 'url', url: 'https://example.com/cat.png' } },
      ]);
    });

    test('maps generation parameters', () => {
      const canonical = openaiRequestToCanonical({
        ...mockOpenAIRequest,
        temperature: 0.8,
        top_p: 0.9,
        stop: 'END',
        stream: false,
        user: 'user-1',
      });

      expect(canonical.temperature).toBe(0.8);
      expect(canonical.top_p).toBe(0.9);
      expect(canonical.stop_sequences).toEqual(['END']);
      expect(canonical.stream).toBe(false);
      expect(canonical.metadata).toEqual({ user_id: 'user-1' });
    });

    test('prefers max_completion_tokens over max_tokens', () => {
      const canonical = openaiRequestToCanonical({ ...mockOpenAIRequest, max_tokens: 10, max_completion_tokens: 20 });
      expect(canonical.max_tokens).toBe(20);
    });

    test('falls back to defaultMaxTokens and fails without it', () => {
      const { max_tokens: _omitted, ...request } = mockOpenAIRequest;

      expect(createOpenAIAdapter({ defaultMaxTokens: 4096 }).clientToCanonical(request).max_tokens).toBe(4096);
      expectConversionError(() => openaiRequestToCanonical(request), 'SchemaViolation', 'max_tokens');
    });

    test('maps reasoning_effort to adaptive thinking', () => {
      expect(openaiRequestToCanonical({ ...mockOpenAIRequest, reasoning_effort: 'minimal' })).toMatchObject({
        thinking: { type: 'adaptive' },
        output_config: { effort: 'low' },
      });

      const high = openaiRequestToCanonical({ ...mockOpenAIRequest, reasoning_effort: 'high' });
      expect(high.thinking).toEqual({ type: 'adaptive' });
      expect(high.output_config).toBeUndefined();

      expect(openaiRequestToCanonical({ ...mockOpenAIRequest, reasoning_effort: 'none' }).thinking).toEqual({
        type: 'disabled',
      });
    });

    test('maps tool_choice and parallel_tool_calls', () => {
      expect(openaiRequestToCanonical({ ...mockOpenAIRequest, tool_choice: 'required' }).tool_choice).toEqual({
        type: 'any',
      });
      expect(openaiRequestToCanonical({ ...mockOpenAIRequest, parallel_tool_calls: false }).tool_choice).toEqual({
        type: 'auto',
        disable_parallel_tool_use: true,
      });
    });

    test('treats missing parameters as an empty object schema', () => {
      const canonical = openaiRequestToCanonical({
        ...mockOpenAIRequest,
        tools: [{ type: 'function', function: { name: 'ping' } }],
      });
      expect(canonical.tools).toEqual([{ name: 'ping', input_schema: { type: 'object', properties: {} } }]);
    });

    test('rejects constructs without a canonical counterpart', () => {
      expectConversionError(
        () => openaiRequestToCanonical({
          ...mockOpenAIRequest,
          messages: [{ role: 'user', content: [{ type: 'input_audio', input_audio: { data: 'AAAA', format: 'wav' } }] }],
        }),
        'UnsupportedConstruct',
        'messages[0].content[0]'
      );
      expectConversionError(
        () => openaiRequestToCanonical({
          ...mockOpenAIRequest,
          messages: [{ role: 'function', name: 'legacy', content: 'x' }],
        }),
        'UnsupportedConstruct',
        'messages[0]'
      );
      expectConversionError(
        () => openaiRequestToCanonical({
          ...mockOpenAIRequest,
          tools: [{ type: 'custom', custom: { name: 'free' } }],
        }),
        'UnsupportedConstruct',
        'tools[0]'
      );
      expectConversionError(
        () => openaiRequestToCanonical({
          ...mockOpenAIRequest,
          messages: [{ role: 'system', content: [{ type: 'image_url', image_url: { url: 'https://example.com/a.png' } }] }],
        }),
        'UnsupportedConstruct',
        'messages[0].content[0]'
      );
    });

    test('rejects invalid tool call arguments', () => {
      const withArguments = (args: string): OpenAIChatRequest => ({
        ...mockOpenAIRequest,
        messages: [{
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 'c1', type: 'function', function: { name: 'a', arguments: args } }],
        }],
      });

      expectConversionError(
        () => openaiRequestToCanonical(withArguments('{invalid json')),
        'MalformedInput',
        'messages[0].tool_calls[0].function.arguments'
      );
      expectConversionError(() => openaiRequestToCanonical(withArguments('[1,2]')), 'SchemaViolation');
    });

    test('rejects empty content lists', () => {
      expectConversionError(
        () => openaiRequestToCanonical({ ...mockOpenAIRequest, messages: [{ role: 'user', content: [] }] }),
        'SchemaViolation',
        'messages[0].content'
      );
      expectConversionError(
        () => openaiRequestToCanonical({
          ...mockOpenAIRequest,
          messages: [{ role: 'system', content: [] }, { role: 'user', content: 'Hi' }],
        }),
        'SchemaViolation',
        'messages[0].content'
      );
      expectConversionError(
        () => openaiRequestToCanonical({
          ...mockOpenAIRequest,
          messages: [{ role: 'user', content: 'Hi' }, { role: 'developer', content: [] }],
        }),
        'SchemaViolation',
        'messages[1].content'
      );
    });

    test('rejects structurally invalid requests as malformed input', () => {
      const malformed: unknown[] = [
        { ...mockOpenAIRequest, messages: 'Hi' },
        { ...mockOpenAIRequest, messages: [null] },
        { ...mockOpenAIRequest, messages: [{ role: 'user', content: [{ type: 'image_url' }] }] },
        { ...mockOpenAIRequest, messages: [{ role: 'user', content: [{ type: 'text' }] }] },
        { ...mockOpenAIRequest, messages: [{ role: 'assistant', content: null, tool_calls: [{ id: 'c1' }] }] },
        { ...mockOpenAIRequest, tools: [{ type: 'function' }] },
        { ...mockOpenAIRequest, tool_choice: { type: 'function' } },
        { ...mockOpenAIRequest, max_tokens: '256' },
        { messages: [] },
      ];

      malformed.forEach(request => {
        const error = catchConversionError(() => openaiRequestToCanonical(request));
        expect(error.kind).toBe('MalformedInput');
        expect(error.context?.errors).toEqual(expect.arrayContaining([expect.any(String)]));
      });
    });
  });

  describe('canonicalToProvider', () => {
    test('emits the system prompt as the first message', () => {
      const providerRequest = openaiAdapter.canonicalToProvider(mockCanonicalRequest);

      expect(providerRequest).toEqual({
        model: 'claude-sonnet-4-5',
        max_tokens: 1024,
        messages: [
          { role: 'system', content: 'You are helpful.' },
          { role: 'user', content: 'Hello!' },
        ],
      });
    });

    test('emits each tool_result as its own tool message with the error marker', () => {
      const providerRequest = canonicalRequestToOpenAI({
        ...mockCanonicalRequest,
        system: undefined,
        messages: [{
          role: 'user',
          content: [
            { type: 'tool_result', tool_use_id: 'tu_1', content: 'disk full', is_error: true },
            { type: 'tool_result', tool_use_id: 'tu_2', content: [{ type: 'text', text: 'a' }, { type: 'text', text: 'b' }], is_error: true },
            { type: 'text', text: 'continue' },
          ],
        }],
      });

      expect(providerRequest.messages).toEqual([
        { role: 'tool', tool_call_id: 'tu_1', content: '[ERROR] disk full' },
        { role: 'tool', tool_call_id: 'tu_2', content: [{ type: 'text', text: '[ERROR] a' }, { type: 'text', text: 'b' }] },
        { role: 'user', content: 'continue' },
      ]);
    });

    test('rejects images inside tool results', () => {
      expectConversionError(
        () => canonicalRequestToOpenAI({
          ...mockCanonicalRequest,
          messages: [{
            role: 'user',
            content: [{
              type: 'tool_result',
              tool_use_id: 'tu_1',
              content: [{ type: 'image', source: { type: 'url', url: 'https://example.com/a.png' } }],
            }],
          }],
        }),
        'UnsupportedConstruct',
        'messages[0].content[0].content[0]'
      );
    });

    test('never emits messages without content', () => {
      const user: Message = { role: 'user', content: [{ type: 'text', text: 'q' }] };

      expectConversionError(
        () => canonicalRequestToOpenAI({ ...mockCanonicalRequest, system: [], messages: [user] }),
        'SchemaViolation',
        'system'
      );
      expectConversionError(
        () => canonicalRequestToOpenAI({
          ...mockCanonicalRequest,
          system: undefined,
          messages: [user, { role: 'system', content: [] }],
        }),
        'SchemaViolation',
        'messages[1].content'
      );
      expectConversionError(
        () => canonicalRequestToOpenAI({ ...mockCanonicalRequest, messages: [{ role: 'user', content: [] }] }),
        'SchemaViolation',
        'messages[0].content'
      );
    });

    test('rejects a request with nothing left to send', () => {
      expectConversionError(
        () => canonicalRequestToOpenAI({
          model: 'claude-sonnet-4-5',
          max_tokens: 1024,
          messages: [{ role: 'assistant', content: [{ type: 'thinking', thinking: 'hmm', signature: 'sig' }] }],
        }),
        'SchemaViolation',
        'messages'
      );
    });

    test('drops thinking blocks and assistant messages left empty', () => {
      const providerRequest = canonicalRequestToOpenAI({
        model: 'claude-sonnet-4-5',
        max_tokens: 1024,
        messages: [
          { role: 'user', content: [{ type: 'text', text: 'q' }] },
          { role: 'assistant', content: [{ type: 'thinking', thinking: 'hmm', signature: 'sig' }] },
          { role: 'assistant', content: [{ type: 'redacted_thinking', data: 'opaque' }, { type: 'text', text: 'answer' }] },
        ],
      });

      expect(providerRequest.messages).toEqual([
        { role: 'user', content: 'q' },
        { role: 'assistant', content: 'answer' },
      ]);
    });

    test('drops top_k and cache_control', () => {
      const providerRequest = canonicalRequestToOpenAI({
        model: 'claude-sonnet-4-5',
        max_tokens: 1024,
        top_k: 5,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'q', cache_control: { type: 'ephemeral' } }] }],
      });

      expect(providerRequest).toEqual({
        model: 'claude-sonnet-4-5',
        max_tokens: 1024,
        messages: [{ role: 'user', content: 'q' }],
      });
    });

    test('drops thinking configuration when reasoning_effort is unsupported', () => {
      const request: ChatRequest = { ...mockCanonicalRequest, thinking: { type: 'enabled', budget_tokens: 2000 } };

      const providerRequest = canonicalRequestToOpenAI(request);
      expect('reasoning_effort' in providerRequest).toBe(false);

      expect(canonicalRequestToOpenAI(request, { supportsReasoningEffort: true }).reasoning_effort).toBe('low');
    });

    test('maps adaptive effort and budgets to reasoning_effort', () => {
      const options = { supportsReasoningEffort: true };
      const adaptive = (effort?: 'low' | 'medium' | 'high' | 'max') =>
        canonicalRequestToOpenAI({
          ...mockCanonicalRequest,
          thinking: { type: 'adaptive' },
          ...(effort && { output_config: { effort } }),
        }, options).reasoning_effort;

      expect(adaptive()).toBe('high');
      expect(adaptive('medium')).toBe('medium');
      expect(adaptive('max')).toBe('high');
      expect(canonicalRequestToOpenAI({ ...mockCanonicalRequest, thinking: { type: 'disabled' } }, options).reasoning_effort)
        .toBeUndefined();

      expect(effortForBudget(2048)).toBe('low');
      expect(effortForBudget(2049)).toBe('medium');
      expect(effortForBudget(16384)).toBe('medium');
      expect(effortForBudget(16385)).toBe('high');
    });

    test('maps tool_choice with parallel flag', () => {
      const providerRequest = canonicalRequestToOpenAI({
        ...mockCanonicalRequest,
        tools: [{ name: 'lookup', input_schema: { type: 'object' } }],
        tool_choice: { type: 'tool', name: 'lookup', disable_parallel_tool_use: true },
      });

      expect(providerRequest.tool_choice).toEqual({ type: 'function', function: { name: 'lookup' } });
      expect(providerRequest.parallel_tool_calls).toBe(false);
      expect(providerRequest.tools).toEqual([
        { type: 'function', function: { name: 'lookup', parameters: { type: 'object' } } },
      ]);
    });

    test('emits max_completion_tokens when configured', () => {
      const providerRequest = createOpenAIAdapter({ useMaxCompletionTokens: true }).canonicalToProvider(mockCanonicalRequest);

      expect(providerRequest.max_completion_tokens).toBe(1024);
      expect('max_tokens' in providerRequest).toBe(false);
    });

    test('maps sampling parameters and metadata', () => {
      const providerRequest = canonicalRequestToOpenAI({
        ...mockCanonicalRequest,
        temperature: 0.2,
        top_p: 0.5,
        stop_sequences: ['END'],
        metadata: { user_id: 'user-1' },
      });

      expect(providerRequest).toMatchObject({ temperature: 0.2, top_p: 0.5, stop: ['END'], user: 'user-1' });
    });
  });

  describe('providerToCanonical', () => {
    test('transforms a text response', () => {
      expect(openaiResponseToCanonical(mockOpenAIResponse)).toEqual({
        id: 'chatcmpl-123',
        type: 'message',
        role: 'assistant',
        model: 'gpt-4o-mini',
        content: [{ type: 'text', text: 'It is sunny.' }],
        stop_reason: 'end_turn',
        usage: { input_tokens: 12, output_tokens: 4 },
      });
    });

    test('transforms tool calls and cached usage', () => {
      const canonical = openaiAdapter.providerToCanonical(mockOpenAIToolResponse);

      expect(canonical.content).toEqual([
        { type: 'tool_use', id: 'call_9', name: 'lookup', input: { a: 1, b: [true, null] } },
      ]);
      expect(canonical.stop_reason).toBe('tool_use');
      expect(canonical.usage).toEqual({ input_tokens: 20, output_tokens: 10, cache_read_input_tokens: 8 });
    });

    test('leaves usage absent when the provider reports none', () => {
      const { usage: _usage, ...withoutUsage } = mockOpenAIResponse;

      const canonical = openaiResponseToCanonical(withoutUsage);
      expect(canonical).not.toHaveProperty('usage');
      expect(canonicalResponseToOpenAI(canonical, { created: () => 1700000000 })).not.toHaveProperty('usage');
    });

    test('rejects partial usage', () => {
      expectConversionError(
        () => openaiResponseToCanonical({ ...mockOpenAIResponse, usage: { total_tokens: 16 } }),
        'MalformedInput'
      );
    });

    test('passes unknown finish reasons through', () => {
      const response = {
        ...mockOpenAIResponse,
        choices: [{ ...mockOpenAIResponse.choices[0], finish_reason: 'content_filter' }],
      };
      expect(openaiResponseToCanonical(response).stop_reason).toBe('content_filter');
    });

    test('keeps refusals as text', () => {
      const response = {
        ...mockOpenAIResponse,
        choices: [{ index: 0, message: { role: 'assistant', content: null, refusal: 'I cannot help.' }, finish_reason: 'stop' }],
      };
      expect(openaiResponseToCanonical(response).content).toEqual([{ type: 'text', text: 'I cannot help.' }]);
    });

    test('rejects malformed responses', () => {
      expectConversionError(() => openaiResponseToCanonical({ ...mockOpenAIResponse, choices: [] }), 'MalformedInput', 'choices');
      expectConversionError(() => openaiResponseToCanonical({ id: 'x' }), 'MalformedInput');

      const invalidArgs = {
        ...mockOpenAIToolResponse,
        choices: [{
          index: 0,
          message: {
            role: 'assistant',
            content: null,
            tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'lookup', arguments: '{invalid json' } }],
          },
          finish_reason: 'tool_calls',
        }],
      };
      expectConversionError(
        () => openaiResponseToCanonical(invalidArgs),
        'MalformedInput',
        'choices[0].message.tool_calls[0].function.arguments'
      );
    });
  });

  describe('canonicalToClient', () => {
    test('transforms canonical response to OpenAI format', () => {
      const client = createOpenAIAdapter({ created: () => 42 }).canonicalToClient(mockCanonicalResponse);

      expect(client).toEqual({
        id: 'msg_01',
        object: 'chat.completion',
        created: 42,
        model: 'claude-sonnet-4-5',
        choices: [{
          index: 0,
          message: { role: 'assistant', content: 'Hi there.' },
          finish_reason: 'stop',
          logprobs: null,
        }],
        usage: { prompt_tokens: 10, completion_tokens: 3, total_tokens: 13 },
      });
    });

    test('emits tool calls and optional reasoning', () => {
      const response: ChatResponse = {
        ...mockCanonicalResponse,
        content: [
          { type: 'thinking', thinking: 'hmm', signature: 'sig' },
          { type: 'tool_use', id: 'tu_1', name: 'lookup', input: { a: 1, b: [true, null] } },
        ],
        stop_reason: 'tool_use',
      };

      const plain = canonicalResponseToOpenAI(response, { created: () => 1 });
      expect(plain.choices[0].message).toEqual({
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'tu_1', type: 'function', function: { name: 'lookup', arguments: '{"a":1,"b":[true,null]}' } }],
      });
      expect(plain.choices[0].finish_reason).toBe('tool_calls');

      const withReasoning = canonicalResponseToOpenAI(response, { created: () => 1, includeReasoning: true });
      expect(withReasoning.choices[0].message.reasoning_content).toBe('hmm');
    });

    test('maps stop_sequence to stop and keeps unknown reasons', () => {
      expect(canonicalResponseToOpenAI({ ...mockCanonicalResponse, stop_reason: 'stop_sequence' }).choices[0].finish_reason)
        .toBe('stop');
      expect(canonicalResponseToOpenAI({ ...mockCanonicalResponse, stop_reason: 'refusal' }).choices[0].finish_reason)
        .toBe('refusal');
    });

    test('maps usage detail fields', () => {
      expect(toOpenAIUsage({ input_tokens: 5, output_tokens: 7, cache_read_input_tokens: 2, thinking_tokens: 3 })).toEqual({
        prompt_tokens: 5,
        completion_tokens: 7,
        total_tokens: 12,
        prompt_tokens_details: { cached_tokens: 2 },
        completion_tokens_details: { reasoning_tokens: 3 },
      });
    });
  });
});
