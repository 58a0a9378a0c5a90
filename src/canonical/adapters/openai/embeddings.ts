import type { EmbeddingFormatAdapter } from '../../format-adapter.js';
import type { EmbeddingRequest, EmbeddingResponse } from '../../types/index.js';
import canonicalValidator from '../../validation/canonical-validator.js';
import { ConversionError } from '../../../shared/errors/index.js';

export interface OpenAIEmbeddingRequest {
  model: string;
  input: string | string[];
  encoding_format?: 'float' | 'base64';
  dimensions?: number;
  user?: string;
}

export interface OpenAIEmbeddingResponse {
  object?: 'list';
  model: string;
  data: Array<{ object?: 'embedding'; index: number; embedding: number[] }>;
  usage?: { prompt_tokens?: number; total_tokens?: number };
}

export function inputCount(input: string | string[]): number {
  return typeof input === 'string' ? 1 : input.length;
}

export function openaiEmbeddingRequestToCanonical(request: OpenAIEmbeddingRequest): EmbeddingRequest {
  if (request.encoding_format === 'base64') {
    throw new ConversionError('UnsupportedConstruct', 'Only float embeddings are supported', {
      path: 'encoding_format',
    });
  }
  if (Array.isArray(request.input) && request.input.length === 0) {
    throw new ConversionError('SchemaViolation', 'Embedding input is empty', { path: 'input' });
  }
  return {
    model: request.model,
    input: request.input,
    ...(request.dimensions !== undefined && { dimensions: request.dimensions }),
  };
}

export function canonicalEmbeddingRequestToOpenAI(request: EmbeddingRequest): OpenAIEmbeddingRequest {
  if (Array.isArray(request.input) && request.input.length === 0) {
    throw new ConversionError('SchemaViolation', 'Embedding input is empty', { path: 'input' });
  }
  return {
    model: request.model,
    input: request.input,
    encoding_format: 'float',
    ...(request.dimensions !== undefined && { dimensions: request.dimensions }),
  };
}

/**
 * Vectors are returned in input order regardless of the order of `data`.
 * With `expectedCount`, a response with a different number of vectors is rejected.
 */
export function openaiEmbeddingResponseToCanonical(raw: unknown, expectedCount?: number): EmbeddingResponse {
  const result = canonicalValidator.validateOpenAIEmbeddingResponse(raw);
  if (!result.valid || !result.data) {
    throw new ConversionError('MalformedInput', 'Embedding response is malformed', { errors: result.errors });
  }
  const response = result.data;

  if (expectedCount !== undefined && response.data.length !== expectedCount) {
    throw new ConversionError(
      'MalformedInput',
      `Expected ${expectedCount} embeddings, received ${response.data.length}`,
      { path: 'data' }
    );
  }

  const sorted = [...response.data].sort((a, b) => a.index - b.index);
  sorted.forEach((item, position) => {
    if (item.index !== position) {
      throw new ConversionError('MalformedInput', 'Embedding indices are not a contiguous sequence', {
        path: 'data',
        index: item.index,
      });
    }
  });

  const promptTokens = response.usage?.prompt_tokens;
  return {
    model: response.model,
    vectors: sorted.map(item => item.embedding),
    ...(promptTokens !== undefined && { usage: { input_tokens: promptTokens } }),
  };
}

export function canonicalEmbeddingResponseToOpenAI(response: EmbeddingResponse): OpenAIEmbeddingResponse {
  const tokens = response.usage?.input_tokens;
  return {
    object: 'list',
    model: response.model,
    data: response.vectors.map((embedding, index) => ({ object: 'embedding', index, embedding })),
    ...(tokens !== undefined && { usage: { prompt_tokens: tokens, total_tokens: tokens } }),
  };
}

export const openaiEmbeddingAdapter: EmbeddingFormatAdapter<
  OpenAIEmbeddingRequest,
  OpenAIEmbeddingResponse,
  OpenAIEmbeddingRequest
> = {
  clientToCanonical: openaiEmbeddingRequestToCanonical,
  canonicalToClient: canonicalEmbeddingResponseToOpenAI,
  canonicalToProvider: canonicalEmbeddingRequestToOpenAI,
  providerToCanonical: openaiEmbeddingResponseToCanonical,
};
