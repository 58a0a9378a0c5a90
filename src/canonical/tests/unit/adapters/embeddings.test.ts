/**
 * Embeddings conversion tests
 */

import { describe, test, expect } from 'vitest';
import {
  canonicalEmbeddingRequestToOpenAI,
  canonicalEmbeddingResponseToOpenAI,
  openaiEmbeddingAdapter,
  openaiEmbeddingRequestToCanonical,
  openaiEmbeddingResponseToCanonical,
} from '../../../adapters/openai/embeddings.js';
import { expectConversionError } from '../../helpers/test-utils.js';

describe('OpenAI embeddings conversion', () => {
  describe('requests', () => {
    test('converts client requests to canonical', () => {
      expect(openaiEmbeddingRequestToCanonical({ model: 'text-embedding-3-small', input: ['a', 'b'], dimensions: 256 }))
        .toEqual({ model: 'text-embedding-3-small', input: ['a', 'b'], dimensions: 256 });
    });

    test('requests float vectors from the provider', () => {
      expect(canonicalEmbeddingRequestToOpenAI({ model: 'text-embedding-3-small', input: 'hello' })).toEqual({
        model: 'text-embedding-3-small',
        input: 'hello',
        encoding_format: 'float',
      });
    });

    test('rejects base64 encoding and empty input', () => {
      expectConversionError(
        () => openaiEmbeddingRequestToCanonical({ model: 'm', input: 'x', encoding_format: 'base64' }),
        'UnsupportedConstruct',
        'encoding_format'
      );
      expectConversionError(() => canonicalEmbeddingRequestToOpenAI({ model: 'm', input: [] }), 'SchemaViolation', 'input');
    });
  });

  describe('responses', () => {
    const response = {
      object: 'list',
      model: 'text-embedding-3-small',
      data: [
        { object: 'embedding', index: 1, embedding: [0.3, 0.4] },
        { object: 'embedding', index: 0, embedding: [0.1, 0.2] },
      ],
      usage: { prompt_tokens: 6, total_tokens: 6 },
    };

    test('orders vectors by index', () => {
      expect(openaiEmbeddingAdapter.providerToCanonical(response, 2)).toEqual({
        model: 'text-embedding-3-small',
        vectors: [[0.1, 0.2], [0.3, 0.4]],
        usage: { input_tokens: 6 },
      });
    });

    test('rejects count mismatches and gaps', () => {
      expectConversionError(() => openaiEmbeddingResponseToCanonical(response, 3), 'MalformedInput', 'data');
      expectConversionError(
        () => openaiEmbeddingResponseToCanonical({ ...response, data: [{ index: 2, embedding: [1] }] }),
        'MalformedInput',
        'data'
      );
      expectConversionError(() => openaiEmbeddingResponseToCanonical({ model: 'm' }), 'MalformedInput');
    });

    test('converts canonical responses to the client shape', () => {
      expect(canonicalEmbeddingResponseToOpenAI({ model: 'm', vectors: [[1, 2]], usage: { input_tokens: 3 } })).toEqual({
        object: 'list',
        model: 'm',
        data: [{ object: 'embedding', index: 0, embedding: [1, 2] }],
        usage: { prompt_tokens: 3, total_tokens: 3 },
      });
    });
  });
});
