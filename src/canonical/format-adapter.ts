import type { ChatRequest, ChatResponse, EmbeddingRequest, EmbeddingResponse } from './types/index.js';

/**
 * Format Types - API communication formats
 */
export type FormatType = 'anthropic' | 'openai';

/**
 * Format Adapter - converts between client/provider formats and canonical
 */
export interface FormatAdapter<ClientReq, ClientRes, ProviderReq, ProviderRes = unknown> {
  readonly formatType: FormatType;

  // Client ↔ Canonical
  clientToCanonical(clientRequest: ClientReq): ChatRequest;
  canonicalToClient(canonical: ChatResponse): ClientRes;

  // Canonical ↔ Provider
  canonicalToProvider(canonical: ChatRequest): ProviderReq;
  providerToCanonical(providerResponse: ProviderRes): ChatResponse;
}

/**
 * Same four directions for the embeddings endpoint
 */
export interface EmbeddingFormatAdapter<ClientReq, ClientRes, ProviderReq, ProviderRes = unknown> {
  clientToCanonical(clientRequest: ClientReq): EmbeddingRequest;
  canonicalToClient(canonical: EmbeddingResponse): ClientRes;
  canonicalToProvider(canonical: EmbeddingRequest): ProviderReq;
  providerToCanonical(providerResponse: ProviderRes, expectedCount?: number): EmbeddingResponse;
}
