export interface EmbeddingRequest {
  model: string;
  input: string | string[];
  dimensions?: number;
}

export interface EmbeddingResponse {
  model: string;
  vectors: number[][];
  usage?: { input_tokens: number };
}
