export * from './content.types.js';
export * from './request.types.js';
export * from './response.types.js';
export * from './embeddings.types.js';
export * from './thinking.types.js';
