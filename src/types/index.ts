// Central export for all type definitions

// Re-export configuration types
export * from '../config/types.js';

// Re-export canonical request/response types
export * from './canonical.js';

// Re-export OpenAI wire types
export * from './openai.js';

// Re-export provider types
export * from './provider.js';

// Re-export credential and token types
export * from './auth.js';
