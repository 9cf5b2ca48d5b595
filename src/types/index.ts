// Identity types
export * from './identity.js';

// Token types
export * from './token.js';

// Hono context types
export * from './hono.js';
