export * from './hash.js';
export * from './random.js';
export * from './token-codec.js';
