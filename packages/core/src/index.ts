export * from './types/index.js';
export * from './interfaces/index.js';
