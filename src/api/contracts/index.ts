export * from './error.js';
export * from './replace.js';
