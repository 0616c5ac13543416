export * from './reading-level.js';
