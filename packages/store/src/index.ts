export * from './outbox.js';
export * from './pool.js';
