export * from './accounts.js';
export * from './amounts.js';
export * from './channel.js';
export * from './errors.js';
export * from './events.js';
export * from './ids.js';
export * from './ledger.js';
export * from './serial.js';
