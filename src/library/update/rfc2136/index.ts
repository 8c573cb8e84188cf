export * from './constants.js';
export * from './message.js';
export * from './rfc2136-updater.js';
export * from './transport.js';
export * from './tsig.js';
