export * from './bytes.js';
export * from './final-address.js';
export * from './interface-resolver.js';
export * from './partial-address.js';
