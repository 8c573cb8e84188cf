export * from './@log/index.js';
export * from './@utils/index.js';
export * from './address/index.js';
export * from './config.js';
export * from './errors.js';
export * from './run.js';
export * from './update/index.js';
export * from './x.js';
