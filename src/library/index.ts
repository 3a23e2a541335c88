export * from './@log/index.js';
export * from './config.js';
export * from './ddns/index.js';
export * from './errors.js';
export * from './setup.js';
export * from './x.js';
