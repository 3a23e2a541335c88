export * from './ddns.js';
export * from './public-address-resolver.js';
export * from './record-store.js';
