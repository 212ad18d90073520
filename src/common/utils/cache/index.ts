export { type SimpleCacheOptions } from './cache.interfaces';
export { SimpleCacheImpl } from './simple-cache';
