import NodeCache = require('node-cache');

import type { SimpleCacheOptions } from './cache.interfaces';

export class SimpleCacheImpl<T> {
  private readonly cache: NodeCache;
  private readonly maxKeys: number | undefined;

  public constructor(options: SimpleCacheOptions) {
    this.maxKeys = options.maxKeys;
    this.cache = new NodeCache({
      stdTTL: options.ttlSec,
      checkperiod: options.checkperiod ?? 0,
      useClones: false,
    });
  }

  public get(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  public set(key: string, value: T): void {
    this.evictOldestAtCapacity(key);
    this.cache.set(key, value);
  }

  public del(key: string): void {
    this.cache.del(key);
  }

  private evictOldestAtCapacity(incomingKey: string): void {
    if (this.maxKeys === undefined || this.cache.has(incomingKey)) {
      return;
    }

    const storedKeys: string[] = this.cache.keys();

    while (storedKeys.length >= this.maxKeys) {
      const oldestKey: string | undefined = storedKeys.shift();

      if (oldestKey === undefined) {
        break;
      }

      this.cache.del(oldestKey);
    }
  }
}
