import type { TokenStore } from './TokenStore.js';
import type { CachedToken } from './tokenTypes.js';

export interface InMemoryTokenStoreOptions {
  maxEntries: number;
}

export class InMemoryTokenStore implements TokenStore {
  private tokens: Map<string, CachedToken> = new Map();
  private readonly maxEntries: number;

  constructor(options: InMemoryTokenStoreOptions) {
    if (options.maxEntries < 1) {
      throw new RangeError('maxEntries must be at least 1');
    }
    this.maxEntries = options.maxEntries;
  }

  get(key: string): CachedToken | undefined {
    return this.tokens.get(key);
  }

  /**
   * Last writer wins. Re-writing a key moves it to the back of the eviction order;
   * when full, the oldest-written entry is dropped.
   */
  set(key: string, token: CachedToken): void {
    this.tokens.delete(key);

    if (this.tokens.size >= this.maxEntries) {
      const oldestKey = this.tokens.keys().next().value;
      if (oldestKey !== undefined) {
        this.tokens.delete(oldestKey);
      }
    }

    this.tokens.set(key, token);
  }

  get size(): number {
    return this.tokens.size;
  }
}
