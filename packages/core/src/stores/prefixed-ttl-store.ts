import type { TtlStore } from './ttl-store.js';

export interface PrefixedTtlStoreOptions {
  store: TtlStore;
  /** Prepended to every key that does not already carry a known prefix. */
  prefix: string;
  /** Prefixes passed through untouched. `prefix` itself is always included. */
  knownPrefixes?: ReadonlyArray<string>;
}

/**
 * Namespaces every key of a shared store.
 */
export class PrefixedTtlStore implements TtlStore {
  private readonly store: TtlStore;
  private readonly prefix: string;
  private readonly knownPrefixes: ReadonlyArray<string>;

  constructor({ store, prefix, knownPrefixes = [] }: PrefixedTtlStoreOptions) {
    this.store = store;
    this.prefix = prefix;
    this.knownPrefixes = [prefix, ...knownPrefixes];
  }

  prefixKey(key: string): string {
    if (this.knownPrefixes.some((known) => key.startsWith(known))) {
      return key;
    }
    return `${this.prefix}${key}`;
  }

  async get(key: string): Promise<number | undefined> {
    return this.store.get(this.prefixKey(key));
  }

  async set(key: string, value: number, ttlSeconds: number): Promise<void> {
    await this.store.set(this.prefixKey(key), value, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.store.delete(this.prefixKey(key));
  }
}
