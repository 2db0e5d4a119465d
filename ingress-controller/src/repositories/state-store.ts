import type { RelationPayload } from '../types/ingress';

export interface StateStore {
  load(): Promise<RelationPayload>;
  save(payload: RelationPayload): Promise<void>;
}

/**
 * Last validated ingress relation payload. Reads are served from memory; every `set` replaces the
 * whole payload and writes it through to the store before the in-memory copy changes.
 */
export class RelationCache {
  private readonly store: StateStore;
  private payload: RelationPayload;

  private constructor(store: StateStore, payload: RelationPayload) {
    this.store = store;
    this.payload = payload;
  }

  static async open(store: StateStore): Promise<RelationCache> {
    const payload = await store.load();
    return new RelationCache(store, payload);
  }

  get(): RelationPayload {
    return { ...this.payload };
  }

  async set(payload: RelationPayload): Promise<void> {
    const next = { ...payload };
    await this.store.save(next);
    this.payload = next;
  }
}
