import type { RelationPayload, RelationRecord } from '../types/ingress';
import type { StateStore } from './state-store';

export class InMemoryStateStore implements StateStore {
  private payload: RelationPayload;

  constructor(initial: RelationPayload = {}) {
    this.payload = { ...initial };
  }

  async load(): Promise<RelationPayload> {
    return { ...this.payload };
  }

  async save(payload: RelationPayload): Promise<void> {
    this.payload = { ...payload };
  }
}

/**
 * Live relations as the event adapter last saw them, grouped by relation name in arrival order.
 */
export class InMemoryRelationRegistry {
  private relationsByName = new Map<string, RelationRecord[]>();

  upsert(relation: RelationRecord): RelationRecord {
    const relations = this.relationsByName.get(relation.name) || [];
    const index = relations.findIndex((current) => current.id === relation.id);
    const next: RelationRecord = { ...relation, data: { ...relation.data } };

    if (index >= 0) {
      relations[index] = next;
    } else {
      relations.push(next);
    }

    this.relationsByName.set(relation.name, relations);
    return next;
  }

  remove(name: string, id: number): boolean {
    const relations = this.relationsByName.get(name);
    if (!relations) {
      return false;
    }

    const remaining = relations.filter((relation) => relation.id !== id);
    if (remaining.length === 0) {
      this.relationsByName.delete(name);
    } else {
      this.relationsByName.set(name, remaining);
    }
    return remaining.length !== relations.length;
  }

  listByName(): Map<string, RelationRecord[]> {
    return new Map([...this.relationsByName.entries()].map(([name, relations]) => [name, [...relations]]));
  }
}
