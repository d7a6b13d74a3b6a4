import type { EntityKind, EntityKinds, EntityStore } from '../../core/ports';

type Collections = { [K in EntityKind]: EntityKinds[K][] };

// Keeps saved collections in memory; used by tests and --dry-run
export class InMemoryEntityStore implements EntityStore {
  private readonly collections: Collections;

  constructor(seed: Partial<Collections> = {}) {
    this.collections = {
      projects: seed.projects ?? [],
      applicants: seed.applicants ?? [],
      officers: seed.officers ?? [],
      managers: seed.managers ?? [],
      requests: seed.requests ?? [],
    };
  }

  loadAll<K extends EntityKind>(kind: K): EntityKinds[K][] {
    const items: EntityKinds[K][] = this.collections[kind];
    return [...items];
  }

  saveAll<K extends EntityKind>(kind: K, items: EntityKinds[K][]): void {
    const collections: { [P in K]: EntityKinds[P][] } = this.collections;
    collections[kind] = [...items];
  }
}
