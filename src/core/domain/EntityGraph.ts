import type { EntityKind, EntityKinds, EntityStore } from '../ports';
import { ENTITY_KINDS } from '../ports';
import type { Project } from './entities/Project';
import type { Applicant, Manager, Officer } from './entities/User';
import type { Request } from './entities/Request';

export type GraphSeed = Partial<{ [K in EntityKind]: EntityKinds[K][] }>;

// In-memory working set of every entity the engine touches during a session.
// Workflow components mutate it in place; the orchestrator writes it back.
export class EntityGraph {
  readonly projects = new Map<string, Project>();
  readonly applicants = new Map<string, Applicant>();
  readonly officers = new Map<string, Officer>();
  readonly managers = new Map<string, Manager>();
  readonly requests = new Map<string, Request>();

  constructor(seed: GraphSeed = {}) {
    seed.projects?.forEach((p) => this.projects.set(p.projectID, p));
    seed.applicants?.forEach((a) => this.applicants.set(a.userID, a));
    seed.officers?.forEach((o) => this.officers.set(o.userID, o));
    seed.managers?.forEach((m) => this.managers.set(m.userID, m));
    seed.requests?.forEach((r) => this.requests.set(r.requestID, r));
  }

  static load(store: EntityStore): EntityGraph {
    return new EntityGraph({
      projects: store.loadAll('projects'),
      applicants: store.loadAll('applicants'),
      officers: store.loadAll('officers'),
      managers: store.loadAll('managers'),
      requests: store.loadAll('requests'),
    });
  }

  // Insertion order is preserved so saved files stay stable between runs
  list<K extends EntityKind>(kind: K): EntityKinds[K][] {
    const collections: { [P in EntityKind]: Map<string, EntityKinds[P]> } = {
      projects: this.projects,
      applicants: this.applicants,
      officers: this.officers,
      managers: this.managers,
      requests: this.requests,
    };
    return [...collections[kind].values()];
  }

  persist(store: EntityStore, kinds: Iterable<EntityKind> = ENTITY_KINDS): void {
    for (const kind of new Set(kinds)) {
      store.saveAll(kind, this.list(kind));
    }
  }

  // Officers who apply for flats through this applicant profile
  officerIDsFor(applicantID: string): Set<string> {
    const ids = new Set<string>();
    this.officers.forEach((officer) => {
      if (officer.applicantID === applicantID) ids.add(officer.userID);
    });
    return ids;
  }

  requestsFor(userID: string, projectID: string): Request[] {
    return [...this.requests.values()].filter((r) => r.userID === userID && r.projectID === projectID);
  }
}
