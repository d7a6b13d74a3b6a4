/**
 * Consolidated port interfaces for the allocation engine.
 * Organized into logical groupings to reduce complexity.
 */

import type { Project } from './domain/entities/Project';
import type { Applicant, Manager, Officer, UserRole } from './domain/entities/User';
import type { Request } from './domain/entities/Request';
import type { IsoDate } from './domain/entities/Project';

// ==================== Session ====================

/**
 * Who is acting, in which capacity, and on which calendar day.
 * Passed into every workflow call; there is no ambient "current user".
 */
export interface SessionContext {
  userID: string;
  role: UserRole;
  today: IsoDate;
}

// ==================== Configuration ====================

export interface EligibilityRules {
  marriedMinAge: number;
  singleMinAge: number;
}

export interface IdFormat {
  projectPrefix: string;
  requestPrefix: string;
  width: number;
}

/**
 * Synchronous configuration service.
 * No async needed - config is loaded at startup and doesn't change.
 */
export interface Config {
  eligibility(): EligibilityRules;
  idFormat(): IdFormat;
  dataFiles(): Record<EntityKind, string>;
}

// ==================== Persistence ====================

export interface EntityKinds {
  projects: Project;
  applicants: Applicant;
  officers: Officer;
  managers: Manager;
  requests: Request;
}

export type EntityKind = keyof EntityKinds;

export const ENTITY_KINDS: readonly EntityKind[] = ['projects', 'applicants', 'officers', 'managers', 'requests'];

/**
 * Storage collaborator. Synchronous: the engine never suspends mid-operation.
 * Implementations throw AllocationError on I/O failure.
 */
export interface EntityStore {
  loadAll<K extends EntityKind>(kind: K): EntityKinds[K][];
  saveAll<K extends EntityKind>(kind: K, items: EntityKinds[K][]): void;
}

/**
 * Id collaborator. Only uniqueness matters to the engine.
 */
export interface IdGenerator {
  nextProjectID(): string;
  nextRequestID(): string;
}

// ==================== Logging ====================

/**
 * Logger abstraction for infrastructure-independent logging.
 */
export interface Logger {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}
