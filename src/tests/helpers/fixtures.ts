import { vi, type Mock } from 'vitest';
import type { EntityStore, IdGenerator, Logger, SessionContext } from '../../core/ports';
import type { FlatType, Project } from '../../core/domain/entities/Project';
import type { Applicant, Manager, Officer } from '../../core/domain/entities/User';
import { EntityGraph, type GraphSeed } from '../../core/domain/EntityGraph';
import { SequentialIdGenerator } from '../../infra/ids/SequentialIdGenerator';

// Inside the default project window (2025-02-15 .. 2025-03-20)
export const TODAY = '2025-03-01';

export type MockedLogger = {
  [K in keyof Logger]: Mock;
};

export type MockedEntityStore = {
  [K in keyof EntityStore]: Mock;
};

export function createMockLogger(): MockedLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createMockStore(): MockedEntityStore {
  return {
    loadAll: vi.fn().mockReturnValue([]),
    saveAll: vi.fn(),
  };
}

export function createIds(): IdGenerator {
  return new SequentialIdGenerator({ projectPrefix: 'P', requestPrefix: 'R', width: 4 });
}

export function flats(two: number, three: number): Map<FlatType, number> {
  return new Map<FlatType, number>([
    ['TWO_ROOM', two],
    ['THREE_ROOM', three],
  ]);
}

export function createProject(overrides: Partial<Project> = {}): Project {
  return {
    projectID: 'P1',
    name: 'Acacia Breeze',
    neighborhoods: new Set(['Yishun']),
    units: flats(2, 3),
    price: flats(350000, 450000),
    openDate: '2025-02-15',
    closeDate: '2025-03-20',
    managerID: 'M1',
    officerSlotsRemaining: 2,
    assignedOfficerIDs: new Set(),
    bookedApplicantIDs: new Set(),
    visible: true,
    ...overrides,
  };
}

export function createApplicant(overrides: Partial<Applicant> = {}): Applicant {
  return {
    userID: 'A1',
    name: 'John Tan',
    age: 40,
    maritalStatus: 'SINGLE',
    activeProjectID: null,
    applicationStatusByProject: new Map(),
    appliedFlatByProject: new Map(),
    ...overrides,
  };
}

export function createOfficer(overrides: Partial<Officer> = {}): Officer {
  const userID = overrides.userID ?? 'O1';
  return {
    userID,
    applicantID: userID,
    registeredProjectIDs: new Set(),
    registrationStatusByProject: new Map(),
    ...overrides,
  };
}

export function createManager(overrides: Partial<Manager> = {}): Manager {
  return {
    userID: 'M1',
    name: 'Michael Lee',
    projectIDs: new Set(['P1']),
    ...overrides,
  };
}

// Officer already approved and assigned to the project
export function assignOfficer(officer: Officer, project: Project): void {
  officer.registeredProjectIDs.add(project.projectID);
  officer.registrationStatusByProject.set(project.projectID, 'APPROVED');
  project.assignedOfficerIDs.add(officer.userID);
}

export function createGraph(seed: GraphSeed = {}): EntityGraph {
  return new EntityGraph(seed);
}

export function session(userID: string, role: SessionContext['role'], today = TODAY): SessionContext {
  return { userID, role, today };
}
