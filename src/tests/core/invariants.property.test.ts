/**
 * Property tests over random operation sequences. Whatever order applicants,
 * officers and the manager act in, inventory and officer calendars stay consistent.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { EntityStore, Logger } from '../../core/ports';
import type { EntityGraph } from '../../core/domain/EntityGraph';
import type { FlatType } from '../../core/domain/entities/Project';
import type { ApprovedStatus } from '../../core/domain/entities/Request';
import { ACTIVE_REGISTRATION_STATES } from '../../core/domain/entities/User';
import { isDecidable } from '../../core/domain/entities/Request';
import { windowsOverlap } from '../../core/domain/rules/dates';
import { createServices } from '../../core/application/services';
import { AllocationOrchestrator } from '../../core/application/orchestrator/AllocationOrchestrator';
import { InMemoryEntityStore } from '../../infra/persistence/InMemoryEntityStore';
import {
  createApplicant,
  createGraph,
  createIds,
  createManager,
  createMockLogger,
  createOfficer,
  createProject,
  flats,
  session,
} from '../helpers/fixtures';

// =============================================================================
// WORLD
// =============================================================================

const APPLICANTS = ['A1', 'A2', 'A3', 'O1', 'O2'] as const;
const OFFICERS = ['O1', 'O2'] as const;
const PROJECTS = ['P1', 'P2', 'P3'] as const;

function world(): { graph: EntityGraph; orchestrator: AllocationOrchestrator } {
  const graph = createGraph({
    projects: [
      createProject({ projectID: 'P1', units: flats(1, 2), officerSlotsRemaining: 1 }),
      createProject({
        projectID: 'P2',
        name: 'Maple Heights',
        units: flats(2, 1),
        openDate: '2025-02-20',
        closeDate: '2025-04-30',
        officerSlotsRemaining: 1,
      }),
      createProject({
        projectID: 'P3',
        name: 'Cedar Court',
        units: flats(1, 1),
        openDate: '2025-06-01',
        closeDate: '2025-07-01',
      }),
    ],
    applicants: [
      createApplicant(),
      createApplicant({ userID: 'A2', name: 'Sarah Lim', age: 30, maritalStatus: 'MARRIED' }),
      createApplicant({ userID: 'A3', name: 'Ryan Goh', age: 24 }),
      createApplicant({ userID: 'O1', name: 'Daniel Koh', age: 36 }),
      createApplicant({ userID: 'O2', name: 'Emily Ong', age: 28, maritalStatus: 'MARRIED' }),
    ],
    officers: [createOfficer(), createOfficer({ userID: 'O2' })],
    managers: [createManager({ projectIDs: new Set(PROJECTS) })],
  });
  const logger: Logger = createMockLogger();
  const store: EntityStore = new InMemoryEntityStore();
  return { graph, orchestrator: new AllocationOrchestrator(graph, createServices(graph, createIds()), store, logger) };
}

// =============================================================================
// OPERATIONS
// =============================================================================

type Operation =
  | { op: 'apply'; user: string; projectID: string; flatType: FlatType }
  | { op: 'withdraw'; user: string; projectID: string }
  | { op: 'register'; officer: string; projectID: string }
  | { op: 'book'; officer: string; applicantID: string }
  | { op: 'decide'; pick: number; decision: ApprovedStatus };

const operationArb: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({
    op: fc.constant('apply' as const),
    user: fc.constantFrom(...APPLICANTS),
    projectID: fc.constantFrom(...PROJECTS),
    flatType: fc.constantFrom<FlatType>('TWO_ROOM', 'THREE_ROOM'),
  }),
  fc.record({
    op: fc.constant('withdraw' as const),
    user: fc.constantFrom(...APPLICANTS),
    projectID: fc.constantFrom(...PROJECTS),
  }),
  fc.record({
    op: fc.constant('register' as const),
    officer: fc.constantFrom(...OFFICERS),
    projectID: fc.constantFrom(...PROJECTS),
  }),
  fc.record({
    op: fc.constant('book' as const),
    officer: fc.constantFrom(...OFFICERS),
    applicantID: fc.constantFrom(...APPLICANTS),
  }),
  fc.record({
    op: fc.constant('decide' as const),
    pick: fc.nat(),
    decision: fc.constantFrom<ApprovedStatus>('PENDING', 'SUCCESSFUL', 'UNSUCCESSFUL'),
  }),
);

function run(graph: EntityGraph, orchestrator: AllocationOrchestrator, operation: Operation): void {
  const asUser = (userID: string) => session(userID, OFFICERS.some((o) => o === userID) ? 'OFFICER' : 'APPLICANT');
  switch (operation.op) {
    case 'apply':
      orchestrator.submitApplication(asUser(operation.user), operation.projectID, operation.flatType);
      return;
    case 'withdraw':
      orchestrator.withdrawApplication(asUser(operation.user), operation.projectID);
      return;
    case 'register':
      orchestrator.registerOfficer(session(operation.officer, 'OFFICER'), operation.projectID);
      return;
    case 'book':
      orchestrator.bookFlat(session(operation.officer, 'OFFICER'), operation.applicantID);
      return;
    case 'decide': {
      // Any request, decided or not, so re-decisions and stale requests are exercised too
      const decidable = [...graph.requests.values()].filter(isDecidable);
      const target = decidable[operation.pick % Math.max(decidable.length, 1)];
      if (target) {
        orchestrator.decideRequest(session('M1', 'MANAGER'), target.requestID, operation.decision);
      }
      return;
    }
  }
}

const totalUnits = (graph: EntityGraph, projectID: string): number => {
  const project = graph.projects.get(projectID);
  if (!project) return 0;
  return [...project.units.values()].reduce((sum, n) => sum + n, 0) + project.bookedApplicantIDs.size;
};

// =============================================================================
// PROPERTIES
// =============================================================================

describe('workflow invariants', () => {
  const sequences = fc.array(operationArb, { maxLength: 40 });

  it('unit counts and officer slots never go negative', () => {
    fc.assert(
      fc.property(sequences, (operations) => {
        const { graph, orchestrator } = world();
        for (const operation of operations) {
          run(graph, orchestrator, operation);
          for (const project of graph.projects.values()) {
            for (const count of project.units.values()) {
              expect(count).toBeGreaterThanOrEqual(0);
            }
            expect(project.officerSlotsRemaining).toBeGreaterThanOrEqual(0);
          }
        }
      }),
      { numRuns: 200 },
    );
  });

  it('conserves units: free units plus holders stays constant', () => {
    fc.assert(
      fc.property(sequences, (operations) => {
        const { graph, orchestrator } = world();
        const before = PROJECTS.map((id) => totalUnits(graph, id));
        operations.forEach((operation) => run(graph, orchestrator, operation));
        expect(PROJECTS.map((id) => totalUnits(graph, id))).toEqual(before);
      }),
      { numRuns: 200 },
    );
  });

  it('keeps officer slots and assignments in balance', () => {
    fc.assert(
      fc.property(sequences, (operations) => {
        const { graph, orchestrator } = world();
        const capacity = new Map([...graph.projects.values()].map((p) => [p.projectID, p.officerSlotsRemaining]));
        operations.forEach((operation) => run(graph, orchestrator, operation));
        for (const project of graph.projects.values()) {
          expect(project.officerSlotsRemaining + project.assignedOfficerIDs.size).toBe(capacity.get(project.projectID));
        }
      }),
      { numRuns: 200 },
    );
  });

  it('never lets an officer hold overlapping registrations', () => {
    fc.assert(
      fc.property(sequences, (operations) => {
        const { graph, orchestrator } = world();
        operations.forEach((operation) => run(graph, orchestrator, operation));
        for (const officer of graph.officers.values()) {
          const held = [...officer.registrationStatusByProject]
            .filter(([, status]) => ACTIVE_REGISTRATION_STATES.includes(status))
            .flatMap(([projectID]) => {
              const project = graph.projects.get(projectID);
              return project ? [project] : [];
            });
          held.forEach((a, i) => held.slice(i + 1).forEach((b) => expect(windowsOverlap(a, b)).toBe(false)));
        }
      }),
      { numRuns: 200 },
    );
  });

  it('keeps a booked applicant linked to the project holding the unit', () => {
    fc.assert(
      fc.property(sequences, (operations) => {
        const { graph, orchestrator } = world();
        operations.forEach((operation) => run(graph, orchestrator, operation));
        for (const applicant of graph.applicants.values()) {
          for (const [projectID, status] of applicant.applicationStatusByProject) {
            if (status !== 'BOOKED') continue;
            expect(applicant.activeProjectID).toBe(projectID);
            expect(graph.projects.get(projectID)?.bookedApplicantIDs.has(applicant.userID)).toBe(true);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});
