import { describe, it, expect, beforeEach } from 'vitest';
import type { EntityStore, Logger } from '../../core/ports';
import type { EntityGraph } from '../../core/domain/EntityGraph';
import type { Project } from '../../core/domain/entities/Project';
import { createServices } from '../../core/application/services';
import { AllocationOrchestrator } from '../../core/application/orchestrator/AllocationOrchestrator';
import {
  assignOfficer,
  createApplicant,
  createGraph,
  createIds,
  createManager,
  createMockLogger,
  createMockStore,
  createOfficer,
  createProject,
  flats,
  session,
  type MockedEntityStore,
  type MockedLogger,
} from '../helpers/fixtures';

describe('AllocationOrchestrator', () => {
  let graph: EntityGraph;
  let acacia: Project;
  let store: MockedEntityStore;
  let logger: MockedLogger;
  let orchestrator: AllocationOrchestrator;

  const applicant = session('A2', 'APPLICANT');
  const single = session('A1', 'APPLICANT');
  const officer = session('O1', 'OFFICER');
  const manager = session('M1', 'MANAGER');
  const otherManager = session('M2', 'MANAGER');

  beforeEach(() => {
    acacia = createProject();
    const maple = createProject({
      projectID: 'P2',
      name: 'Maple Heights',
      managerID: 'M2',
      units: flats(4, 5),
      openDate: '2025-02-01',
      closeDate: '2025-04-01',
    });
    const o1 = createOfficer();
    assignOfficer(o1, acacia);

    graph = createGraph({
      projects: [acacia, maple],
      applicants: [
        createApplicant(),
        createApplicant({ userID: 'A2', name: 'Sarah Lim', age: 30, maritalStatus: 'MARRIED' }),
        createApplicant({ userID: 'O1', name: 'Daniel Koh', age: 36 }),
      ],
      officers: [o1, createOfficer({ userID: 'O2' })],
      managers: [createManager(), createManager({ userID: 'M2', name: 'Emily Ong', projectIDs: new Set(['P2']) })],
    });
    store = createMockStore();
    logger = createMockLogger();
    orchestrator = new AllocationOrchestrator(
      graph,
      createServices(graph, createIds()),
      store as unknown as EntityStore,
      logger as unknown as Logger,
    );
  });

  const savedKinds = (): unknown[] => store.saveAll.mock.calls.map(([kind]) => kind);

  function submitted(): string {
    const result = orchestrator.submitApplication(applicant, 'P1', 'THREE_ROOM');
    if (!result.ok) throw new Error(result.error.message);
    return result.value.requestID;
  }

  describe('session', () => {
    it('resolves the strongest role a user holds', () => {
      expect(orchestrator.session('M1', '2025-03-01')).toEqual({
        ok: true,
        value: { userID: 'M1', role: 'MANAGER', today: '2025-03-01' },
      });
      const o1 = orchestrator.session('O1', '2025-03-01');
      expect(o1.ok && o1.value.role).toBe('OFFICER');
      const a1 = orchestrator.session('A1', '2025-03-01');
      expect(a1.ok && a1.value.role).toBe('APPLICANT');
    });

    it('rejects unknown users', () => {
      const result = orchestrator.session('X9', '2025-03-01');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('UserNotFound');
    });
  });

  describe('applications', () => {
    it('applies, approves and books a flat end to end', () => {
      const requestID = submitted();

      const decided = orchestrator.decideApplication(manager, requestID, 'SUCCESSFUL');
      expect(decided.ok && decided.value.status).toBe('SUCCESSFUL');

      const booked = orchestrator.bookFlat(officer, 'A2');
      expect(booked).toEqual({
        ok: true,
        value: { applicantID: 'A2', projectID: 'P1', flatType: 'THREE_ROOM', unitsRemaining: 2 },
      });
      expect(acacia.units.get('THREE_ROOM')).toBe(2);
      expect(acacia.bookedApplicantIDs.has('A2')).toBe(true);
      expect(graph.applicants.get('A2')?.applicationStatusByProject.get('P1')).toBe('BOOKED');
    });

    it('saves the touched collections and logs the commit', () => {
      submitted();

      expect(savedKinds()).toEqual(['applicants', 'requests']);
      expect(logger.info).toHaveBeenCalledWith(
        { operation: 'submitApplication', userID: 'A2', role: 'APPLICANT', saved: ['applicants', 'requests'] },
        'submitApplication committed',
      );
    });

    it('saves nothing and warns when a rule refuses the operation', () => {
      const result = orchestrator.submitApplication(single, 'P1', 'THREE_ROOM');

      expect(result.ok).toBe(false);
      expect(store.saveAll).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        { operation: 'submitApplication', userID: 'A1', role: 'APPLICANT', kind: 'IneligibleOperation', code: 'NotEligible' },
        'Applicant A1 is not eligible for THREE_ROOM in P1',
      );
    });

    it('lets officers apply through their applicant profile elsewhere', () => {
      const own = orchestrator.submitApplication(officer, 'P1', 'TWO_ROOM');
      expect(own.ok).toBe(false);
      if (!own.ok) expect(own.error.code).toBe('NotEligible');

      const elsewhere = orchestrator.submitApplication(officer, 'P2', 'TWO_ROOM');
      expect(elsewhere.ok && elsewhere.value.userID).toBe('O1');
    });

    it('keeps managers out of applicant operations', () => {
      const result = orchestrator.submitApplication(manager, 'P1', 'TWO_ROOM');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('Forbidden');
    });
  });

  describe('withdrawals', () => {
    it('returns a booked unit once the withdrawal is approved', () => {
      orchestrator.decideApplication(manager, submitted(), 'SUCCESSFUL');
      orchestrator.bookFlat(officer, 'A2');

      const withdrawal = orchestrator.withdrawApplication(applicant, 'P1');
      if (!withdrawal.ok) throw new Error(withdrawal.error.message);
      expect(acacia.units.get('THREE_ROOM')).toBe(2);

      const approved = orchestrator.decideWithdrawal(manager, withdrawal.value.requestID, 'SUCCESSFUL');

      expect(approved.ok && approved.value.released).toEqual({ projectID: 'P1', flatType: 'THREE_ROOM', remaining: 3 });
      expect(acacia.bookedApplicantIDs.has('A2')).toBe(false);
      expect(graph.applicants.get('A2')?.applicationStatusByProject.get('P1')).toBe('UNSUCCESSFUL');
    });

    it('warns when a withdrawal is rejected', () => {
      submitted();
      const withdrawal = orchestrator.withdrawApplication(applicant, 'P1');
      if (!withdrawal.ok) throw new Error(withdrawal.error.message);

      orchestrator.decideWithdrawal(manager, withdrawal.value.requestID, 'UNSUCCESSFUL');

      expect(logger.warn).toHaveBeenCalledWith(
        { operation: 'decideWithdrawal', requestID: withdrawal.value.requestID, applicantID: 'A2', projectID: 'P1' },
        'Withdrawal rejected; applicant stays unlinked from the project',
      );
      expect(graph.applicants.get('A2')?.activeProjectID).toBeNull();
    });
  });

  describe('registrations', () => {
    it('assigns an approved officer and takes a slot', () => {
      const registered = orchestrator.registerOfficer(session('O2', 'OFFICER'), 'P1');
      if (!registered.ok) throw new Error(registered.error.message);
      expect(savedKinds()).toEqual(['officers', 'requests']);

      const decided = orchestrator.decideRegistration(manager, registered.value.requestID, 'SUCCESSFUL');

      expect(decided.ok && decided.value).toMatchObject({ status: 'APPROVED', assigned: true, slotsRemaining: 1 });
      expect(acacia.assignedOfficerIDs.has('O2')).toBe(true);
    });
  });

  describe('request decisions', () => {
    it('dispatches on the request type', () => {
      const requestID = submitted();

      const result = orchestrator.decideRequest(manager, requestID, 'UNSUCCESSFUL');

      expect(result.ok && result.value.type).toBe('BTO_APPLICATION');
      expect(graph.applicants.get('A2')?.activeProjectID).toBeNull();
    });

    it('refuses to decide enquiries', () => {
      const enquiry = orchestrator.submitEnquiry(single, 'P1', 'Is there parking?');
      if (!enquiry.ok) throw new Error(enquiry.error.message);

      const result = orchestrator.decideRequest(manager, enquiry.value.requestID, 'SUCCESSFUL');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('WrongRequestType');
    });

    it('only lets the managing manager decide', () => {
      const requestID = submitted();

      const result = orchestrator.decideApplication(otherManager, requestID, 'SUCCESSFUL');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('Forbidden');
      expect(graph.requests.get(requestID)).toMatchObject({ approval: 'PENDING' });
    });

    it('lists pending requests on the manager projects only', () => {
      const requestID = submitted();
      orchestrator.submitApplication(officer, 'P2', 'TWO_ROOM');

      const mine = orchestrator.pendingRequests(manager);
      expect(mine.ok && mine.value.map((r) => r.requestID)).toEqual([requestID]);
      const none = orchestrator.pendingRequests(manager, 'REGISTRATION');
      expect(none.ok && none.value).toEqual([]);
    });
  });

  describe('projects', () => {
    it('refuses edits from a manager who does not own the project', () => {
      const result = orchestrator.editProject(otherManager, 'P1', { name: 'Renamed' });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('Forbidden');
      expect(acacia.name).toBe('Acacia Breeze');
    });

    it('toggles visibility for the owner', () => {
      const result = orchestrator.toggleVisibility(manager, 'P1');

      expect(result.ok && result.value.visible).toBe(false);
      expect(savedKinds()).toEqual(['projects']);
    });

    it('saves every collection after a delete', () => {
      submitted();
      store.saveAll.mockClear();

      const result = orchestrator.deleteProject(manager, 'P1');

      expect(result.ok).toBe(true);
      expect(savedKinds()).toEqual(['projects', 'applicants', 'officers', 'managers', 'requests']);
      expect(graph.projects.has('P1')).toBe(false);
    });
  });

  describe('reports', () => {
    it('keeps applicants away from staff views', () => {
      const result = orchestrator.applicantsOnProject(single, 'P1');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('Forbidden');
    });

    it('issues receipts to the assigned officer', () => {
      orchestrator.decideApplication(manager, submitted(), 'SUCCESSFUL');
      orchestrator.bookFlat(officer, 'A2');

      const receipts = orchestrator.bookingReceipts(officer);

      expect(receipts.ok && receipts.value.map((r) => [r.applicant.userID, r.flatType, r.price])).toEqual([
        ['A2', 'THREE_ROOM', 450000],
      ]);
    });
  });
});
