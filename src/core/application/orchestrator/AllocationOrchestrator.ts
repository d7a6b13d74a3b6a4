import type { EntityKind, EntityStore, Logger, SessionContext } from '../../ports';
import type { EntityGraph } from '../../domain/EntityGraph';
import type { FlatType, IsoDate, Project, ProjectParams, ProjectPatch } from '../../domain/entities/Project';
import type { Applicant, ApplicationStatus, Manager, Officer, UserRole } from '../../domain/entities/User';
import type {
  ApplicationRequest,
  ApprovedStatus,
  DecidableRequest,
  EnquiryRequest,
  RegistrationRequest,
  Request,
  RequestType,
  WithdrawalRequest,
} from '../../domain/entities/Request';
import { isDecidable } from '../../domain/entities/Request';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';
import type {
  AllocationServices,
  ApplicableProject,
  ApplicantReportCriteria,
  ApplicationDecision,
  Booking,
  BookingReceipt,
  DeletionReport,
  FilterCriteria,
  RegistrationDecision,
  WithdrawalDecision,
} from '../services';

export type RequestDecision =
  | { type: 'BTO_APPLICATION'; result: ApplicationDecision }
  | { type: 'BTO_WITHDRAWAL'; result: WithdrawalDecision }
  | { type: 'REGISTRATION'; result: RegistrationDecision };

const APPLYING_ROLES: readonly UserRole[] = ['APPLICANT', 'OFFICER'];
const STAFF_ROLES: readonly UserRole[] = ['OFFICER', 'MANAGER'];
const ALL_ROLES: readonly UserRole[] = ['APPLICANT', 'OFFICER', 'MANAGER'];

const DECISION_KINDS: Record<DecidableRequest['type'], readonly EntityKind[]> = {
  BTO_APPLICATION: ['projects', 'applicants', 'requests'],
  BTO_WITHDRAWAL: ['projects', 'applicants', 'requests'],
  REGISTRATION: ['projects', 'officers', 'requests'],
};

/**
 * Entry point for every workflow operation. Checks the acting role, runs one
 * component against the shared graph, then writes back the touched collections.
 * Nothing is saved when the component returns a failure.
 */
export class AllocationOrchestrator {
  constructor(
    private readonly graph: EntityGraph,
    private readonly services: AllocationServices,
    private readonly store: EntityStore,
    private readonly logger: Logger,
  ) {}

  /**
   * Resolves the strongest role a user holds. Managers win over officers,
   * officers over plain applicants.
   */
  session(userID: string, today: IsoDate): Outcome<SessionContext> {
    if (this.graph.managers.has(userID)) return succeed({ userID, role: 'MANAGER', today });
    if (this.graph.officers.has(userID)) return succeed({ userID, role: 'OFFICER', today });
    if (this.graph.applicants.has(userID)) return succeed({ userID, role: 'APPLICANT', today });
    return fail('UserNotFound', `User ${userID} not found`);
  }

  // ==================== Applications ====================

  submitApplication(session: SessionContext, projectID: string, flatType: FlatType): Outcome<ApplicationRequest> {
    return this.commit(session, 'submitApplication', ['applicants', 'requests'], () => {
      const allowed = this.allow(session, APPLYING_ROLES, 'submit applications');
      if (!allowed.ok) return allowed;
      const applicant = this.applicantOf(session);
      if (!applicant.ok) return applicant;
      const project = this.project(projectID);
      if (!project.ok) return project;
      return this.services.applications.submit(applicant.value, project.value, flatType, session.today);
    });
  }

  withdrawApplication(session: SessionContext, projectID: string): Outcome<WithdrawalRequest> {
    return this.commit(session, 'withdrawApplication', ['applicants', 'requests'], () => {
      const allowed = this.allow(session, APPLYING_ROLES, 'withdraw applications');
      if (!allowed.ok) return allowed;
      const applicant = this.applicantOf(session);
      if (!applicant.ok) return applicant;
      const project = this.project(projectID);
      if (!project.ok) return project;
      return this.services.withdrawals.withdraw(applicant.value, project.value);
    });
  }

  bookFlat(session: SessionContext, applicantID: string): Outcome<Booking> {
    return this.commit(session, 'bookFlat', ['projects', 'applicants'], () => {
      const officer = this.officerOf(session, 'book flats');
      if (!officer.ok) return officer;
      return this.services.booking.book(officer.value, applicantID);
    });
  }

  decideApplication(
    session: SessionContext,
    requestID: string,
    decision: ApprovedStatus,
  ): Outcome<ApplicationDecision> {
    return this.commit(session, 'decideApplication', DECISION_KINDS.BTO_APPLICATION, () => {
      const request = this.decidable(session, requestID, 'BTO_APPLICATION');
      if (!request.ok) return request;
      return this.services.applications.decide(request.value, decision);
    });
  }

  decideWithdrawal(session: SessionContext, requestID: string, decision: ApprovedStatus): Outcome<WithdrawalDecision> {
    const outcome = this.commit(session, 'decideWithdrawal', DECISION_KINDS.BTO_WITHDRAWAL, () => {
      const request = this.decidable(session, requestID, 'BTO_WITHDRAWAL');
      if (!request.ok) return request;
      return this.services.withdrawals.approveWithdrawal(request.value, decision);
    });
    if (outcome.ok && decision === 'UNSUCCESSFUL') {
      const { userID, projectID } = outcome.value.request;
      this.logger.warn(
        { operation: 'decideWithdrawal', requestID, applicantID: userID, projectID },
        'Withdrawal rejected; applicant stays unlinked from the project',
      );
    }
    return outcome;
  }

  // ==================== Officer registration ====================

  registerOfficer(session: SessionContext, projectID: string): Outcome<RegistrationRequest> {
    return this.commit(session, 'registerOfficer', ['officers', 'requests'], () => {
      const officer = this.officerOf(session, 'register for projects');
      if (!officer.ok) return officer;
      const project = this.project(projectID);
      if (!project.ok) return project;
      return this.services.registrations.register(officer.value, project.value);
    });
  }

  decideRegistration(
    session: SessionContext,
    requestID: string,
    decision: ApprovedStatus,
  ): Outcome<RegistrationDecision> {
    return this.commit(session, 'decideRegistration', DECISION_KINDS.REGISTRATION, () => {
      const request = this.decidable(session, requestID, 'REGISTRATION');
      if (!request.ok) return request;
      return this.services.registrations.decide(request.value, decision);
    });
  }

  decideRequest(session: SessionContext, requestID: string, decision: ApprovedStatus): Outcome<RequestDecision> {
    const request = this.graph.requests.get(requestID);
    if (!request) {
      return this.rejected(session, 'decideRequest', fail('RequestNotFound', `Request ${requestID} not found`));
    }

    switch (request.type) {
      case 'BTO_APPLICATION': {
        const result = this.decideApplication(session, requestID, decision);
        return result.ok ? succeed({ type: request.type, result: result.value }) : result;
      }
      case 'BTO_WITHDRAWAL': {
        const result = this.decideWithdrawal(session, requestID, decision);
        return result.ok ? succeed({ type: request.type, result: result.value }) : result;
      }
      case 'REGISTRATION': {
        const result = this.decideRegistration(session, requestID, decision);
        return result.ok ? succeed({ type: request.type, result: result.value }) : result;
      }
      case 'ENQUIRY':
        return this.rejected(
          session,
          'decideRequest',
          fail('WrongRequestType', `Request ${requestID} is an enquiry; answer it instead`),
        );
    }
  }

  // ==================== Projects ====================

  createProject(session: SessionContext, params: ProjectParams): Outcome<Project> {
    return this.commit(session, 'createProject', ['projects', 'managers'], () => {
      const manager = this.managerOf(session, 'create projects');
      if (!manager.ok) return manager;
      return this.services.projects.create(manager.value, params);
    });
  }

  editProject(session: SessionContext, projectID: string, patch: ProjectPatch): Outcome<Project> {
    return this.commit(session, 'editProject', ['projects'], () => {
      const owned = this.ownedProject(session, projectID, 'edit');
      if (!owned.ok) return owned;
      return this.services.projects.edit(projectID, patch);
    });
  }

  toggleVisibility(session: SessionContext, projectID: string): Outcome<Project> {
    return this.commit(session, 'toggleVisibility', ['projects'], () => {
      const owned = this.ownedProject(session, projectID, 'change visibility of');
      if (!owned.ok) return owned;
      return this.services.projects.toggleVisibility(projectID);
    });
  }

  deleteProject(session: SessionContext, projectID: string): Outcome<DeletionReport> {
    return this.commit(session, 'deleteProject', ['projects', 'applicants', 'officers', 'managers', 'requests'], () => {
      const owned = this.ownedProject(session, projectID, 'delete');
      if (!owned.ok) return owned;
      return this.services.projects.delete(projectID);
    });
  }

  // ==================== Enquiries ====================

  submitEnquiry(session: SessionContext, projectID: string, query: string): Outcome<EnquiryRequest> {
    return this.commit(session, 'submitEnquiry', ['requests'], () =>
      this.services.enquiries.submit(session.userID, projectID, query),
    );
  }

  editEnquiry(session: SessionContext, requestID: string, query: string): Outcome<EnquiryRequest> {
    return this.commit(session, 'editEnquiry', ['requests'], () =>
      this.services.enquiries.edit(session.userID, requestID, query),
    );
  }

  deleteEnquiry(session: SessionContext, requestID: string): Outcome<EnquiryRequest> {
    return this.commit(session, 'deleteEnquiry', ['requests'], () =>
      this.services.enquiries.delete(session.userID, requestID),
    );
  }

  answerEnquiry(session: SessionContext, requestID: string, answer: string): Outcome<EnquiryRequest> {
    return this.commit(session, 'answerEnquiry', ['requests'], () => {
      const allowed = this.allow(session, STAFF_ROLES, 'answer enquiries');
      if (!allowed.ok) return allowed;
      return this.services.enquiries.answer(session, requestID, answer);
    });
  }

  myEnquiries(session: SessionContext): Outcome<EnquiryRequest[]> {
    return this.read(session, 'myEnquiries', () => {
      const allowed = this.allow(session, ALL_ROLES, 'list enquiries');
      if (!allowed.ok) return allowed;
      return succeed(this.services.enquiries.listByUser(session.userID));
    });
  }

  // Enquiries the acting officer or manager is expected to answer
  handledEnquiries(session: SessionContext): Outcome<EnquiryRequest[]> {
    return this.read(session, 'handledEnquiries', () => {
      if (session.role === 'MANAGER') {
        const manager = this.managerOf(session, 'list handled enquiries');
        if (!manager.ok) return manager;
        return succeed(this.services.enquiries.listForProjects(manager.value.projectIDs));
      }
      const officer = this.officerOf(session, 'list handled enquiries');
      if (!officer.ok) return officer;
      return succeed(this.services.enquiries.listForProjects(officer.value.registeredProjectIDs));
    });
  }

  allEnquiries(session: SessionContext): Outcome<EnquiryRequest[]> {
    return this.read(session, 'allEnquiries', () => {
      const manager = this.managerOf(session, 'list all enquiries');
      if (!manager.ok) return manager;
      return succeed(this.services.enquiries.all());
    });
  }

  // ==================== Queries ====================

  allProjects(session: SessionContext, criteria?: FilterCriteria): Outcome<Project[]> {
    return this.read(session, 'allProjects', () => {
      const manager = this.managerOf(session, 'list every project');
      if (!manager.ok) return manager;
      return succeed(this.services.queries.all(criteria));
    });
  }

  applicableProjects(session: SessionContext, criteria?: FilterCriteria): Outcome<ApplicableProject[]> {
    return this.read(session, 'applicableProjects', () => {
      const allowed = this.allow(session, APPLYING_ROLES, 'list applicable projects');
      if (!allowed.ok) return allowed;
      const applicant = this.applicantOf(session);
      if (!applicant.ok) return applicant;
      return succeed(this.services.queries.applicableProjects(applicant.value, session.today, criteria));
    });
  }

  registrableProjects(session: SessionContext, criteria?: FilterCriteria): Outcome<Project[]> {
    return this.read(session, 'registrableProjects', () => {
      const officer = this.officerOf(session, 'list registrable projects');
      if (!officer.ok) return officer;
      return succeed(this.services.queries.registrableProjects(officer.value, criteria));
    });
  }

  registeredProjects(session: SessionContext, criteria?: FilterCriteria): Outcome<Project[]> {
    return this.read(session, 'registeredProjects', () => {
      const officer = this.officerOf(session, 'list registered projects');
      if (!officer.ok) return officer;
      return succeed(this.services.queries.registeredProjects(officer.value, criteria));
    });
  }

  managedProjects(session: SessionContext, criteria?: FilterCriteria): Outcome<Project[]> {
    return this.read(session, 'managedProjects', () => {
      const manager = this.managerOf(session, 'list managed projects');
      if (!manager.ok) return manager;
      return succeed(this.services.queries.managedProjects(manager.value, criteria));
    });
  }

  applicantsOnProject(session: SessionContext, projectID: string, status?: ApplicationStatus): Outcome<Applicant[]> {
    return this.read(session, 'applicantsOnProject', () => {
      const allowed = this.allow(session, STAFF_ROLES, 'list applicants');
      if (!allowed.ok) return allowed;
      const project = this.project(projectID);
      if (!project.ok) return project;
      return succeed(this.services.queries.applicantsOnProject(projectID, status));
    });
  }

  myRequests(session: SessionContext): Outcome<Request[]> {
    return this.read(session, 'myRequests', () =>
      succeed([...this.graph.requests.values()].filter((r) => r.userID === session.userID)),
    );
  }

  // Undecided requests on the acting manager's projects, optionally of one type
  pendingRequests(session: SessionContext, type?: RequestType): Outcome<DecidableRequest[]> {
    return this.read(session, 'pendingRequests', () => {
      const manager = this.managerOf(session, 'review requests');
      if (!manager.ok) return manager;
      const managed = manager.value.projectIDs;
      return succeed(
        [...this.graph.requests.values()]
          .filter(isDecidable)
          .filter(
            (r) =>
              r.approval === 'PENDING' && managed.has(r.projectID) && (type === undefined || r.type === type),
          ),
      );
    });
  }

  applicantReport(session: SessionContext, criteria: ApplicantReportCriteria): Outcome<Applicant[]> {
    return this.read(session, 'applicantReport', () => {
      const owned = this.ownedProject(session, criteria.projectID, 'report on');
      if (!owned.ok) return owned;
      return this.services.reports.applicantReport(criteria);
    });
  }

  bookingReceipts(session: SessionContext, projectID?: string): Outcome<BookingReceipt[]> {
    return this.read(session, 'bookingReceipts', () => {
      const officer = this.officerOf(session, 'issue receipts');
      if (!officer.ok) return officer;
      return this.services.reports.bookingReceipts(officer.value, projectID);
    });
  }

  // ==================== Plumbing ====================

  private commit<T>(
    session: SessionContext,
    operation: string,
    kinds: readonly EntityKind[],
    run: () => Outcome<T>,
  ): Outcome<T> {
    const outcome = run();
    if (!outcome.ok) {
      return this.rejected(session, operation, outcome);
    }
    // Storage errors propagate; the caller decides whether to retry
    this.graph.persist(this.store, kinds);
    this.logger.info({ operation, userID: session.userID, role: session.role, saved: [...kinds] }, `${operation} committed`);
    return outcome;
  }

  private read<T>(session: SessionContext, operation: string, run: () => Outcome<T>): Outcome<T> {
    const outcome = run();
    return outcome.ok ? outcome : this.rejected(session, operation, outcome);
  }

  private rejected<T>(session: SessionContext, operation: string, outcome: Outcome<T>): Outcome<T> {
    if (!outcome.ok) {
      const { kind, code, message } = outcome.error;
      this.logger.warn({ operation, userID: session.userID, role: session.role, kind, code }, message);
    }
    return outcome;
  }

  private allow(session: SessionContext, roles: readonly UserRole[], action: string): Outcome<void> {
    return roles.includes(session.role)
      ? succeed(undefined)
      : fail('Forbidden', `${session.role} ${session.userID} may not ${action}`);
  }

  // Officers apply through their applicant profile
  private applicantOf(session: SessionContext): Outcome<Applicant> {
    const applicantID =
      session.role === 'OFFICER' ? this.graph.officers.get(session.userID)?.applicantID : session.userID;
    const applicant = applicantID === undefined ? undefined : this.graph.applicants.get(applicantID);
    return applicant ? succeed(applicant) : fail('NotAnApplicant', `User ${session.userID} has no applicant profile`);
  }

  private officerOf(session: SessionContext, action: string): Outcome<Officer> {
    const allowed = this.allow(session, ['OFFICER'], action);
    if (!allowed.ok) return allowed;
    const officer = this.graph.officers.get(session.userID);
    return officer ? succeed(officer) : fail('UserNotFound', `Officer ${session.userID} not found`);
  }

  private managerOf(session: SessionContext, action: string): Outcome<Manager> {
    const allowed = this.allow(session, ['MANAGER'], action);
    if (!allowed.ok) return allowed;
    const manager = this.graph.managers.get(session.userID);
    return manager ? succeed(manager) : fail('UserNotFound', `Manager ${session.userID} not found`);
  }

  private project(projectID: string): Outcome<Project> {
    const project = this.graph.projects.get(projectID);
    return project ? succeed(project) : fail('ProjectNotFound', `Project ${projectID} not found`);
  }

  private ownedProject(session: SessionContext, projectID: string, action: string): Outcome<Project> {
    const manager = this.managerOf(session, `${action} projects`);
    if (!manager.ok) return manager;
    const project = this.project(projectID);
    if (!project.ok) return project;
    if (project.value.managerID !== manager.value.userID) {
      return fail('Forbidden', `Manager ${manager.value.userID} does not manage ${projectID}`);
    }
    return project;
  }

  private decidable<T extends DecidableRequest['type']>(
    session: SessionContext,
    requestID: string,
    type: T,
  ): Outcome<Extract<DecidableRequest, { type: T }>> {
    const manager = this.managerOf(session, 'decide requests');
    if (!manager.ok) return manager;
    const request = this.graph.requests.get(requestID);
    if (!request) {
      return fail('RequestNotFound', `Request ${requestID} not found`);
    }
    if (!isOfType(request, type)) {
      return fail('WrongRequestType', `Request ${requestID} is a ${request.type}, not a ${type}`);
    }
    if (!manager.value.projectIDs.has(request.projectID)) {
      return fail('Forbidden', `Manager ${manager.value.userID} does not manage ${request.projectID}`);
    }
    return succeed(request);
  }
}

function isOfType<T extends DecidableRequest['type']>(
  request: Request,
  type: T,
): request is Extract<DecidableRequest, { type: T }> {
  return request.type === type;
}
