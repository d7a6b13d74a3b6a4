import type { EligibilityRules, IdGenerator } from '../../ports';
import type { EntityGraph } from '../../domain/EntityGraph';
import type { FlatType, IsoDate, Project } from '../../domain/entities/Project';
import type { Applicant, ApplicationStatus } from '../../domain/entities/User';
import type { ApplicationRequest, ApprovedStatus } from '../../domain/entities/Request';
import { overallFor } from '../../domain/entities/Request';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';
import { allowsFlat, DEFAULT_ELIGIBILITY, eligibility } from '../../domain/rules/eligibility';
import type { InventoryLedger, UnitMovement } from './InventoryLedger';

export interface ApplicationDecision {
  request: ApplicationRequest;
  status: ApplicationStatus;
  released: UnitMovement | null;
}

// NONE -> PENDING -> SUCCESSFUL | UNSUCCESSFUL; SUCCESSFUL -> BOOKED (see BookingService)
export class ApplicationStateMachine {
  constructor(
    private readonly graph: EntityGraph,
    private readonly ids: IdGenerator,
    private readonly ledger: InventoryLedger,
    private readonly rules: EligibilityRules = DEFAULT_ELIGIBILITY,
  ) {}

  submit(applicant: Applicant, project: Project, flatType: FlatType, today: IsoDate): Outcome<ApplicationRequest> {
    if (applicant.activeProjectID !== null) {
      return fail('AlreadyApplied', `Applicant ${applicant.userID} already applied for ${applicant.activeProjectID}`);
    }

    const maxEligible = eligibility(applicant, project, today, this.rules, this.graph.officerIDsFor(applicant.userID));
    if (!allowsFlat(maxEligible, flatType)) {
      return fail('NotEligible', `Applicant ${applicant.userID} is not eligible for ${flatType} in ${project.projectID}`);
    }

    if (!this.ledger.hasUnits(project, flatType)) {
      return fail('NoUnitsAvailable', `No ${flatType} units left in ${project.projectID}`);
    }

    // Units are only taken at booking time
    applicant.activeProjectID = project.projectID;
    applicant.applicationStatusByProject.set(project.projectID, 'PENDING');
    applicant.appliedFlatByProject.set(project.projectID, flatType);

    const request: ApplicationRequest = {
      requestID: this.ids.nextRequestID(),
      type: 'BTO_APPLICATION',
      userID: applicant.userID,
      projectID: project.projectID,
      overallStatus: 'PENDING',
      approval: 'PENDING',
      flatType,
    };
    this.graph.requests.set(request.requestID, request);
    return succeed(request);
  }

  /**
   * Applies a manager decision to both the request and the applicant's cached status.
   * Re-applying the same decision is allowed. Only the latest application for the
   * applicant and project can be decided.
   */
  decide(request: ApplicationRequest, decision: ApprovedStatus): Outcome<ApplicationDecision> {
    const applicant = this.graph.applicants.get(request.userID);
    if (!applicant) {
      return fail('UserNotFound', `Applicant ${request.userID} not found`);
    }

    const latest = this.latestApplication(request.userID, request.projectID);
    if (latest && latest.requestID !== request.requestID) {
      return fail(
        'ApplicationInactive',
        `Application ${request.requestID} has been superseded by ${latest.requestID}`,
      );
    }

    const projectID = request.projectID;
    const current = applicant.applicationStatusByProject.get(projectID);
    const holdsProject = applicant.activeProjectID === projectID;

    if (decision !== 'UNSUCCESSFUL' && !holdsProject) {
      return fail(
        'ApplicationInactive',
        `Application ${request.requestID} is no longer active (status ${current ?? 'NONE'})`,
      );
    }
    if (decision === 'PENDING' && current === 'BOOKED') {
      return fail('AlreadyBooked', `Application ${request.requestID} has already been booked`);
    }

    let released: UnitMovement | null = null;
    let status: ApplicationStatus;

    switch (decision) {
      case 'SUCCESSFUL':
        status = current === 'BOOKED' ? 'BOOKED' : 'SUCCESSFUL';
        break;
      case 'PENDING':
        status = 'PENDING';
        break;
      case 'UNSUCCESSFUL': {
        const flatType = applicant.appliedFlatByProject.get(projectID) ?? request.flatType;
        const project = this.graph.projects.get(projectID);
        if (project) {
          released = this.ledger.release(project, flatType, applicant.userID);
        }
        status = 'UNSUCCESSFUL';
        applicant.appliedFlatByProject.delete(projectID);
        if (holdsProject) {
          applicant.activeProjectID = null;
        }
        break;
      }
    }

    applicant.applicationStatusByProject.set(projectID, status);
    request.approval = decision;
    request.overallStatus = overallFor(decision);

    return succeed({ request, status, released });
  }

  latestApplication(userID: string, projectID: string): ApplicationRequest | undefined {
    return this.graph
      .requestsFor(userID, projectID)
      .filter((r): r is ApplicationRequest => r.type === 'BTO_APPLICATION')
      .at(-1);
  }

  // Closes a superseded application record; the applicant's current state is left alone
  retire(request: ApplicationRequest): ApplicationRequest {
    request.approval = 'UNSUCCESSFUL';
    request.overallStatus = overallFor('UNSUCCESSFUL');
    return request;
  }
}
