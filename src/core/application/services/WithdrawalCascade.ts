import type { IdGenerator } from '../../ports';
import type { EntityGraph } from '../../domain/EntityGraph';
import type { Project } from '../../domain/entities/Project';
import type { Applicant } from '../../domain/entities/User';
import type { ApplicationRequest, ApprovedStatus, WithdrawalRequest } from '../../domain/entities/Request';
import { overallFor } from '../../domain/entities/Request';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';
import type { ApplicationStateMachine } from './ApplicationStateMachine';
import type { InventoryLedger, UnitMovement } from './InventoryLedger';

export interface WithdrawalDecision {
  request: WithdrawalRequest;
  released: UnitMovement | null;
}

/**
 * Withdrawal is resolved optimistically: the applicant is unlinked as soon as the
 * request is filed. Approval then closes the original application and returns any
 * booked unit; rejection leaves the applicant unlinked.
 */
export class WithdrawalCascade {
  constructor(
    private readonly graph: EntityGraph,
    private readonly ids: IdGenerator,
    private readonly ledger: InventoryLedger,
    private readonly applications: ApplicationStateMachine,
  ) {}

  withdraw(applicant: Applicant, project: Project): Outcome<WithdrawalRequest> {
    const projectID = project.projectID;
    const history = this.graph.requestsFor(applicant.userID, projectID);

    if (history.some((r) => r.type === 'BTO_WITHDRAWAL' && r.overallStatus === 'PENDING')) {
      return fail('AlreadyWithdrawing', `A withdrawal for ${projectID} is already awaiting approval`);
    }

    const application = this.openApplication(applicant, projectID);
    if (!application) {
      return fail('NoPendingApplication', `Applicant ${applicant.userID} has no open application for ${projectID}`);
    }

    const request: WithdrawalRequest = {
      requestID: this.ids.nextRequestID(),
      type: 'BTO_WITHDRAWAL',
      userID: applicant.userID,
      projectID,
      overallStatus: 'PENDING',
      approval: 'PENDING',
      priorStatus: applicant.applicationStatusByProject.get(projectID) ?? 'PENDING',
      flatType: applicant.appliedFlatByProject.get(projectID) ?? application.flatType,
    };
    this.graph.requests.set(request.requestID, request);

    applicant.applicationStatusByProject.set(projectID, 'WITHDRAWN');
    applicant.activeProjectID = null;
    applicant.appliedFlatByProject.delete(projectID);

    return succeed(request);
  }

  approveWithdrawal(request: WithdrawalRequest, decision: ApprovedStatus): Outcome<WithdrawalDecision> {
    const applicant = this.graph.applicants.get(request.userID);
    if (!applicant) {
      return fail('UserNotFound', `Applicant ${request.userID} not found`);
    }

    // A decided withdrawal is final; repeating the decision changes nothing
    if (request.overallStatus === 'DONE') {
      if (request.approval === decision) {
        return succeed({ request, released: null });
      }
      return fail('RequestClosed', `Withdrawal ${request.requestID} was already decided ${request.approval}`);
    }

    let released: UnitMovement | null = null;

    if (decision === 'SUCCESSFUL') {
      const projectID = request.projectID;
      const original = this.withdrawnApplication(request);
      // The applicant may have applied to the same project again while this was pending
      const reapplied = applicant.activeProjectID === projectID;
      const current =
        original !== undefined &&
        this.applications.latestApplication(applicant.userID, projectID)?.requestID === original.requestID;

      if (original && current && !reapplied) {
        const closed = this.applications.decide(original, 'UNSUCCESSFUL');
        if (!closed.ok) {
          return closed;
        }
        released = closed.value.released;
      } else {
        if (original) {
          this.applications.retire(original);
        }
        if (!original && !reapplied) {
          applicant.applicationStatusByProject.set(projectID, 'UNSUCCESSFUL');
          applicant.appliedFlatByProject.delete(projectID);
        }
      }

      // Covers bookings whose application record is gone. A booking made after the
      // withdrawal was filed belongs to a newer application and stays held.
      const project = this.graph.projects.get(projectID);
      const bookedSince = applicant.applicationStatusByProject.get(projectID) === 'BOOKED';
      if (!released && project && request.priorStatus === 'BOOKED' && request.flatType && !bookedSince) {
        released = this.ledger.release(project, request.flatType, applicant.userID);
      }
    }

    request.approval = decision;
    request.overallStatus = overallFor(decision);
    return succeed({ request, released });
  }

  private openApplication(applicant: Applicant, projectID: string): ApplicationRequest | undefined {
    if (applicant.activeProjectID !== projectID) {
      return undefined;
    }
    return this.applicationsFor(applicant.userID, projectID).find((r) => r.approval !== 'UNSUCCESSFUL');
  }

  // Last application filed before this withdrawal; a re-application made while the
  // withdrawal was pending is not the one being withdrawn
  private withdrawnApplication(request: WithdrawalRequest): ApplicationRequest | undefined {
    let latest: ApplicationRequest | undefined;
    for (const r of this.graph.requestsFor(request.userID, request.projectID)) {
      if (r.requestID === request.requestID) {
        break;
      }
      if (r.type === 'BTO_APPLICATION') {
        latest = r;
      }
    }
    return latest;
  }

  private applicationsFor(userID: string, projectID: string): ApplicationRequest[] {
    return this.graph
      .requestsFor(userID, projectID)
      .filter((r): r is ApplicationRequest => r.type === 'BTO_APPLICATION');
  }
}
