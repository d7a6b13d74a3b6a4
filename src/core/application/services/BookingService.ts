import type { EntityGraph } from '../../domain/EntityGraph';
import type { FlatType } from '../../domain/entities/Project';
import type { Officer } from '../../domain/entities/User';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';
import type { InventoryLedger } from './InventoryLedger';

export interface Booking {
  applicantID: string;
  projectID: string;
  flatType: FlatType;
  unitsRemaining: number;
}

export class BookingService {
  constructor(
    private readonly graph: EntityGraph,
    private readonly ledger: InventoryLedger,
  ) {}

  /**
   * SUCCESSFUL -> BOOKED. The only transition that takes a unit out of inventory.
   */
  book(officer: Officer, applicantID: string): Outcome<Booking> {
    const applicant = this.graph.applicants.get(applicantID);
    if (!applicant) {
      return fail('NotAnApplicant', `User ${applicantID} is not an applicant`);
    }

    const projectID = applicant.activeProjectID;
    if (projectID === null) {
      return fail('NoActiveApplication', `Applicant ${applicantID} has no active application`);
    }

    if (!officer.registeredProjectIDs.has(projectID)) {
      return fail('OfficerNotAssigned', `Officer ${officer.userID} is not assigned to ${projectID}`);
    }

    const status = applicant.applicationStatusByProject.get(projectID);
    if (status === 'BOOKED') {
      return fail('AlreadyBooked', `Applicant ${applicantID} has already booked a flat in ${projectID}`);
    }
    if (status !== 'SUCCESSFUL') {
      return fail('NotYetApproved', `Application of ${applicantID} is ${status ?? 'NONE'}, not SUCCESSFUL`);
    }

    const project = this.graph.projects.get(projectID);
    if (!project) {
      return fail('ProjectNotFound', `Project ${projectID} not found`);
    }
    const flatType = applicant.appliedFlatByProject.get(projectID);
    if (!flatType) {
      return fail('NoActiveApplication', `Applicant ${applicantID} has no flat type recorded for ${projectID}`);
    }

    const reserved = this.ledger.reserve(project, flatType, applicantID);
    if (!reserved.ok) {
      return reserved;
    }

    applicant.applicationStatusByProject.set(projectID, 'BOOKED');
    return succeed({ applicantID, projectID, flatType, unitsRemaining: reserved.value.remaining });
  }
}
