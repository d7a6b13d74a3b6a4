import type { EntityGraph } from '../../domain/EntityGraph';
import type { FlatType, Project } from '../../domain/entities/Project';
import type { Applicant, MaritalStatus, Officer } from '../../domain/entities/User';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';

export interface ApplicantReportCriteria {
  projectID: string;
  minAge: number;
  maxAge: number;
  maritalStatus: MaritalStatus;
  flatType: FlatType;
}

export interface BookingReceipt {
  applicant: Applicant;
  project: Project;
  flatType: FlatType;
  price: number | null;
}

// Structured report data; rendering is left to the boundary
export class ReportService {
  constructor(private readonly graph: EntityGraph) {}

  applicantReport(criteria: ApplicantReportCriteria): Outcome<Applicant[]> {
    if (!this.graph.projects.has(criteria.projectID)) {
      return fail('ProjectNotFound', `Project ${criteria.projectID} not found`);
    }
    if (criteria.minAge < 0 || criteria.maxAge < criteria.minAge) {
      return fail('InvalidCriteria', `Invalid age range ${criteria.minAge}-${criteria.maxAge}`);
    }

    return succeed(
      this.graph
        .list('applicants')
        .filter(
          (a) =>
            a.activeProjectID === criteria.projectID &&
            a.age >= criteria.minAge &&
            a.age <= criteria.maxAge &&
            a.maritalStatus === criteria.maritalStatus &&
            a.appliedFlatByProject.get(criteria.projectID) === criteria.flatType,
        ),
    );
  }

  bookingReceipts(officer: Officer, projectID?: string): Outcome<BookingReceipt[]> {
    if (projectID !== undefined && !officer.registeredProjectIDs.has(projectID)) {
      return fail('OfficerNotAssigned', `Officer ${officer.userID} is not assigned to ${projectID}`);
    }

    const projectIDs = projectID !== undefined ? [projectID] : [...officer.registeredProjectIDs];
    const receipts: BookingReceipt[] = [];

    for (const id of projectIDs) {
      const project = this.graph.projects.get(id);
      if (!project) continue;

      for (const applicantID of project.bookedApplicantIDs) {
        const applicant = this.graph.applicants.get(applicantID);
        const flatType = applicant?.appliedFlatByProject.get(id);
        if (!applicant || !flatType || applicant.applicationStatusByProject.get(id) !== 'BOOKED') continue;
        receipts.push({ applicant, project, flatType, price: project.price.get(flatType) ?? null });
      }
    }
    return succeed(receipts);
  }
}
