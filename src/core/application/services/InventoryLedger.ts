import type { FlatType, Project } from '../../domain/entities/Project';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';

export interface UnitMovement {
  projectID: string;
  flatType: FlatType;
  remaining: number;
}

// Owns every change to Project.units and Project.bookedApplicantIDs.
// Counts never drop below zero and an applicant holds at most one unit per project.
export class InventoryLedger {
  available(project: Project, flatType: FlatType): number {
    return project.units.get(flatType) ?? 0;
  }

  hasUnits(project: Project, flatType: FlatType): boolean {
    return this.available(project, flatType) > 0;
  }

  // Check only; reserve() repeats it before mutating
  canReserve(project: Project, flatType: FlatType, applicantID: string): Outcome<void> {
    if (project.bookedApplicantIDs.has(applicantID)) {
      return fail('AlreadyBooked', `Applicant ${applicantID} already holds a unit in ${project.projectID}`);
    }
    if (!this.hasUnits(project, flatType)) {
      return fail('NoUnitsAvailable', `No ${flatType} units left in ${project.projectID}`);
    }
    return succeed(undefined);
  }

  reserve(project: Project, flatType: FlatType, applicantID: string): Outcome<UnitMovement> {
    const check = this.canReserve(project, flatType, applicantID);
    if (!check.ok) {
      return check;
    }

    const remaining = this.available(project, flatType) - 1;
    project.units.set(flatType, remaining);
    project.bookedApplicantIDs.add(applicantID);
    return succeed({ projectID: project.projectID, flatType, remaining });
  }

  /**
   * Returns the applicant's unit to the pool. A no-op (null) when the applicant
   * holds no unit in the project, so a release can never be counted twice.
   */
  release(project: Project, flatType: FlatType, applicantID: string): UnitMovement | null {
    if (!project.bookedApplicantIDs.has(applicantID)) {
      return null;
    }

    const remaining = this.available(project, flatType) + 1;
    project.units.set(flatType, remaining);
    project.bookedApplicantIDs.delete(applicantID);
    return { projectID: project.projectID, flatType, remaining };
  }
}
