import type { FlatType, IsoDate, Project } from '../entities/Project';
import { FLAT_RANK } from '../entities/Project';
import type { Applicant } from '../entities/User';
import type { EligibilityRules } from '../../ports';
import { isStrictlyWithin } from './dates';

export const DEFAULT_ELIGIBILITY: EligibilityRules = {
  marriedMinAge: 21,
  singleMinAge: 35,
};

/**
 * Largest flat type the applicant may apply for in this project today, or null.
 * Married applicants qualify for THREE_ROOM (and so everything below it);
 * singles only ever reach TWO_ROOM.
 *
 * `officerIDs` are the officers applying through this profile; a project any of
 * them is assigned to is closed to it.
 */
export function eligibility(
  applicant: Pick<Applicant, 'userID' | 'age' | 'maritalStatus'>,
  project: Pick<Project, 'visible' | 'assignedOfficerIDs' | 'openDate' | 'closeDate'>,
  today: IsoDate,
  rules: EligibilityRules = DEFAULT_ELIGIBILITY,
  officerIDs: ReadonlySet<string> = new Set(),
): FlatType | null {
  const staffed =
    project.assignedOfficerIDs.has(applicant.userID) ||
    [...officerIDs].some((officerID) => project.assignedOfficerIDs.has(officerID));
  const projectOpen = project.visible && !staffed && isStrictlyWithin(today, project);
  if (!projectOpen) {
    return null;
  }

  if (applicant.maritalStatus === 'MARRIED' && applicant.age >= rules.marriedMinAge) {
    return 'THREE_ROOM';
  }
  if (applicant.maritalStatus === 'SINGLE' && applicant.age >= rules.singleMinAge) {
    return 'TWO_ROOM';
  }
  return null;
}

export const allowsFlat = (maxEligible: FlatType | null, requested: FlatType): boolean =>
  maxEligible !== null && FLAT_RANK[requested] <= FLAT_RANK[maxEligible];
