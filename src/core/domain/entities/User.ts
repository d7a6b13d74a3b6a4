import type { FlatType } from './Project';

export type MaritalStatus = 'SINGLE' | 'MARRIED';

export type ApplicationStatus = 'PENDING' | 'SUCCESSFUL' | 'UNSUCCESSFUL' | 'BOOKED' | 'WITHDRAWN';

// APPROVED_UNASSIGNED: approved while the project had no officer slots left
export type RegistrationStatus = 'PENDING' | 'APPROVED' | 'APPROVED_UNASSIGNED' | 'REJECTED';

export type UserRole = 'APPLICANT' | 'OFFICER' | 'MANAGER';

export interface Applicant {
  userID: string;
  name: string;
  age: number;
  maritalStatus: MaritalStatus;
  activeProjectID: string | null;
  applicationStatusByProject: Map<string, ApplicationStatus>;
  appliedFlatByProject: Map<string, FlatType>;
}

/**
 * Officer capability of a person. The applicant side of the same person lives in
 * the applicant collection and is reached through `applicantID`.
 */
export interface Officer {
  userID: string;
  applicantID: string;
  registeredProjectIDs: Set<string>;
  registrationStatusByProject: Map<string, RegistrationStatus>;
}

export interface Manager {
  userID: string;
  name: string;
  projectIDs: Set<string>;
}

// Registration states that still hold (or claim) the officer's time window
export const ACTIVE_REGISTRATION_STATES: readonly RegistrationStatus[] = [
  'PENDING',
  'APPROVED',
  'APPROVED_UNASSIGNED',
];
