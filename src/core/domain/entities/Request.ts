import type { FlatType } from './Project';
import type { ApplicationStatus } from './User';

export type RequestType = 'BTO_APPLICATION' | 'BTO_WITHDRAWAL' | 'REGISTRATION' | 'ENQUIRY';

export type ApprovedStatus = 'PENDING' | 'SUCCESSFUL' | 'UNSUCCESSFUL';

export type OverallStatus = 'PENDING' | 'DONE';

interface RequestBase {
  requestID: string;
  userID: string;
  projectID: string;
  overallStatus: OverallStatus;
}

export interface ApplicationRequest extends RequestBase {
  type: 'BTO_APPLICATION';
  approval: ApprovedStatus;
  flatType: FlatType;
}

export interface WithdrawalRequest extends RequestBase {
  type: 'BTO_WITHDRAWAL';
  approval: ApprovedStatus;
  // Snapshot of the application at the moment the withdrawal was filed
  priorStatus: ApplicationStatus;
  flatType: FlatType | null;
}

export interface RegistrationRequest extends RequestBase {
  type: 'REGISTRATION';
  approval: ApprovedStatus;
}

export interface EnquiryRequest extends RequestBase {
  type: 'ENQUIRY';
  query: string;
  answer: string | null;
  answeredBy: string | null;
}

export type Request = ApplicationRequest | WithdrawalRequest | RegistrationRequest | EnquiryRequest;

export type DecidableRequest = ApplicationRequest | WithdrawalRequest | RegistrationRequest;

export const isDecidable = (request: Request): request is DecidableRequest => request.type !== 'ENQUIRY';

// DONE exactly when the decision is final
export const overallFor = (approval: ApprovedStatus): OverallStatus =>
  approval === 'PENDING' ? 'PENDING' : 'DONE';
