export type FailureKind = 'NotFound' | 'Conflict' | 'IneligibleOperation' | 'ResourceExhausted';

// Every recoverable failure the engine reports, grouped by kind
const FAILURE_KINDS = {
  ProjectNotFound: 'NotFound',
  UserNotFound: 'NotFound',
  RequestNotFound: 'NotFound',
  NotAnApplicant: 'NotFound',

  AlreadyApplied: 'Conflict',
  AlreadyBooked: 'Conflict',
  AlreadyWithdrawing: 'Conflict',
  AlreadyRegistered: 'Conflict',
  ApplicantOnProject: 'Conflict',
  RegistrationOverlap: 'Conflict',
  DuplicateName: 'Conflict',
  ManagerOverlap: 'Conflict',

  NotEligible: 'IneligibleOperation',
  NoActiveApplication: 'IneligibleOperation',
  NoPendingApplication: 'IneligibleOperation',
  NotYetApproved: 'IneligibleOperation',
  OfficerNotAssigned: 'IneligibleOperation',
  ApplicationInactive: 'IneligibleOperation',
  ProjectNotVisible: 'IneligibleOperation',
  WrongRequestType: 'IneligibleOperation',
  RequestClosed: 'IneligibleOperation',
  RequestSuperseded: 'IneligibleOperation',
  EnquiryClosed: 'IneligibleOperation',
  EmptyEnquiry: 'IneligibleOperation',
  NotOwner: 'IneligibleOperation',
  InvalidProject: 'IneligibleOperation',
  InvalidCriteria: 'IneligibleOperation',
  Forbidden: 'IneligibleOperation',

  NoUnitsAvailable: 'ResourceExhausted',
} as const satisfies Record<string, FailureKind>;

export type FailureCode = keyof typeof FAILURE_KINDS;

export interface Failure {
  kind: FailureKind;
  code: FailureCode;
  message: string;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: Failure };

export const succeed = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const fail = <T = never>(code: FailureCode, message: string): Outcome<T> => ({
  ok: false,
  error: { kind: FAILURE_KINDS[code], code, message },
});

export const kindOf = (code: FailureCode): FailureKind => FAILURE_KINDS[code];

/**
 * Raised for conditions the caller cannot recover from within the operation:
 * storage I/O, corrupt data files, invalid configuration.
 */
export class AllocationError extends Error {
  code: string;
  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AllocationError';
    this.code = code;
  }
}
