import type { EligibilityRules, IdGenerator } from '../../ports';
import type { EntityGraph } from '../../domain/EntityGraph';
import { DEFAULT_ELIGIBILITY } from '../../domain/rules/eligibility';
import { ApplicationStateMachine } from './ApplicationStateMachine';
import { BookingService } from './BookingService';
import { EnquiryService } from './EnquiryService';
import { FilterSortEngine } from './FilterSortEngine';
import { InventoryLedger } from './InventoryLedger';
import { ProjectLifecycle } from './ProjectLifecycle';
import { ProjectQueries } from './ProjectQueries';
import { RegistrationStateMachine } from './RegistrationStateMachine';
import { ReportService } from './ReportService';
import { WithdrawalCascade } from './WithdrawalCascade';

export interface AllocationServices {
  ledger: InventoryLedger;
  applications: ApplicationStateMachine;
  registrations: RegistrationStateMachine;
  booking: BookingService;
  withdrawals: WithdrawalCascade;
  projects: ProjectLifecycle;
  filter: FilterSortEngine;
  enquiries: EnquiryService;
  queries: ProjectQueries;
  reports: ReportService;
}

// Wires the workflow components over one shared graph, leaves first
export function createServices(
  graph: EntityGraph,
  ids: IdGenerator,
  rules: EligibilityRules = DEFAULT_ELIGIBILITY,
): AllocationServices {
  const ledger = new InventoryLedger();
  const filter = new FilterSortEngine();
  const applications = new ApplicationStateMachine(graph, ids, ledger, rules);
  const registrations = new RegistrationStateMachine(graph, ids);

  return {
    ledger,
    filter,
    applications,
    registrations,
    booking: new BookingService(graph, ledger),
    withdrawals: new WithdrawalCascade(graph, ids, ledger, applications),
    projects: new ProjectLifecycle(graph, ids),
    enquiries: new EnquiryService(graph, ids),
    queries: new ProjectQueries(graph, filter, registrations, rules),
    reports: new ReportService(graph),
  };
}

export type { ApplicationDecision } from './ApplicationStateMachine';
export type { Booking } from './BookingService';
export type { FilterCriteria, SortKey } from './FilterSortEngine';
export type { UnitMovement } from './InventoryLedger';
export type { DeletionReport } from './ProjectLifecycle';
export type { ApplicableProject } from './ProjectQueries';
export type { RegistrationDecision } from './RegistrationStateMachine';
export type { ApplicantReportCriteria, BookingReceipt } from './ReportService';
export type { WithdrawalDecision } from './WithdrawalCascade';
