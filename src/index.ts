// Public API of the allocation engine

export type {
  Config,
  EligibilityRules,
  EntityKind,
  EntityKinds,
  EntityStore,
  IdFormat,
  IdGenerator,
  Logger,
  SessionContext,
} from './core/ports';
export { ENTITY_KINDS } from './core/ports';

export * from './core/domain/entities/Project';
export * from './core/domain/entities/User';
export * from './core/domain/entities/Request';
export * from './core/domain/outcome';
export { EntityGraph, type GraphSeed } from './core/domain/EntityGraph';
export { DEFAULT_ELIGIBILITY, allowsFlat, eligibility } from './core/domain/rules/eligibility';
export { isIsoDate, isStrictlyWithin, todayIso, windowsOverlap, type DateWindow } from './core/domain/rules/dates';

export * from './core/application/services';
export { SORT_KEYS } from './core/application/services/FilterSortEngine';
export {
  AllocationOrchestrator,
  type RequestDecision,
} from './core/application/orchestrator/AllocationOrchestrator';

export { buildAllocationApp, loadPolicyConfig, type AllocationApp, type BuildOptions } from './infra/container';
export { CsvEntityStore } from './infra/persistence/CsvEntityStore';
export { InMemoryEntityStore } from './infra/persistence/InMemoryEntityStore';
export { SequentialIdGenerator } from './infra/ids/SequentialIdGenerator';
export { ConfigImpl } from './infra/services/Config';
export { PolicySchema, type PolicyConfig } from './infra/config/policySchema';
