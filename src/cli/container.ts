// Lightweight dependency injection container for CLI
// Loads policy and CSV data once per process and resolves who is acting
// Uses singleton pattern to reuse container across commands

import type { Command } from 'commander';
import type { SessionContext } from '../core/ports';
import { todayIso } from '../core/domain/rules/dates';
import type { AllocationApp } from '../infra/container';
import { buildAllocationApp } from '../infra/container';
import { parseDate } from './utils/parse';

// Options declared on the root program, visible to every subcommand
export interface GlobalOptions {
  as?: string;
  today?: string;
  dataDir?: string;
  policy?: string;
  dryRun?: boolean;
}

export interface CliContext {
  app: AllocationApp;
  session: SessionContext;
}

// Cached container instance (singleton pattern)
let container: AllocationApp | null = null;

export function getCliContainer(options: GlobalOptions = {}): AllocationApp {
  if (container) {
    return container;
  }
  container = buildAllocationApp({
    dataDir: options.dataDir,
    policyPath: options.policy,
    dryRun: options.dryRun,
  });
  return container;
}

// Resolve the acting user from --as; the role comes from the data files
// Throws so the calling action reports it like any other CLI error
export function getCliContext(cmd: Command): CliContext {
  const options = cmd.optsWithGlobals<GlobalOptions>();
  if (!options.as) {
    throw new Error('Pass --as <userId> to say who is acting');
  }

  const app = getCliContainer(options);
  const today = options.today ? parseDate(options.today) : todayIso();
  const session = app.orchestrator.session(options.as, today);
  if (!session.ok) {
    throw new Error(session.error.message);
  }
  return { app, session: session.value };
}
