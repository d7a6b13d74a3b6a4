import fs from 'fs';
import path from 'path';
import type { Config, EntityStore, IdGenerator, Logger } from '../core/ports';
import { EntityGraph } from '../core/domain/EntityGraph';
import { AllocationError } from '../core/domain/outcome';
import type { AllocationServices } from '../core/application/services';
import { createServices } from '../core/application/services';
import { AllocationOrchestrator } from '../core/application/orchestrator/AllocationOrchestrator';
import { env } from './env';
import { portLogger } from './logger';
import { PolicySchema, type PolicyConfig } from './config/policySchema';
import { ConfigImpl } from './services/Config';
import { CsvEntityStore } from './persistence/CsvEntityStore';
import { InMemoryEntityStore } from './persistence/InMemoryEntityStore';
import { SequentialIdGenerator } from './ids/SequentialIdGenerator';

export interface AllocationApp {
  config: Config;
  store: EntityStore;
  graph: EntityGraph;
  ids: IdGenerator;
  services: AllocationServices;
  orchestrator: AllocationOrchestrator;
}

export interface BuildOptions {
  dataDir?: string;
  policyPath?: string;
  // Replaces the CSV store, e.g. an in-memory one for dry runs
  store?: EntityStore;
  logger?: Logger;
  dryRun?: boolean;
}

// Loads policy and data, then wires the engine around one shared graph
export function buildAllocationApp(options: BuildOptions = {}): AllocationApp {
  const policy = loadPolicyConfig(options.policyPath ?? env.POLICY_PATH);
  const config = new ConfigImpl(policy);

  const diskStore = options.store ?? new CsvEntityStore(resolveFromRoot(options.dataDir ?? env.DATA_DIR), config.dataFiles());
  const graph = EntityGraph.load(diskStore);
  // Dry runs read real data but keep every write in memory
  const store = options.dryRun ? new InMemoryEntityStore() : diskStore;

  const ids = new SequentialIdGenerator(config.idFormat(), {
    projectIDs: graph.projects.keys(),
    requestIDs: graph.requests.keys(),
  });
  const services = createServices(graph, ids, config.eligibility());
  const orchestrator = new AllocationOrchestrator(graph, services, store, options.logger ?? portLogger());

  return { config, store, graph, ids, services, orchestrator };
}

export function loadPolicyConfig(policyPath: string): PolicyConfig {
  const target = resolveFromRoot(policyPath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(target, 'utf-8'));
  } catch (error) {
    throw new AllocationError(`Failed to read configuration file at ${target}`, 'POLICY_READ', { cause: error });
  }

  const parsed = PolicySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new AllocationError(`Invalid policy at ${target}: ${issues}`, 'POLICY_INVALID', { cause: parsed.error });
  }
  return parsed.data;
}

function resolveFromRoot(relative: string): string {
  return path.resolve(process.cwd(), relative);
}
