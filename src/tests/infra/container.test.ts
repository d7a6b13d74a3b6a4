import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import type { EntityKind, EntityStore, Logger } from '../../core/ports';
import { buildAllocationApp, loadPolicyConfig } from '../../infra/container';
import { InMemoryEntityStore } from '../../infra/persistence/InMemoryEntityStore';
import { parseEnv } from '../../infra/env';
import { createManager, createMockLogger, createMockStore, createProject, session } from '../helpers/fixtures';

function thrown(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('buildAllocationApp', () => {
  const seeded = () => {
    const store = createMockStore();
    store.loadAll.mockImplementation((kind: EntityKind) => {
      if (kind === 'projects') return [createProject()];
      if (kind === 'managers') return [createManager()];
      return [];
    });
    return store;
  };

  it('continues ids after the loaded data', () => {
    const app = buildAllocationApp({
      store: seeded() as unknown as EntityStore,
      logger: createMockLogger() as unknown as Logger,
    });

    expect(app.ids.nextProjectID()).toBe('P0002');
    expect(app.graph.projects.has('P1')).toBe(true);
  });

  it('keeps writes in memory on a dry run', () => {
    const store = seeded();
    const app = buildAllocationApp({
      store: store as unknown as EntityStore,
      logger: createMockLogger() as unknown as Logger,
      dryRun: true,
    });

    const result = app.orchestrator.toggleVisibility(session('M1', 'MANAGER'), 'P1');

    expect(result.ok).toBe(true);
    expect(store.saveAll).not.toHaveBeenCalled();
    expect(app.store).toBeInstanceOf(InMemoryEntityStore);
    expect(app.store.loadAll('projects').map((p) => p.visible)).toEqual([false]);
  });
});

describe('loadPolicyConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  const policyFile = (content: string): string => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flat-alloc-policy-'));
    const file = path.join(dir, 'policy.json');
    fs.writeFileSync(file, content);
    return file;
  };

  it('reads the shipped policy', () => {
    expect(loadPolicyConfig('config/policy.json').eligibility).toEqual({ marriedMinAge: 21, singleMinAge: 35 });
  });

  it('reports unreadable files', () => {
    expect(thrown(() => loadPolicyConfig(path.join(os.tmpdir(), 'flat-alloc-missing', 'policy.json')))).toMatchObject({
      code: 'POLICY_READ',
    });
  });

  it('reports values that break the schema', () => {
    const file = policyFile('{"ids": {"width": 0}}');

    expect(thrown(() => loadPolicyConfig(file))).toMatchObject({ code: 'POLICY_INVALID' });
  });
});

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv({})).toEqual({ NODE_ENV: 'development', DATA_DIR: 'data', POLICY_PATH: 'config/policy.json' });
  });

  it('rejects an unknown log level', () => {
    expect(thrown(() => parseEnv({ LOG_LEVEL: 'loud' }))).toMatchObject({ code: 'INVALID_ENV' });
  });
});
