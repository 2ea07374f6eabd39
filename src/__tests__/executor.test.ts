import { describe, it, expect, beforeAll, afterEach, jest } from '@jest/globals';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { executeJob } from '../runtime/executor.js';
import { parsePipelineDefinition } from '../pipeline/loader.js';
import { setLogLevel } from '../shared/logger.js';
import type { CacheEntry, CacheStore } from '../cache/store.js';
import type { JobDefinition, PushEvent } from '../pipeline/types.js';
import type { StepResult } from '../runtime/types.js';
import { cargoProject, createTestServices, type ProcessHandler, type TestServices } from './test-helpers.js';

const PUSH: PushEvent = { branch: 'main', sha: 'abcdef1234567' };

const definition = parsePipelineDefinition(`
name: single
on: { push: { branch: main } }
jobs:
  build:
    name: Build
    steps:
      - kind: checkout-source
      - kind: install-toolchain
        version: "1.79.0"
      - kind: restore-or-seed-cache
        key: "{{ os }}-build-{{ toolchain.version }}"
        paths: [target]
      - name: Unit tests
        kind: invoke-build
        mode: test
        args: [--workspace]
`);

function buildJob(): JobDefinition {
  const job = definition.jobs['build'];
  if (!job) throw new Error('build job missing');
  return job;
}

class FlakyCache implements CacheStore {
  restores = 0;
  saves: string[] = [];

  async restore(_key: string): Promise<CacheEntry | null> {
    this.restores++;
    throw new Error('connection reset');
  }

  async save(key: string, data: Buffer): Promise<CacheEntry> {
    this.saves.push(key);
    const now = new Date().toISOString();
    return { key, data, contentHash: 'h', sizeBytes: data.length, createdAt: now, updatedAt: now };
  }

  async list() {
    return [];
  }

  async prune(_cutoff: Date) {
    return 0;
  }
}

describe('executeJob', () => {
  let ctx: TestServices;

  beforeAll(() => {
    setLogLevel('error');
  });

  afterEach(() => {
    ctx.cleanup();
  });

  it('runs every step in order and reports each one', async () => {
    ctx = createTestServices({ handler: cargoProject() });
    const reported: StepResult[] = [];

    const result = await executeJob(buildJob(), {
      runId: 'run-1',
      event: PUSH,
      services: ctx.services,
      onStep: (step) => reported.push(step),
    });

    expect(result.status).toBe('succeeded');
    expect(result.steps.map((s) => [s.index, s.name, s.status])).toEqual([
      [0, 'checkout-source', 'succeeded'],
      [1, 'install-toolchain', 'succeeded'],
      [2, 'restore-or-seed-cache', 'succeeded'],
      [3, 'Unit tests', 'succeeded'],
    ]);
    expect(reported).toEqual(result.steps);
    expect(ctx.processes.commandLines()).toEqual([
      'git clone --quiet --no-checkout -- /srv/repo.git .',
      'git checkout --quiet --force abcdef1234567',
      'cargo test --workspace',
    ]);
    expect(ctx.toolchain.installs).toEqual([{ version: '1.79.0', override: false }]);
  });

  it('saves the cache under the rendered key after a successful job', async () => {
    ctx = createTestServices({ handler: cargoProject() });

    await executeJob(buildJob(), { runId: 'run-1', event: PUSH, services: ctx.services });

    const entries = await ctx.services.cache.list();
    expect(entries.map((e) => e.key)).toEqual(['Linux-build-1.79.0']);
  });

  it('skips the remaining steps after a failure and saves no cache', async () => {
    ctx = createTestServices({ handler: cargoProject(['cargo test --workspace']) });

    const result = await executeJob(buildJob(), { runId: 'run-1', event: PUSH, services: ctx.services });

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({
      kind: 'step_failure',
      message: 'cargo test --workspace exited with code 101: error: could not compile `chat-bot`',
      step: 3,
      exitCode: 101,
    });
    expect(await ctx.services.cache.list()).toEqual([]);
  });

  it('stops at the first failing step', async () => {
    ctx = createTestServices({
      handler: (req) => (req.args[0] === 'clone' ? { exitCode: 128, stderr: 'fatal: repository not found\n' } : {}),
    });

    const result = await executeJob(buildJob(), { runId: 'run-1', event: PUSH, services: ctx.services });

    expect(result.steps.map((s) => s.status)).toEqual(['failed', 'skipped', 'skipped', 'skipped']);
    expect(result.error?.message).toBe('git clone /srv/repo.git exited with code 128: fatal: repository not found');
    expect(ctx.processes.calls).toHaveLength(1);
    expect(ctx.toolchain.installs).toEqual([]);
  });

  it('checks out the repository named by the push', async () => {
    ctx = createTestServices({ handler: cargoProject() });

    await executeJob(buildJob(), {
      runId: 'run-1',
      event: { ...PUSH, repository: 'https://git.example.test/app.git' },
      services: ctx.services,
    });

    expect(ctx.processes.commandLines()[0]).toBe('git clone --quiet --no-checkout -- https://git.example.test/app.git .');
  });

  it('ends git options before the repository argument', async () => {
    ctx = createTestServices({ handler: cargoProject() });

    await executeJob(buildJob(), {
      runId: 'run-1',
      event: { ...PUSH, repository: '--upload-pack=touch /tmp/owned;' },
      services: ctx.services,
    });

    expect(ctx.processes.calls[0]?.args).toEqual([
      'clone',
      '--quiet',
      '--no-checkout',
      '--',
      '--upload-pack=touch /tmp/owned;',
      '.',
    ]);
  });

  it('treats a cache that keeps failing as a cold start', async () => {
    ctx = createTestServices({ handler: cargoProject() });
    const cache = new FlakyCache();

    const result = await executeJob(buildJob(), {
      runId: 'run-1',
      event: PUSH,
      services: { ...ctx.services, cache },
    });

    expect(result.status).toBe('succeeded');
    expect(cache.restores).toBe(2);
    expect(cache.saves).toEqual(['Linux-build-1.79.0']);
  });

  describe('with a warm cache', () => {
    const KEY = 'Linux-build-1.79.0';

    /** `cargo test` notes what it found in target/ before writing `output` there. */
    function incrementalBuild(output: () => string, seen: (string | null)[]): ProcessHandler {
      return (req) => {
        if ([req.command, ...req.args].join(' ') === 'cargo test --workspace') {
          const file = join(req.cwd, 'target', 'debug', 'chat-bot-test');
          seen.push(existsSync(file) ? readFileSync(file, 'utf8') : null);
          mkdirSync(join(req.cwd, 'target', 'debug'), { recursive: true });
          writeFileSync(file, output());
        }
        return {};
      };
    }

    it('restores the cached files before the build and does not save them again unchanged', async () => {
      const seen: (string | null)[] = [];
      ctx = createTestServices({ handler: incrementalBuild(() => 'build 1', seen) });
      const save = jest.spyOn(ctx.services.cache, 'save');

      const first = await executeJob(buildJob(), { runId: 'run-1', event: PUSH, services: ctx.services });
      const second = await executeJob(buildJob(), { runId: 'run-2', event: PUSH, services: ctx.services });

      expect(first.status).toBe('succeeded');
      expect(second.status).toBe('succeeded');
      expect(ctx.environments.provisioned).toEqual(['build', 'build']);
      expect(seen).toEqual([null, 'build 1']);
      expect(save).toHaveBeenCalledTimes(1);
      expect(save.mock.calls[0]?.[0]).toBe(KEY);
    });

    it('saves again under the same key when the cached content changed', async () => {
      const seen: (string | null)[] = [];
      let build = 0;
      ctx = createTestServices({ handler: incrementalBuild(() => `build ${++build}`, seen) });
      const save = jest.spyOn(ctx.services.cache, 'save');

      await executeJob(buildJob(), { runId: 'run-1', event: PUSH, services: ctx.services });
      const [before] = await ctx.services.cache.list();
      await executeJob(buildJob(), { runId: 'run-2', event: PUSH, services: ctx.services });
      const entries = await ctx.services.cache.list();

      expect(seen).toEqual([null, 'build 1']);
      expect(save.mock.calls.map((call) => call[0])).toEqual([KEY, KEY]);
      expect(entries.map((e) => e.key)).toEqual([KEY]);
      expect(entries[0]?.contentHash).not.toBe(before?.contentHash);
    });
  });

  it('fails the job when its environment cannot be provisioned', async () => {
    ctx = createTestServices();

    const result = await executeJob(buildJob(), {
      runId: 'run-1',
      event: PUSH,
      services: {
        ...ctx.services,
        environments: {
          provision: async () => {
            throw new Error('no runner for ubuntu-latest');
          },
        },
      },
    });

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({ kind: 'environment', message: 'no runner for ubuntu-latest' });
    expect(result.steps.every((s) => s.status === 'skipped')).toBe(true);
    expect(ctx.processes.calls).toEqual([]);
  });

  it('disposes the environment even when a step fails', async () => {
    ctx = createTestServices({ handler: cargoProject(['cargo test --workspace']) });

    await executeJob(buildJob(), { runId: 'run-1', event: PUSH, services: ctx.services });

    expect(ctx.environments.disposed).toEqual(['build']);
  });

  it('renders a cache key that needs a toolchain only after one is installed', async () => {
    const early = parsePipelineDefinition(`
name: early
on: { push: { branch: main } }
jobs:
  build:
    steps:
      - kind: restore-or-seed-cache
        key: "{{ os }}-{{ toolchain.hash }}"
        paths: [target]
`);
    ctx = createTestServices();
    const job = early.jobs['build'];
    if (!job) throw new Error('build job missing');

    const result = await executeJob(job, { runId: 'run-1', event: PUSH, services: ctx.services });

    expect(result.status).toBe('failed');
    expect(result.error?.message).toBe(
      "Cache key '{{ os }}-{{ toolchain.hash }}' uses the toolchain, but no install-toolchain step ran before it",
    );
  });
});
