import { describe, it, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import type { FastifyInstance } from 'fastify';
import type Database from 'better-sqlite3';
import { buildApp } from '../api/server.js';
import { BackgroundRunDispatcher } from '../api/dispatcher.js';
import type { DispatchResult, RunDispatcher } from '../api/types.js';
import { parsePipelineDefinition } from '../pipeline/loader.js';
import { RunStore } from '../runs/store.js';
import { CyclicDependencyError, DefinitionError } from '../shared/errors.js';
import { setLogLevel } from '../shared/logger.js';
import { hmacSha256Hex } from '../shared/redact.js';
import type { PushEvent } from '../pipeline/types.js';
import { createTestDb, createTestServices } from './test-helpers.js';

const SECRET = 'test-secret';
const SHA = 'a1b2c3d4e5f60718293a4b5c6d7e8f9012345678';

class StubDispatcher implements RunDispatcher {
  readonly events: PushEvent[] = [];
  failWith: Error | null = null;
  drained = false;

  dispatch(event: PushEvent): DispatchResult {
    if (this.failWith) throw this.failWith;
    this.events.push(event);
    return event.branch === 'live' ? { triggered: true, runId: 'run-1' } : { triggered: false };
  }

  async drain(): Promise<void> {
    this.drained = true;
  }
}

function pushBody(ref: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    ref,
    after: SHA,
    repository: { clone_url: 'https://git.example.test/app.git', full_name: 'team/app' },
    pusher: { name: 'octo' },
    ...extra,
  });
}

function sign(body: string, secret = SECRET): string {
  return `sha256=${hmacSha256Hex(body, secret)}`;
}

describe('API server', () => {
  let app: FastifyInstance;
  let db: Database.Database;
  let dispatcher: StubDispatcher;

  beforeAll(() => {
    setLogLevel('error');
  });

  beforeEach(async () => {
    db = createTestDb();
    dispatcher = new StubDispatcher();
    app = await buildApp({ db, dispatcher, webhookSecret: SECRET });
  });

  afterEach(async () => {
    await app.close();
    db.close();
  });

  function postPush(body: string, headers: Record<string, string> = {}) {
    return app.inject({
      method: 'POST',
      url: '/v1/hooks/push',
      payload: body,
      headers: {
        'content-type': 'application/json',
        'x-github-event': 'push',
        'x-hub-signature-256': sign(body),
        ...headers,
      },
    });
  }

  it('reports health with security headers', async () => {
    const res = await app.inject({ method: 'GET', url: '/v1/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', version: '0.1.0' });
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-frame-options']).toBe('DENY');
  });

  it('starts a run for a signed push to the trigger branch', async () => {
    const res = await postPush(pushBody('refs/heads/live'));

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ triggered: true, run_id: 'run-1' });
    expect(dispatcher.events).toEqual([
      { branch: 'live', sha: SHA, repository: 'https://git.example.test/app.git', pusher: 'octo' },
    ]);
  });

  it('accepts a push to another branch without starting a run', async () => {
    const res = await postPush(pushBody('refs/heads/feature/login'));

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ triggered: false });
    expect(dispatcher.events.map((e) => e.branch)).toEqual(['feature/login']);
  });

  it('rejects a push signed with the wrong secret', async () => {
    const body = pushBody('refs/heads/live');
    const res = await postPush(body, { 'x-hub-signature-256': sign(body, 'other-secret') });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: 'Invalid signature' });
    expect(dispatcher.events).toEqual([]);
  });

  it('rejects an unsigned push when a secret is configured', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/hooks/push',
      payload: pushBody('refs/heads/live'),
      headers: { 'content-type': 'application/json', 'x-github-event': 'push' },
    });

    expect(res.statusCode).toBe(401);
  });

  it('answers ping deliveries', async () => {
    const body = JSON.stringify({ zen: 'Keep it logically awesome.' });
    const res = await postPush(body, { 'x-github-event': 'ping' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it('ignores events other than push', async () => {
    const res = await postPush(pushBody('refs/heads/live'), { 'x-github-event': 'issues' });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ triggered: false, reason: 'ignored event: issues' });
    expect(dispatcher.events).toEqual([]);
  });

  it('ignores tag pushes and branch deletions', async () => {
    const tag = await postPush(pushBody('refs/tags/v1.0.0'));
    const deleted = await postPush(pushBody('refs/heads/live', { deleted: true }));

    expect(tag.json()).toEqual({ triggered: false, reason: 'not a branch push' });
    expect(deleted.json()).toEqual({ triggered: false, reason: 'not a branch push' });
    expect(dispatcher.events).toEqual([]);
  });

  it('reports an invalid pipeline definition as 422', async () => {
    dispatcher.failWith = new DefinitionError("Job 'release' needs unknown job 'tset'");

    const res = await postPush(pushBody('refs/heads/live'));

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: "Job 'release' needs unknown job 'tset'" });
  });

  it('reports a broken job graph as 422', async () => {
    dispatcher.failWith = new CyclicDependencyError(['test', 'docker', 'test']);

    const res = await postPush(pushBody('refs/heads/live'));

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: 'Circular dependency detected in job graph: test -> docker -> test' });
  });

  it('hides unexpected dispatch errors', async () => {
    dispatcher.failWith = new Error('disk full');

    const res = await postPush(pushBody('refs/heads/live'));

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'Failed to start run' });
  });

  it('rejects a body that is not JSON', async () => {
    const res = await postPush('{not json');

    expect(res.statusCode).toBe(400);
  });

  it('lists recorded runs and shows one', async () => {
    const store = new RunStore(db);
    store.createRun({
      id: 'run-a',
      pipeline: 'Build',
      event: { branch: 'live', sha: 'abc1234' },
      startedAt: '2024-05-01T10:00:00.000Z',
      jobs: [{ id: 'test', name: 'Test' }],
    });
    store.createRun({
      id: 'run-b',
      pipeline: 'Build',
      event: { branch: 'main', sha: 'def5678' },
      startedAt: '2024-05-02T10:00:00.000Z',
      jobs: [],
    });

    const list = await app.inject({ method: 'GET', url: '/v1/runs?limit=10' });
    expect(list.statusCode).toBe(200);
    const listed = list.json<{ runs: { id: string }[]; limit: number; offset: number }>();
    expect(listed.runs.map((r) => r.id)).toEqual(['run-b', 'run-a']);
    expect(listed.limit).toBe(10);
    expect(listed.offset).toBe(0);

    const filtered = await app.inject({ method: 'GET', url: '/v1/runs?branch=live' });
    expect(filtered.json<{ runs: { id: string }[] }>().runs.map((r) => r.id)).toEqual(['run-a']);

    const detail = await app.inject({ method: 'GET', url: '/v1/runs/run-a' });
    expect(detail.statusCode).toBe(200);
    expect(detail.json()).toMatchObject({ id: 'run-a', status: 'running', jobs: [{ job_id: 'test', status: 'pending' }] });
  });

  it('rejects an out-of-range page size', async () => {
    const res = await app.inject({ method: 'GET', url: '/v1/runs?limit=0' });
    expect(res.statusCode).toBe(400);
  });

  it('returns 404 for an unknown run', async () => {
    const res = await app.inject({ method: 'GET', url: '/v1/runs/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Run not found' });
  });
});

describe('API server without a webhook secret', () => {
  it('drains the dispatcher on close', async () => {
    const dispatcher = new StubDispatcher();
    const app = await buildApp({ db: createTestDb(), dispatcher });

    await app.close();

    expect(dispatcher.drained).toBe(true);
  });

  it('accepts unsigned pushes', async () => {
    const dispatcher = new StubDispatcher();
    const app = await buildApp({ db: createTestDb(), dispatcher });

    const res = await app.inject({
      method: 'POST',
      url: '/v1/hooks/push',
      payload: pushBody('refs/heads/live'),
      headers: { 'content-type': 'application/json' },
    });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ triggered: true, run_id: 'run-1' });
    await app.close();
  });
});

describe('BackgroundRunDispatcher', () => {
  const definition = parsePipelineDefinition(`
name: Checkout
on: { push: { branch: live } }
jobs:
  fetch:
    steps:
      - kind: checkout-source
`);

  beforeAll(() => {
    setLogLevel('error');
  });

  it('runs a matching push in the background and records it', async () => {
    const ctx = createTestServices();
    const store = new RunStore(ctx.db);
    const dispatcher = new BackgroundRunDispatcher({ loadDefinition: () => definition, services: ctx.services, store });

    const result = dispatcher.dispatch({ branch: 'live', sha: 'abc1234', pusher: 'octo' });
    await dispatcher.drain();

    expect(result.triggered).toBe(true);
    if (!result.triggered) throw new Error('expected a run');
    const run = store.getRun(result.runId);
    expect(run).toMatchObject({ status: 'succeeded', triggered_by: 'octo', branch: 'live' });
    expect(run?.jobs.map((j) => [j.job_id, j.status])).toEqual([['fetch', 'succeeded']]);
    ctx.cleanup();
  });

  it('rejects a pipeline whose jobs need an unknown job before starting anything', async () => {
    const broken = parsePipelineDefinition(`
name: Broken
on: { push: { branch: live } }
jobs:
  publish:
    needs: [ghost]
    steps:
      - kind: checkout-source
`);
    const ctx = createTestServices();
    const store = new RunStore(ctx.db);
    const dispatcher = new BackgroundRunDispatcher({ loadDefinition: () => broken, services: ctx.services, store });
    const app = await buildApp({ db: ctx.db, dispatcher });

    const res = await app.inject({
      method: 'POST',
      url: '/v1/hooks/push',
      payload: pushBody('refs/heads/live'),
      headers: { 'content-type': 'application/json', 'x-github-event': 'push' },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: "Job 'publish' needs unknown job 'ghost'" });
    expect(store.listRuns()).toEqual([]);
    expect(ctx.processes.calls).toEqual([]);
    await app.close();
    ctx.cleanup();
  });

  it('does not start a run for another branch', async () => {
    const ctx = createTestServices();
    const store = new RunStore(ctx.db);
    const dispatcher = new BackgroundRunDispatcher({ loadDefinition: () => definition, services: ctx.services, store });

    expect(dispatcher.dispatch({ branch: 'main', sha: 'abc1234' })).toEqual({ triggered: false });
    await dispatcher.drain();

    expect(store.listRuns()).toEqual([]);
    expect(ctx.processes.calls).toEqual([]);
    ctx.cleanup();
  });
});
