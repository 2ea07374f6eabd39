import { describe, it, expect, jest } from '@jest/globals';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { ChildProcessWithoutNullStreams } from 'node:child_process';
import { SpawnProcessRunner, runChecked } from '../runtime/process-runner.js';
import { StepFailure } from '../shared/errors.js';
import { FakeProcessRunner } from './test-helpers.js';

type SpawnFn = typeof import('node:child_process').spawn;

function createMockChild(stdinChunks: string[]): ChildProcessWithoutNullStreams {
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const stdin = new PassThrough();
  stdin.on('data', (chunk: Buffer) => stdinChunks.push(chunk.toString('utf8')));

  const child = new EventEmitter() as ChildProcessWithoutNullStreams;
  Object.assign(child, {
    stdout,
    stderr,
    stdin,
    pid: 123,
    kill: jest.fn(() => true),
  });
  return child;
}

describe('SpawnProcessRunner', () => {
  it('runs with exactly the given environment and streams complete lines', async () => {
    const stdinChunks: string[] = [];
    const child = createMockChild(stdinChunks);
    const spawnMock = jest.fn(() => child);
    const runner = new SpawnProcessRunner({ spawn: spawnMock as unknown as SpawnFn });
    const lines: [string, string][] = [];

    const running = runner.run({
      command: 'cargo',
      args: ['test'],
      cwd: '/work',
      env: { HOME: '/home/job' },
      stdin: 'input',
      onLine: (line, stream) => lines.push([stream, line]),
    });

    setImmediate(() => {
      (child.stdout as PassThrough).write('running 2 tests\ntest a ... ');
      (child.stdout as PassThrough).write('ok\r\n');
      (child.stderr as PassThrough).write('warning: unused');
      setImmediate(() => child.emit('close', 0, null));
    });

    const result = await running;
    expect(result).toEqual({
      exitCode: 0,
      stdout: 'running 2 tests\ntest a ... ok\r\n',
      stderr: 'warning: unused',
    });
    expect(lines).toEqual([
      ['stdout', 'running 2 tests'],
      ['stdout', 'test a ... ok'],
      ['stderr', 'warning: unused'],
    ]);
    expect(stdinChunks.join('')).toBe('input');

    const firstCall = spawnMock.mock.calls[0] as unknown as [string, string[], { cwd: string; env: Record<string, string> }];
    expect(firstCall[0]).toBe('cargo');
    expect(firstCall[1]).toEqual(['test']);
    expect(firstCall[2].env).toEqual({ HOME: '/home/job' });
    expect(firstCall[2].cwd).toBe('/work');
  });

  it('reports a process killed by a signal as exit code 128', async () => {
    const child = createMockChild([]);
    const runner = new SpawnProcessRunner({ spawn: jest.fn(() => child) as unknown as SpawnFn });

    const running = runner.run({ command: 'cargo', args: [], cwd: '/work', env: {} });
    setImmediate(() => child.emit('close', null, 'SIGKILL'));

    await expect(running).resolves.toMatchObject({ exitCode: 128 });
  });

  it('rejects with a step failure when the command cannot start', async () => {
    const child = createMockChild([]);
    const runner = new SpawnProcessRunner({ spawn: jest.fn(() => child) as unknown as SpawnFn });

    const running = runner.run({ command: 'rustup', args: [], cwd: '/work', env: {} });
    setImmediate(() => child.emit('error', new Error('spawn rustup ENOENT')));

    await expect(running).rejects.toThrow('Failed to start rustup: spawn rustup ENOENT');
  });

  it('lets the exit code decide when the child closes stdin without reading it', async () => {
    const child = createMockChild([]);
    const runner = new SpawnProcessRunner({ spawn: jest.fn(() => child) as unknown as SpawnFn });

    const running = runner.run({
      command: 'docker',
      args: ['login', '--password-stdin'],
      cwd: '/work',
      env: {},
      stdin: 'test-secret',
    });
    setImmediate(() => {
      child.stdin.emit('error', Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
      (child.stderr as PassThrough).write('Error: Cannot perform an interactive login\n');
      setImmediate(() => child.emit('close', 1, null));
    });

    await expect(running).resolves.toEqual({
      exitCode: 1,
      stdout: '',
      stderr: 'Error: Cannot perform an interactive login\n',
    });
    expect(child.kill).not.toHaveBeenCalled();
  });

  it('fails the command on any other stdin error', async () => {
    const child = createMockChild([]);
    const runner = new SpawnProcessRunner({ spawn: jest.fn(() => child) as unknown as SpawnFn });

    const running = runner.run({ command: 'docker', args: ['login'], cwd: '/work', env: {}, stdin: 'test-secret' });
    setImmediate(() => child.stdin.emit('error', Object.assign(new Error('write EIO'), { code: 'EIO' })));

    await expect(running).rejects.toThrow('Failed to write stdin of docker: write EIO');
    expect(child.kill).toHaveBeenCalled();
  });

  it('does not start anything once the signal is aborted', async () => {
    const spawnMock = jest.fn();
    const runner = new SpawnProcessRunner({ spawn: spawnMock as unknown as SpawnFn });
    const controller = new AbortController();
    controller.abort();

    await expect(
      runner.run({ command: 'cargo', args: [], cwd: '/work', env: {}, signal: controller.signal }),
    ).rejects.toBeInstanceOf(StepFailure);
    expect(spawnMock).not.toHaveBeenCalled();
  });
});

describe('runChecked', () => {
  it('returns the result of a successful command', async () => {
    const runner = new FakeProcessRunner(() => ({ stdout: 'ok' }));
    await expect(runChecked(runner, { command: 'git', args: ['status'], cwd: '/w', env: {} })).resolves.toMatchObject({
      stdout: 'ok',
    });
  });

  it('includes the exit code and the last stderr line in the failure', async () => {
    const runner = new FakeProcessRunner(() => ({ exitCode: 2, stderr: 'first\nlast line\n' }));
    await expect(runChecked(runner, { command: 'git', args: ['fetch'], cwd: '/w', env: {} })).rejects.toMatchObject({
      exitCode: 2,
      message: 'git fetch exited with code 2: last line',
    });
  });
});
