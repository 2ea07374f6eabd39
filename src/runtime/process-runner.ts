import { spawn, type ChildProcessWithoutNullStreams, type SpawnOptionsWithoutStdio } from 'node:child_process';
import { StepFailure } from '../shared/errors.js';

export interface ProcessRequest {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  /** Written to the child's stdin, then stdin is closed. Never logged. */
  stdin?: string;
  signal?: AbortSignal;
  /** Receives each complete output line as it arrives. */
  onLine?: (line: string, stream: 'stdout' | 'stderr') => void;
}

/** Where and how a command runs: everything in a request except the command itself. */
export type CommandContext = Pick<ProcessRequest, 'cwd' | 'env' | 'signal' | 'onLine'>;

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(req: ProcessRequest): Promise<ProcessResult>;
}

export interface SpawnProcessRunnerOptions {
  spawn?: typeof spawn;
  /** Bytes of stdout/stderr kept in the result (the tail is kept). */
  maxCapture?: number;
}

const DEFAULT_MAX_CAPTURE = 64 * 1024;

class LineSplitter {
  private pending = '';

  constructor(private readonly emit: (line: string) => void) {}

  push(chunk: string): void {
    const parts = (this.pending + chunk).split('\n');
    this.pending = parts.pop() ?? '';
    for (const part of parts) this.emit(part.replace(/\r$/, ''));
  }

  flush(): void {
    if (this.pending) this.emit(this.pending);
    this.pending = '';
  }
}

/**
 * Runs external commands with `child_process.spawn`. The environment is
 * exactly `req.env`; nothing is inherited from the engine's own process.
 */
export class SpawnProcessRunner implements ProcessRunner {
  private readonly spawnImpl: typeof spawn;
  private readonly maxCapture: number;

  constructor(opts: SpawnProcessRunnerOptions = {}) {
    this.spawnImpl = opts.spawn ?? spawn;
    this.maxCapture = opts.maxCapture ?? DEFAULT_MAX_CAPTURE;
  }

  run(req: ProcessRequest): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      if (req.signal?.aborted) {
        reject(new StepFailure(`Cancelled before starting ${req.command}`));
        return;
      }

      const child = this.spawnImpl(req.command, req.args, {
        cwd: req.cwd,
        env: req.env,
        stdio: 'pipe',
        signal: req.signal,
      } as SpawnOptionsWithoutStdio) as ChildProcessWithoutNullStreams;

      let stdout = '';
      let stderr = '';
      const keepTail = (buf: string) =>
        buf.length > this.maxCapture ? buf.slice(buf.length - this.maxCapture) : buf;

      const outLines = new LineSplitter((line) => req.onLine?.(line, 'stdout'));
      const errLines = new LineSplitter((line) => req.onLine?.(line, 'stderr'));

      child.stdout.on('data', (chunk: Buffer) => {
        const text = chunk.toString('utf8');
        stdout = keepTail(stdout + text);
        outLines.push(text);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        const text = chunk.toString('utf8');
        stderr = keepTail(stderr + text);
        errLines.push(text);
      });

      child.on('error', (err) => {
        if (err.name === 'AbortError') {
          reject(new StepFailure(`${req.command} was cancelled`));
          return;
        }
        reject(new StepFailure(`Failed to start ${req.command}: ${err.message}`));
      });

      child.on('close', (code, signal) => {
        outLines.flush();
        errLines.flush();
        resolve({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
      });

      // A child that exits without reading stdin closes the pipe; its exit code decides the outcome
      child.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EPIPE' || err.code === 'ERR_STREAM_DESTROYED') return;
        child.kill();
        reject(new StepFailure(`Failed to write stdin of ${req.command}: ${err.message}`));
      });

      if (req.stdin !== undefined) child.stdin.write(req.stdin);
      child.stdin.end();
    });
  }
}

/**
 * Run a command and turn a non-zero exit into a StepFailure carrying the exit code.
 */
export async function runChecked(
  runner: ProcessRunner,
  req: ProcessRequest,
  describe: string = [req.command, ...req.args].join(' '),
): Promise<ProcessResult> {
  const result = await runner.run(req);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim().split('\n').pop() ?? '';
    throw new StepFailure(
      `${describe} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
      result.exitCode,
    );
  }
  return result;
}
