import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { logger } from '../shared/logger.js';
import type { PushEvent } from '../pipeline/types.js';

/**
 * An isolated place for one job to run. Created fresh per job and thrown away
 * afterwards; the cache store is the only way state survives between jobs.
 */
export interface ExecutionEnvironment {
  id: string;
  /** OS identifier used in cache keys ("Linux", "macOS", "Windows"). */
  os: string;
  /** Runner label the job asked for. */
  runsOn: string;
  /** Checkout target; relative step paths resolve here. */
  workspaceDir: string;
  /** `HOME` for every process in the job; `~/` cache paths resolve here. */
  homeDir: string;
  env: Record<string, string>;
  dispose(): Promise<void>;
}

export interface ProvisionRequest {
  runId: string;
  jobId: string;
  runsOn: string;
  event: PushEvent;
}

export interface EnvironmentProvider {
  provision(req: ProvisionRequest): Promise<ExecutionEnvironment>;
}

export function osIdentifier(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'linux':
      return 'Linux';
    case 'darwin':
      return 'macOS';
    case 'win32':
      return 'Windows';
    default:
      return platform;
  }
}

export interface LocalEnvironmentOptions {
  /** Parent directory for job environments (default: OS temp dir). */
  baseDir?: string;
  /** Variables copied from the engine's environment when set. */
  passthrough?: string[];
  /** Extra variables for every job. */
  env?: Record<string, string>;
  /** Keep job directories after the job ends (debugging). */
  keep?: boolean;
}

const DEFAULT_PASSTHROUGH = ['PATH', 'LANG', 'TERM', 'TZ'];

/**
 * Provisions each job in a new temp directory on this machine, with its own
 * workspace and home. Installed toolchains stay shared through RUSTUP_HOME;
 * build state does not.
 */
export class LocalEnvironmentProvider implements EnvironmentProvider {
  constructor(private readonly opts: LocalEnvironmentOptions = {}) {}

  async provision(req: ProvisionRequest): Promise<ExecutionEnvironment> {
    const baseDir = this.opts.baseDir ?? tmpdir();
    mkdirSync(baseDir, { recursive: true });
    const root = mkdtempSync(join(baseDir, `pipewright-${req.jobId}-`));
    const workspaceDir = join(root, 'workspace');
    const homeDir = join(root, 'home');
    mkdirSync(workspaceDir, { recursive: true });
    mkdirSync(homeDir, { recursive: true });

    const env: Record<string, string> = {};
    for (const name of this.opts.passthrough ?? DEFAULT_PASSTHROUGH) {
      const value = process.env[name];
      if (value !== undefined) env[name] = value;
    }
    Object.assign(env, {
      HOME: homeDir,
      DOCKER_CONFIG: join(homeDir, '.docker'),
      RUSTUP_HOME: process.env['RUSTUP_HOME'] ?? join(homedir(), '.rustup'),
      CI: 'true',
      PIPEWRIGHT_RUN_ID: req.runId,
      PIPEWRIGHT_JOB: req.jobId,
      PIPEWRIGHT_BRANCH: req.event.branch,
      PIPEWRIGHT_SHA: req.event.sha,
      ...this.opts.env,
    });

    const keep = this.opts.keep ?? false;
    logger.debug('Provisioned job environment', { job: req.jobId, root });

    return {
      id: root,
      os: osIdentifier(),
      runsOn: req.runsOn,
      workspaceDir,
      homeDir,
      env,
      dispose: async () => {
        if (keep) return;
        rmSync(root, { recursive: true, force: true });
      },
    };
  }
}
