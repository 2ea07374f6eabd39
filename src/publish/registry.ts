import { PublishFailure, StepFailure } from '../shared/errors.js';
import { maskSecret } from '../shared/redact.js';
import type { CommandContext, ProcessResult, ProcessRunner } from '../runtime/process-runner.js';

export interface RegistryLogin {
  /** Registry host; omitted means the docker default. */
  registry?: string;
  username: string;
  token: string;
}

/**
 * Container image sink. Every operation fails with PublishFailure; a push that
 * dies halfway is left as the registry keeps it, nothing is rolled back.
 */
export interface ContainerRegistry {
  login(login: RegistryLogin, ctx: CommandContext): Promise<void>;
  build(tag: string, contextDir: string, ctx: CommandContext): Promise<void>;
  push(tag: string, ctx: CommandContext): Promise<void>;
}

export interface DockerRegistryOptions {
  dockerBin?: string;
}

/**
 * Drives the docker CLI. Credentials land in `$DOCKER_CONFIG` of the job
 * environment, so a login never outlives its job.
 */
export class DockerRegistryClient implements ContainerRegistry {
  private readonly dockerBin: string;

  constructor(
    private readonly processes: ProcessRunner,
    opts: DockerRegistryOptions = {},
  ) {
    this.dockerBin = opts.dockerBin ?? 'docker';
  }

  async login(login: RegistryLogin, ctx: CommandContext): Promise<void> {
    maskSecret(login.token);
    const args = ['login', '--username', login.username, '--password-stdin'];
    if (login.registry) args.push(login.registry);
    await this.docker(args, ctx, `docker login ${login.registry ?? ''}`.trim(), login.token);
  }

  async build(tag: string, contextDir: string, ctx: CommandContext): Promise<void> {
    await this.docker(['build', '--tag', tag, contextDir], ctx, `docker build ${tag}`);
  }

  async push(tag: string, ctx: CommandContext): Promise<void> {
    await this.docker(['push', tag], ctx, `docker push ${tag}`);
  }

  private async docker(args: string[], ctx: CommandContext, describe: string, stdin?: string): Promise<void> {
    let result: ProcessResult;
    try {
      result = await this.processes.run({ command: this.dockerBin, args, stdin, ...ctx });
    } catch (err) {
      if (err instanceof StepFailure) throw new PublishFailure(err.message, 'registry', err.exitCode);
      throw err;
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n').pop() ?? '';
      throw new PublishFailure(
        `${describe} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
        'registry',
        result.exitCode,
      );
    }
  }
}
