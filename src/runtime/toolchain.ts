import { runChecked, type CommandContext, type ProcessRunner } from './process-runner.js';
import { sha256Hex } from '../shared/redact.js';
import type { ToolchainInfo } from '../cache/key.js';
import type { Toolchain } from './types.js';

/** rustc prints a 9-character short commit hash in `rustc -V`; keys use the same length. */
const SHORT_HASH_LENGTH = 9;

export function parseCompilerHash(versionOutput: string): string {
  const commit = /^commit-hash:\s*([0-9a-f]+)/m.exec(versionOutput);
  if (commit?.[1]) return commit[1].slice(0, SHORT_HASH_LENGTH);
  // No commit hash (locally built compiler): fall back to the whole version banner
  return sha256Hex(versionOutput.trim()).slice(0, SHORT_HASH_LENGTH);
}

/**
 * Installs toolchains with rustup. With `override`, the version is pinned for
 * the job workspace so plain `cargo` picks it up.
 */
export class RustupToolchain implements Toolchain {
  constructor(
    private readonly processes: ProcessRunner,
    private readonly rustupBin = 'rustup',
  ) {}

  async install(version: string, override: boolean, ctx: CommandContext): Promise<ToolchainInfo> {
    await runChecked(this.processes, {
      command: this.rustupBin,
      args: ['toolchain', 'install', version, '--profile', 'minimal', '--no-self-update'],
      ...ctx,
    });

    if (override) {
      await runChecked(this.processes, {
        command: this.rustupBin,
        args: ['override', 'set', version],
        ...ctx,
      });
    }

    const { stdout } = await runChecked(this.processes, {
      command: this.rustupBin,
      args: ['run', version, 'rustc', '--version', '--verbose'],
      ...ctx,
    });

    return { version, hash: parseCompilerHash(stdout) };
  }
}
