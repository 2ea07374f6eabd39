import type { InstallToolchainStep } from '../../pipeline/types.js';
import type { StepContext } from '../types.js';

export async function installToolchain(step: InstallToolchainStep, ctx: StepContext): Promise<void> {
  const info = await ctx.services.toolchain.install(step.version, step.override, ctx.command);
  ctx.state.toolchain = info;
  ctx.log.info('Toolchain ready', { version: info.version, hash: info.hash, override: step.override });
}
