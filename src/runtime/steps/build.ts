import { runChecked } from '../process-runner.js';
import type { InvokeBuildStep } from '../../pipeline/types.js';
import type { StepContext } from '../types.js';

export function buildArgs(step: InvokeBuildStep): string[] {
  return step.mode === 'release' ? ['build', '--release', ...step.args] : ['test', ...step.args];
}

export async function invokeBuild(step: InvokeBuildStep, ctx: StepContext): Promise<void> {
  await runChecked(ctx.services.processes, {
    command: ctx.services.buildCommand,
    args: buildArgs(step),
    ...ctx.command,
  });
}
