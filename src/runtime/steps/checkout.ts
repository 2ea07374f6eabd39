import { runChecked } from '../process-runner.js';
import type { CheckoutSourceStep } from '../../pipeline/types.js';
import type { StepContext } from '../types.js';

/**
 * Clone the pushed repository into the (empty) job workspace and check out
 * exactly the pushed commit.
 */
export async function checkoutSource(_step: CheckoutSourceStep, ctx: StepContext): Promise<void> {
  const repository = ctx.event.repository ?? ctx.services.defaultRepository;
  const { processes } = ctx.services;

  await runChecked(processes, {
    command: 'git',
    args: ['clone', '--quiet', '--no-checkout', '--', repository, '.'],
    ...ctx.command,
  }, `git clone ${repository}`);

  await runChecked(processes, {
    command: 'git',
    args: ['checkout', '--quiet', '--force', ctx.event.sha],
    ...ctx.command,
  });

  ctx.log.info('Checked out sources', { sha: ctx.event.sha });
}
