import { isAbsolute, relative, resolve } from 'node:path';
import { PublishFailure } from '../../shared/errors.js';
import { withRetry } from '../../shared/retry.js';
import type {
  AuthenticateRegistryStep,
  BuildContainerImageStep,
  PushContainerImageStep,
} from '../../pipeline/types.js';
import type { StepContext } from '../types.js';

export async function authenticateRegistry(step: AuthenticateRegistryStep, ctx: StepContext): Promise<void> {
  const token = await ctx.services.vault.getSecret(step.secret);
  if (token === null) {
    throw new PublishFailure(`Secret '${step.secret}' is not set in the ${ctx.services.vault.name} vault`, 'registry');
  }

  await withRetry(
    'registry login',
    ctx.services.retry,
    () => ctx.services.registry.login({ registry: step.registry, username: step.username, token }, ctx.command),
    ctx.signal,
  );
  ctx.log.info('Authenticated with registry', { registry: step.registry ?? 'default', username: step.username });
}

export async function buildContainerImage(step: BuildContainerImageStep, ctx: StepContext): Promise<void> {
  const { workspaceDir } = ctx.environment;
  const contextDir = resolve(workspaceDir, step.context);
  const rel = relative(workspaceDir, contextDir);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new PublishFailure(`Build context '${step.context}' is outside the job workspace`, 'registry');
  }

  await ctx.services.registry.build(step.tag, contextDir, ctx.command);
  ctx.log.info('Built container image', { tag: step.tag });
}

export async function pushContainerImage(step: PushContainerImageStep, ctx: StepContext): Promise<void> {
  await withRetry(
    `docker push ${step.tag}`,
    ctx.services.retry,
    () => ctx.services.registry.push(step.tag, ctx.command),
    ctx.signal,
  );
  ctx.log.info('Pushed container image', { tag: step.tag });
}
