import { isAbsolute, relative, resolve } from 'node:path';
import { PublishFailure } from '../../shared/errors.js';
import type { UploadArtifactStep } from '../../pipeline/types.js';
import type { StepContext } from '../types.js';

export async function uploadArtifact(step: UploadArtifactStep, ctx: StepContext): Promise<void> {
  const { workspaceDir } = ctx.environment;
  const source = resolve(workspaceDir, step.path);
  const rel = relative(workspaceDir, source);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new PublishFailure(`Artifact path '${step.path}' is outside the job workspace`, 'artifact');
  }

  const record = await ctx.services.artifacts.upload(ctx.runId, step.artifact, source);
  ctx.log.info('Published artifact', { artifact: record.name, sha256: record.sha256 });
}
