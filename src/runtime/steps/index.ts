/**
 * Step dispatch. Every handler either resolves or throws; a throw fails the step.
 */
import type { StepDefinition } from '../../pipeline/types.js';
import type { StepContext } from '../types.js';
import { checkoutSource } from './checkout.js';
import { installToolchain } from './toolchain.js';
import { restoreOrSeedCache } from './cache.js';
import { invokeBuild } from './build.js';
import { uploadArtifact } from './artifact.js';
import { authenticateRegistry, buildContainerImage, pushContainerImage } from './registry.js';

export { saveCaches } from './cache.js';

export async function executeStep(step: StepDefinition, ctx: StepContext): Promise<void> {
  switch (step.kind) {
    case 'checkout-source':
      return checkoutSource(step, ctx);
    case 'install-toolchain':
      return installToolchain(step, ctx);
    case 'restore-or-seed-cache':
      return restoreOrSeedCache(step, ctx);
    case 'invoke-build':
      return invokeBuild(step, ctx);
    case 'upload-artifact':
      return uploadArtifact(step, ctx);
    case 'authenticate-registry':
      return authenticateRegistry(step, ctx);
    case 'build-container-image':
      return buildContainerImage(step, ctx);
    case 'push-container-image':
      return pushContainerImage(step, ctx);
  }
}
