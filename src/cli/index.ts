#!/usr/bin/env node
import { Command } from 'commander';
import { errorMessage } from '../shared/errors.js';
import { setLogLevel } from '../shared/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerValidateCommands } from './commands/validate.js';
import { registerRunCommand } from './commands/run.js';
import { registerRunsCommand } from './commands/runs.js';
import { registerArtifactsCommand } from './commands/artifacts.js';
import { registerCacheCommand } from './commands/cache.js';
import { registerVaultCommand } from './commands/vault.js';
import { registerServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('pipewright')
  .description('Push-triggered build, test and publish pipelines')
  .version('0.1.0')
  .option('--verbose', 'Log debug output')
  .hook('preAction', (command) => {
    if (command.opts<{ verbose?: boolean }>().verbose) setLogLevel('debug');
  });

registerInitCommand(program);
registerValidateCommands(program);
registerRunCommand(program);
registerRunsCommand(program);
registerArtifactsCommand(program);
registerCacheCommand(program);
registerVaultCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
