import type { Command } from 'commander';
import { startServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the webhook receiver and run history API')
    .option('--host <host>', 'Bind host (default: 127.0.0.1)')
    .option('--port <port>', 'Port (default: 7800)')
    .action(async (opts: { host?: string; port?: string }) => {
      const port = opts.port ? parseInt(opts.port, 10) : undefined;
      await startServer({ host: opts.host, port });
      console.log('\nPress Ctrl+C to stop\n');
    });
}
