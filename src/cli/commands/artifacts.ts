import type { Command } from 'commander';
import { ArtifactStore } from '../../publish/artifacts.js';
import { requireWorkspace } from '../cli-shared.js';

export function registerArtifactsCommand(program: Command): void {
  const artifacts = program.command('artifacts').description('Inspect published artifacts');

  artifacts
    .command('list')
    .description('List artifacts, newest first')
    .option('--run <id>', 'Only artifacts of this run')
    .action((opts: { run?: string }) => {
      const { db, paths } = requireWorkspace();
      const list = new ArtifactStore(db, paths.artifactsDir).list(opts.run);
      if (list.length === 0) {
        console.log('No artifacts.');
        return;
      }
      for (const a of list) {
        console.log(`${a.name}  run=${a.run_id}  ${a.size_bytes} bytes  sha256=${a.sha256.slice(0, 12)}  ${a.stored_path}`);
      }
    });

  artifacts
    .command('latest <name>')
    .description('Show the most recent upload of an artifact')
    .action((name: string) => {
      const { db, paths } = requireWorkspace();
      const record = new ArtifactStore(db, paths.artifactsDir).latest(name);
      if (!record) {
        console.error(`No artifact named ${name}`);
        process.exit(1);
      }
      console.log(record.stored_path);
    });
}
