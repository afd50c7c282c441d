import path from 'path';
import chalk from 'chalk';
import { loadContext } from '../core/context.js';
import { errorMessage } from '../core/errors.js';
import { newClient } from '../core/git-client.js';
import { ScoopPipe } from '../core/scoop-pipe.js';

export interface PhaseOptions {
  tag: string;
  config?: string;
}

export const runCommand = async (options: PhaseOptions) => {
  const pipe = new ScoopPipe();

  try {
    const ctx = await loadContext(options);
    if (pipe.skip(ctx)) {
      console.log(chalk.yellow(`\n[~] ${pipe.name}: skipped: scoop.bucket.name is not set`));
      return;
    }

    console.log(chalk.blue(`\n[▸] ${pipe.name}: ${ctx.projectName} ${ctx.tag}`));
    const manifest = await pipe.run(ctx, newClient(ctx));
    console.log(chalk.green(`  ✓ Manifest written: ${path.relative(ctx.baseDir, manifest.path)}`));
  } catch (err) {
    console.error(chalk.red(`\n[x] Run failed: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
