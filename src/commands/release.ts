import path from 'path';
import chalk from 'chalk';
import { loadContext } from '../core/context.js';
import { errorMessage } from '../core/errors.js';
import { newClient } from '../core/git-client.js';
import { ScoopPipe } from '../core/scoop-pipe.js';
import { reportOutcome } from './publish.js';
import type { PhaseOptions } from './run.js';

export const releaseCommand = async (options: PhaseOptions) => {
  const pipe = new ScoopPipe();

  try {
    const ctx = await loadContext(options);
    if (pipe.skip(ctx)) {
      console.log(chalk.yellow(`\n[~] ${pipe.name}: skipped: scoop.bucket.name is not set`));
      return;
    }

    const client = newClient(ctx);

    console.log(chalk.blue(`\n[▸] ${pipe.name}: ${ctx.projectName} ${ctx.tag}`));
    const manifest = await pipe.run(ctx, client);
    console.log(chalk.green(`  ✓ Manifest written: ${path.relative(ctx.baseDir, manifest.path)}`));

    reportOutcome(await pipe.publish(ctx, client, manifest));
  } catch (err) {
    console.error(chalk.red(`\n[x] Release failed: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
