import chalk from 'chalk';
import type { PublishOutcome } from '../types/index.js';
import { loadContext } from '../core/context.js';
import { errorMessage } from '../core/errors.js';
import { newClient } from '../core/git-client.js';
import { ScoopPipe } from '../core/scoop-pipe.js';
import type { PhaseOptions } from './run.js';

export function reportOutcome(outcome: PublishOutcome): void {
  if (outcome.status === 'skipped') {
    console.log(chalk.yellow(`  ~ skipped: ${outcome.reason}`));
  } else {
    console.log(chalk.green(`  ✓ Published ${outcome.path} to ${outcome.repo}`));
  }
}

export const publishCommand = async (options: PhaseOptions) => {
  const pipe = new ScoopPipe();

  try {
    const ctx = await loadContext(options);
    const manifest = await pipe.recorded(ctx);
    if (!manifest) {
      console.log(chalk.yellow(`\n[~] ${pipe.name}: skipped: no manifest recorded by run`));
      return;
    }

    console.log(chalk.blue(`\n[▸] ${pipe.name}: publishing ${manifest.name} ${ctx.tag}`));
    reportOutcome(await pipe.publish(ctx, newClient(ctx), manifest));
  } catch (err) {
    console.error(chalk.red(`\n[x] Publish failed: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
