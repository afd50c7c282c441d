#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { configGetCommand } from './commands/config-cmd.js';
import { runCommand } from './commands/run.js';
import { publishCommand } from './commands/publish.js';
import { releaseCommand } from './commands/release.js';
import { setLogLevel } from './core/logger.js';

interface GlobalOptions {
  config?: string;
  debug?: boolean;
}

const program = new Command();

program
  .name('scoop-bucket')
  .description('Generate Scoop app manifests for a release and publish them to a bucket')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to the config file (default: .scoop-bucket.yaml)')
  .option('--debug', 'Verbose logging');

program.hook('preAction', () => {
  if (program.opts<GlobalOptions>().debug) setLogLevel('debug');
});

const globalConfig = () => program.opts<GlobalOptions>().config;

// ─── Setup ───
program
  .command('init')
  .description('Write a starter .scoop-bucket.yaml in the current directory')
  .option('-y, --yes', 'Accept defaults without prompting')
  .option('--name <name>', 'Project name')
  .option('--owner <owner>', 'Bucket repository owner')
  .option('--bucket <name>', 'Bucket repository name')
  .action(initCommand);

program
  .command('config [key]')
  .description('Show the resolved configuration (or a specific dotted key)')
  .action((key?: string) => configGetCommand(key, { config: globalConfig() }));

// ─── Phases ───
program
  .command('run')
  .description('Generate the scoop manifest into the dist directory')
  .requiredOption('-t, --tag <tag>', 'Release tag (e.g. v1.2.3)')
  .action((options: { tag: string }) => runCommand({ tag: options.tag, config: globalConfig() }));

program
  .command('publish')
  .description('Commit the previously generated manifest to the bucket')
  .requiredOption('-t, --tag <tag>', 'Release tag (e.g. v1.2.3)')
  .action((options: { tag: string }) => publishCommand({ tag: options.tag, config: globalConfig() }));

program
  .command('release')
  .description('Generate the manifest and publish it in one go')
  .requiredOption('-t, --tag <tag>', 'Release tag (e.g. v1.2.3)')
  .action((options: { tag: string }) => releaseCommand({ tag: options.tag, config: globalConfig() }));

await program.parseAsync(process.argv);

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
