import inquirer from 'inquirer';
import chalk from 'chalk';
import path from 'path';
import { CONFIG_FILENAME, ConfigManager } from '../core/config.js';
import { errorMessage } from '../core/errors.js';

export interface InitOptions {
  yes?: boolean;
  name?: string;
  owner?: string;
  bucket?: string;
}

type InitAnswers = {
  project_name: string;
  owner: string;
  bucket: string;
  folder: string;
};

export const initCommand = async (options: InitOptions = {}) => {
  const baseDir = process.cwd();
  const configManager = new ConfigManager(baseDir);

  try {
    if (await configManager.exists()) {
      if (options.yes) {
        console.log(chalk.dim(`  ${CONFIG_FILENAME} already exists. Nothing to do.`));
        return;
      }
      const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([{
        type: 'confirm',
        name: 'overwrite',
        message: `${CONFIG_FILENAME} already exists. Overwrite?`,
        default: false,
      }]);
      if (!overwrite) {
        console.log(chalk.dim('  Aborted.'));
        return;
      }
    }

    const defaults: InitAnswers = {
      project_name: options.name || path.basename(baseDir),
      owner: options.owner || 'your-org',
      bucket: options.bucket || 'scoop-bucket',
      folder: '',
    };

    const answers = options.yes
      ? defaults
      : await inquirer.prompt<InitAnswers>([
          { type: 'input', name: 'project_name', message: 'Project name:', default: defaults.project_name },
          { type: 'input', name: 'owner', message: 'Bucket repository owner:', default: defaults.owner },
          { type: 'input', name: 'bucket', message: 'Bucket repository name:', default: defaults.bucket },
          { type: 'input', name: 'folder', message: 'Folder inside the bucket (blank for root):', default: '' },
        ]);

    await configManager.init({
      project_name: answers.project_name,
      scoop: {
        bucket: { owner: answers.owner, name: answers.bucket },
        folder: answers.folder,
      },
    });

    console.log(chalk.green(`  ✓ Wrote ${CONFIG_FILENAME}`));
    console.log(chalk.dim(`  Set release.github or scoop.url_template before running \`scoop-bucket run\`.`));
  } catch (err) {
    console.error(chalk.red(`\n[x] Init failed: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
