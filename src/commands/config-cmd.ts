import chalk from 'chalk';
import YAML from 'yaml';
import { ConfigManager } from '../core/config.js';
import { errorMessage } from '../core/errors.js';

export const configGetCommand = async (key: string | undefined, options: { config?: string } = {}) => {
  const configManager = new ConfigManager(process.cwd(), options.config);

  try {
    if (!(await configManager.exists())) {
      console.error(chalk.red('[scoop-bucket] No config found. Run `scoop-bucket init` first.'));
      process.exitCode = 1;
      return;
    }

    const config = await configManager.load();

    if (!key) {
      console.log(chalk.bold.blue('\n[Config]\n'));
      console.log(YAML.stringify(config));
      return;
    }

    const value = getNestedValue(config, key);
    if (value === undefined) {
      console.error(chalk.red(`[scoop-bucket] Key '${key}' not found in config.`));
      process.exitCode = 1;
      return;
    }

    if (typeof value === 'object' && value !== null) {
      console.log(YAML.stringify(value));
    } else {
      console.log(String(value));
    }
  } catch (err) {
    console.error(chalk.red(`[scoop-bucket] Failed to read config: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};

function getNestedValue(obj: object, key: string): unknown {
  return key.split('.').reduce<unknown>((acc, part) => {
    if (acc && typeof acc === 'object' && Object.hasOwn(acc, part)) {
      return Reflect.get(acc, part);
    }
    return undefined;
  }, obj);
}
