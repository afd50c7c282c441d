import path from 'path';
import type { ProjectConfig, ReleaseContext } from '../types/index.js';
import { ConfigManager } from './config.js';
import { parseSemver } from './semver.js';

export interface ContextOptions {
  config: ProjectConfig;
  tag: string;
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
}

/** Process env plus the config's `KEY=value` entries, which take precedence. */
function buildEnv(processEnv: NodeJS.ProcessEnv, entries: string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) env[key] = value;
  }
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq <= 0) {
      throw new Error(`invalid env entry '${entry}': expected KEY=value`);
    }
    env[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return env;
}

export function createContext(options: ContextOptions): ReleaseContext {
  const { config, tag } = options;
  const baseDir = options.baseDir ?? process.cwd();
  const semver = parseSemver(tag);

  return {
    config,
    projectName: config.project_name,
    tag,
    version: tag.replace(/^v/, ''),
    semver,
    env: buildEnv(options.env ?? process.env, config.env),
    baseDir,
    dist: path.resolve(baseDir, config.dist),
  };
}

export async function loadContext(options: {
  tag: string;
  config?: string;
  baseDir?: string;
}): Promise<ReleaseContext> {
  const baseDir = options.baseDir ?? process.cwd();
  const manager = new ConfigManager(baseDir, options.config);
  if (!(await manager.exists())) {
    throw new Error(`No config found at ${manager.configPath}. Run \`scoop-bucket init\` first.`);
  }
  const config = await manager.load();
  return createContext({ config, tag: options.tag, baseDir });
}
