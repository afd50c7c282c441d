import fs from 'fs/promises';
import path from 'path';
import YAML from 'yaml';
import { ZodError } from 'zod';
import {
  DEFAULT_COMMIT_MESSAGE,
  DEFAULT_GOAMD64,
  ProjectConfigSchema,
  type ProjectConfig,
  type ProjectConfigInput,
} from '../types/index.js';
import { atomicWrite } from './atomic-fs.js';

export const CONFIG_FILENAME = '.scoop-bucket.yaml';

export class ConfigManager {
  public baseDir: string;
  public configPath: string;

  constructor(baseDir: string = process.cwd(), configPath?: string) {
    this.baseDir = baseDir;
    this.configPath = configPath ? path.resolve(baseDir, configPath) : path.join(baseDir, CONFIG_FILENAME);
  }

  async init(data: ProjectConfigInput = {}): Promise<ProjectConfig> {
    const projectName = data.project_name || path.basename(this.baseDir);
    const config = ProjectConfigSchema.parse({
      ...data,
      project_name: projectName,
      scoop: {
        ...data.scoop,
        bucket: {
          ...data.scoop?.bucket,
          owner: data.scoop?.bucket?.owner || 'your-org',
          name: data.scoop?.bucket?.name || 'scoop-bucket',
        },
      },
    });

    await atomicWrite(this.configPath, YAML.stringify(config));
    return config;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  /** Load, validate and default the configuration. */
  async load(): Promise<ProjectConfig> {
    const content = await fs.readFile(this.configPath, 'utf8');
    const raw: unknown = YAML.parse(content) ?? {};
    try {
      return applyDefaults(ProjectConfigSchema.parse(raw), this.baseDir);
    } catch (err) {
      if (err instanceof ZodError) {
        const issues = err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`invalid config ${this.configPath}: ${issues}`);
      }
      throw err;
    }
  }
}

/**
 * Fill in the defaults that depend on other settings, or that an
 * explicitly empty value should not override.
 */
export function applyDefaults(config: ProjectConfig, baseDir: string): ProjectConfig {
  const projectName = config.project_name || path.basename(baseDir);
  return {
    ...config,
    project_name: projectName,
    scoop: {
      ...config.scoop,
      name: config.scoop.name || projectName,
      commit_msg_template: config.scoop.commit_msg_template || DEFAULT_COMMIT_MESSAGE,
      goamd64: config.scoop.goamd64 || DEFAULT_GOAMD64,
    },
  };
}
