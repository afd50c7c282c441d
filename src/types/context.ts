import type { ProjectConfig, PublishConfig } from './config.js';

// ─── Release Context ───

export interface Semver {
  major: number;
  minor: number;
  patch: number;
  prerelease: string;
  build: string;
}

export interface ReleaseContext {
  config: ProjectConfig;
  projectName: string;
  tag: string;
  /** Tag without its leading `v`. */
  version: string;
  semver: Semver;
  env: Record<string, string>;
  baseDir: string;
  /** Absolute path of the dist directory. */
  dist: string;
}

/** What the run phase hands to the publish phase. */
export interface ManifestArtifact {
  name: string;
  path: string;
  config: PublishConfig;
}

export type PublishOutcome =
  | { status: 'published'; repo: string; path: string }
  | { status: 'skipped'; reason: string };
