import fs from 'fs/promises';
import path from 'path';
import { vi } from 'vitest';
import YAML from 'yaml';
import { applyDefaults } from '../../src/core/config.js';
import { createContext } from '../../src/core/context.js';
import type { GitClient, Repo } from '../../src/core/git-client.js';
import {
  ProjectConfigSchema,
  type ArchiveArtifact,
  type CommitAuthor,
  type ProjectConfigInput,
  type ReleaseContext,
} from '../../src/types/index.js';

export function makeContext(
  input: ProjectConfigInput = {},
  options: { tag?: string; baseDir?: string; env?: Record<string, string> } = {},
): ReleaseContext {
  const baseDir = options.baseDir ?? '/tmp/project';
  const config = applyDefaults(ProjectConfigSchema.parse({ project_name: 'myapp', ...input }), baseDir);
  return createContext({
    config,
    tag: options.tag ?? 'v1.0.0',
    baseDir,
    env: options.env ?? {},
  });
}

export function makeArchive(
  overrides: Partial<Omit<ArchiveArtifact, 'type'>> & { name: string },
): ArchiveArtifact {
  return {
    path: `/tmp/project/dist/${overrides.name}`,
    goos: 'windows',
    goarch: 'amd64',
    goamd64: 'v1',
    archive: {
      wrapped_in: '',
      builds: [{ name: 'myapp.exe', path: 'dist/myapp_windows_amd64_v1/myapp.exe', goos: 'windows', goarch: 'amd64', goamd64: 'v1', type: 'Binary' }],
    },
    ...overrides,
    type: 'Archive',
  };
}

/** Write an archive's bytes to disk so its checksum can be computed. */
export async function writeArchive(dir: string, name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
  return filePath;
}

export function fakeClient(urlTemplate = 'https://downloads.example.com/{{ .Tag }}/{{ .ArtifactName }}') {
  const client = {
    releaseUrlTemplate: vi.fn(async (_ctx: ReleaseContext) => urlTemplate),
    createFile: vi.fn(
      async (_author: CommitAuthor, _repo: Repo, _content: Buffer, _filePath: string, _message: string) => {},
    ),
    withToken: vi.fn((_token: string): GitClient => client),
  };
  return client;
}

export interface DistArchive {
  name: string;
  goarch: string;
  content: string;
}

/** Lay out a project: config file, dist/artifacts.json and the archives it lists. */
export async function writeProject(dir: string, config: object, archives: DistArchive[] = []): Promise<void> {
  await fs.writeFile(path.join(dir, '.scoop-bucket.yaml'), YAML.stringify(config), 'utf8');

  const index = [];
  for (const archive of archives) {
    await writeArchive(path.join(dir, 'dist'), archive.name, archive.content);
    index.push({
      name: archive.name,
      path: `dist/${archive.name}`,
      goos: 'windows',
      goarch: archive.goarch,
      goamd64: archive.goarch === 'amd64' ? 'v1' : '',
      type: 'Archive',
      archive: { wrapped_in: '', builds: [{ name: 'myapp.exe', path: 'dist/build/myapp.exe', type: 'Binary' }] },
    });
  }
  await fs.mkdir(path.join(dir, 'dist'), { recursive: true });
  await fs.writeFile(path.join(dir, 'dist', 'artifacts.json'), JSON.stringify(index), 'utf8');
}
