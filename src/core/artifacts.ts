import fs from 'fs/promises';
import { createReadStream } from 'fs';
import path from 'path';
import { createHash, getHashes } from 'crypto';
import { z } from 'zod';
import {
  ArtifactRefSchema,
  type ArchiveArtifact,
  type ArtifactRef,
  type ArtifactType,
  type ScoopManifestArtifact,
} from '../types/index.js';
import { atomicWrite } from './atomic-fs.js';
import { ChecksumError, MetadataError, errorMessage } from './errors.js';

export const ARTIFACTS_FILENAME = 'artifacts.json';

// ─── Filters ───

export type ArtifactFilter = (artifact: ArtifactRef) => boolean;

export const byGoos = (goos: string): ArtifactFilter => a => a.goos === goos;
export const byGoarch = (goarch: string): ArtifactFilter => a => a.goarch === goarch;
export const byGoamd64 = (level: string): ArtifactFilter => a => a.goamd64 === level;
export const byType = (type: ArtifactType): ArtifactFilter => a => a.type === type;

export function and(...filters: ArtifactFilter[]): ArtifactFilter {
  return a => filters.every(f => f(a));
}

export function or(...filters: ArtifactFilter[]): ArtifactFilter {
  return a => filters.some(f => f(a));
}

export function isUploadableArchive(artifact: ArtifactRef): artifact is ArchiveArtifact {
  return artifact.type === 'Archive';
}

export function isScoopManifest(artifact: ArtifactRef): artifact is ScoopManifestArtifact {
  return artifact.type === 'ScoopManifest';
}

// ─── Store ───

export class ArtifactStore {
  private items: readonly ArtifactRef[];

  constructor(items: readonly ArtifactRef[] = []) {
    this.items = items;
  }

  /**
   * Load the artifact index an earlier build step wrote into dist.
   * Every archive must record the builds it packs. Relative artifact
   * paths are resolved against `baseDir`.
   */
  static async load(distDir: string, baseDir: string = process.cwd()): Promise<ArtifactStore> {
    const raw = await readIndex(path.join(distDir, ARTIFACTS_FILENAME));

    const items = raw.map((entry: unknown, index) => {
      const result = ArtifactRefSchema.safeParse(entry);
      if (!result.success) {
        throw new MetadataError(describeEntry(entry, index), formatIssues(result.error));
      }
      return { ...result.data, path: path.resolve(baseDir, result.data.path) };
    });

    return new ArtifactStore(items);
  }

  /**
   * Add an artifact to the index in dist, replacing earlier entries of
   * the same type. The path is stored relative to `baseDir`. A missing
   * index is created.
   */
  static async record(distDir: string, artifact: ArtifactRef, baseDir: string = process.cwd()): Promise<void> {
    const indexPath = path.join(distDir, ARTIFACTS_FILENAME);

    let raw: unknown[] = [];
    try {
      raw = await readIndex(indexPath);
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }

    const kept = raw.filter(entry => {
      const typed = z.object({ type: z.string() }).safeParse(entry);
      return !typed.success || typed.data.type !== artifact.type;
    });
    kept.push({ ...artifact, path: path.relative(baseDir, artifact.path) });

    await atomicWrite(indexPath, JSON.stringify(kept, null, 2));
  }

  filter(predicate: ArtifactFilter): ArtifactStore {
    return new ArtifactStore(this.items.filter(predicate));
  }

  list(): ArtifactRef[] {
    return [...this.items];
  }
}

async function readIndex(indexPath: string): Promise<unknown[]> {
  const raw: unknown = JSON.parse(await fs.readFile(indexPath, 'utf8'));
  if (!Array.isArray(raw)) {
    throw new MetadataError(indexPath, 'expected a JSON array of artifacts');
  }
  return raw;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describeEntry(entry: unknown, index: number): string {
  const named = z.object({ name: z.string() }).safeParse(entry);
  return named.success ? named.data.name : `#${index}`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

// ─── Checksums ───

const SUPPORTED_ALGORITHMS = ['md5', 'sha1', 'sha224', 'sha256', 'sha384', 'sha512'];

/** Hex digest of the artifact's file, read as a stream. */
export async function checksum(artifact: ArtifactRef, algorithm: string = 'sha256'): Promise<string> {
  if (!SUPPORTED_ALGORITHMS.includes(algorithm) || !getHashes().includes(algorithm)) {
    throw new ChecksumError(artifact.path, algorithm, 'unsupported algorithm');
  }

  const hash = createHash(algorithm);
  try {
    for await (const chunk of createReadStream(artifact.path)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw new ChecksumError(artifact.path, algorithm, errorMessage(err));
  }

  return hash.digest('hex');
}
