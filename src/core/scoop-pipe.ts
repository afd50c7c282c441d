import path from 'path';
import type {
  ManifestArtifact,
  PublishConfig,
  PublishOutcome,
  ReleaseContext,
  ScoopConfig,
} from '../types/index.js';
import { selectWindowsArchives } from './artifact-selector.js';
import { ArtifactStore, byType, isScoopManifest } from './artifacts.js';
import { atomicWrite } from './atomic-fs.js';
import type { GitClient } from './git-client.js';
import { logger } from './logger.js';
import { buildManifest, serializeManifest } from './manifest-builder.js';
import { publishManifest } from './publisher.js';
import { resolveResources } from './resource-resolver.js';

export function toPublishConfig(scoop: ScoopConfig): PublishConfig {
  return {
    bucket: scoop.bucket,
    folder: scoop.folder,
    commit_msg_template: scoop.commit_msg_template,
    commit_author: scoop.commit_author,
    skip_upload: scoop.skip_upload,
    url_template: scoop.url_template,
  };
}

/** Where the run phase writes the manifest for the given scoop config. */
export function manifestArtifactFor(ctx: ReleaseContext, scoop: ScoopConfig): ManifestArtifact {
  const name = `${scoop.name}.json`;
  return {
    name,
    path: path.join(ctx.dist, name),
    config: toPublishConfig(scoop),
  };
}

/** Builds a scoop manifest locally (run) and commits it to a bucket (publish). */
export class ScoopPipe {
  readonly name = 'scoop manifests';

  skip(ctx: ReleaseContext): boolean {
    return ctx.config.scoop.bucket.name === '';
  }

  async run(ctx: ReleaseContext, client: GitClient, store?: ArtifactStore): Promise<ManifestArtifact> {
    const scoop = ctx.config.scoop;
    const artifacts = store ?? (await ArtifactStore.load(ctx.dist, ctx.baseDir));

    const archives = selectWindowsArchives(artifacts, scoop.goamd64);
    const resolved = await resolveResources(ctx, client, scoop, archives);
    const content = serializeManifest(buildManifest(ctx, resolved.scoop, resolved.architecture));

    const manifest = manifestArtifactFor(ctx, resolved.scoop);
    logger.info('writing', { manifest: manifest.path });
    await atomicWrite(manifest.path, content);
    await ArtifactStore.record(ctx.dist, {
      name: manifest.name,
      path: manifest.path,
      goos: '',
      goarch: '',
      goamd64: '',
      type: 'ScoopManifest',
      scoop: manifest.config,
    }, ctx.baseDir);

    return manifest;
  }

  /**
   * The manifest the run phase recorded in the dist artifact index, with
   * the publish settings run resolved. Undefined when run recorded none.
   */
  async recorded(ctx: ReleaseContext): Promise<ManifestArtifact | undefined> {
    const store = await ArtifactStore.load(ctx.dist, ctx.baseDir);
    const entry = store.filter(byType('ScoopManifest')).list().find(isScoopManifest);
    return entry && { name: entry.name, path: entry.path, config: entry.scoop };
  }

  async publish(ctx: ReleaseContext, client: GitClient, manifest: ManifestArtifact): Promise<PublishOutcome> {
    return publishManifest(ctx, client, manifest);
  }
}
