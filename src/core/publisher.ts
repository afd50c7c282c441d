import fs from 'fs/promises';
import path from 'path';
import type { ManifestArtifact, PublishOutcome, ReleaseContext } from '../types/index.js';
import { resolveCommitAuthor } from './commit-author.js';
import { newIfToken, repoFromRef, repoString, templateRef, type GitClient } from './git-client.js';
import { logger } from './logger.js';
import { parseManifest } from './manifest-builder.js';
import { skipReason } from './publish-guard.js';
import { Template } from './template.js';

/**
 * Commit the manifest written by the run phase to its bucket. The bytes
 * are read back from disk and committed unchanged.
 */
export async function publishManifest(
  ctx: ReleaseContext,
  client: GitClient,
  manifest: ManifestArtifact,
): Promise<PublishOutcome> {
  const { config } = manifest;

  const reason = skipReason(ctx, config.skip_upload);
  if (reason) {
    return { status: 'skipped', reason };
  }

  const scoped = newIfToken(ctx, client, config.bucket.token);
  const tmpl = new Template(ctx);

  const message = tmpl.apply(config.commit_msg_template);
  const author = resolveCommitAuthor(tmpl, config.commit_author);

  const content = await fs.readFile(manifest.path);
  parseManifest(content.toString('utf8'));

  const ref = templateRef(text => tmpl.apply(text), config.bucket);
  const repo = repoFromRef(ref);
  const target = path.posix.join(config.folder, manifest.name);

  logger.info('pushing', { repo: repoString(repo), path: target });
  await scoped.createFile(author, repo, content, target, message);

  return { status: 'published', repo: repoString(repo), path: target };
}
