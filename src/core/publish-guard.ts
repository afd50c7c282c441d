import type { ReleaseContext } from '../types/index.js';
import { isPrerelease } from './semver.js';

/**
 * Why the manifest must not be published, or undefined to go ahead.
 * Checks run in a fixed order and the first match wins.
 */
export function skipReason(ctx: ReleaseContext, skipUpload: string): string | undefined {
  const mode = skipUpload.trim();

  if (mode === 'true') {
    return 'scoop.skip_upload is true';
  }
  if (mode === 'auto' && isPrerelease(ctx.semver)) {
    return 'release is prerelease';
  }
  if (ctx.config.release.draft) {
    return 'release is marked as draft';
  }
  if (ctx.config.release.disable) {
    return 'release is disabled';
  }
  return undefined;
}
