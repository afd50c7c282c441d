import type { ArchiveArtifact } from '../types/index.js';
import { ArtifactStore, and, byGoamd64, byGoarch, byGoos, byType, isUploadableArchive, or } from './artifacts.js';
import { NoWindowsBuildError } from './errors.js';

/**
 * Windows archives a scoop manifest can point at: amd64 builds for the
 * configured microarchitecture level, plus any 386 build.
 */
export function selectWindowsArchives(store: ArtifactStore, goamd64: string): ArchiveArtifact[] {
  const archives = store
    .filter(
      and(
        byGoos('windows'),
        byType('Archive'),
        or(and(byGoarch('amd64'), byGoamd64(goamd64)), byGoarch('386')),
      ),
    )
    .list()
    .filter(isUploadableArchive);

  if (archives.length === 0) {
    throw new NoWindowsBuildError();
  }
  return archives;
}
