import path from 'path';
import type {
  ArchiveArtifact,
  Architecture,
  ArchitectureKey,
  ReleaseContext,
  ScoopConfig,
} from '../types/index.js';
import { checksum } from './artifacts.js';
import type { GitClient } from './git-client.js';
import { logger } from './logger.js';
import { Template } from './template.js';

export interface ResolvedResources {
  architecture: Architecture;
  /** The scoop config with its url_template filled in. */
  scoop: ScoopConfig;
}

export function architectureKey(goarch: string): ArchitectureKey | undefined {
  switch (goarch) {
    case '386':
      return '32bit';
    case 'amd64':
      return '64bit';
    default:
      return undefined;
  }
}

/** In-archive paths of the executables an archive packs. */
export function binaries(artifact: ArchiveArtifact): string[] {
  const { wrapped_in: wrap, builds } = artifact.archive;
  return builds.map(build => path.posix.join(wrap, build.name));
}

export async function resolveResources(
  ctx: ReleaseContext,
  client: GitClient,
  scoop: ScoopConfig,
  archives: ArchiveArtifact[],
): Promise<ResolvedResources> {
  const urlTemplate = scoop.url_template || (await client.releaseUrlTemplate(ctx));
  const resolved: ScoopConfig = { ...scoop, url_template: urlTemplate };
  const architecture: Architecture = {};
  const tmpl = new Template(ctx);

  for (const artifact of archives) {
    const arch = architectureKey(artifact.goarch);
    if (!arch) continue;

    const url = tmpl.withArtifact(artifact).apply(urlTemplate);
    const sum = await checksum(artifact, 'sha256');

    logger.debug('scoop url templating', {
      arch,
      artifact: artifact.name,
      fromURLTemplate: urlTemplate,
      templatedURL: url,
      sum,
    });

    architecture[arch] = {
      url,
      bin: binaries(artifact),
      hash: sum,
    };
  }

  return { architecture, scoop: resolved };
}
