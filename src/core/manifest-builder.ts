import {
  ARCHITECTURE_KEYS,
  ManifestSchema,
  type Architecture,
  type Manifest,
  type ReleaseContext,
  type ScoopConfig,
} from '../types/index.js';

/** Assemble a manifest. Empty optional metadata is left out. */
export function buildManifest(
  ctx: ReleaseContext,
  scoop: ScoopConfig,
  architecture: Architecture,
): Manifest {
  const manifest: Manifest = { version: ctx.version, architecture };

  if (scoop.homepage) manifest.homepage = scoop.homepage;
  if (scoop.license) manifest.license = scoop.license;
  if (scoop.description) manifest.description = scoop.description;
  if (scoop.persist.length > 0) manifest.persist = [...scoop.persist];
  if (scoop.pre_install.length > 0) manifest.pre_install = [...scoop.pre_install];
  if (scoop.post_install.length > 0) manifest.post_install = [...scoop.post_install];

  return manifest;
}

/**
 * Deterministic JSON: 4-space indent, fixed key order, architectures
 * sorted, empty optional fields omitted.
 */
export function serializeManifest(manifest: Manifest): string {
  const architecture: Architecture = {};
  for (const key of ARCHITECTURE_KEYS) {
    const resource = manifest.architecture[key];
    if (resource) {
      architecture[key] = { url: resource.url, bin: resource.bin, hash: resource.hash };
    }
  }

  const ordered = {
    version: manifest.version,
    architecture,
    homepage: manifest.homepage || undefined,
    license: manifest.license || undefined,
    description: manifest.description || undefined,
    persist: nonEmpty(manifest.persist),
    pre_install: nonEmpty(manifest.pre_install),
    post_install: nonEmpty(manifest.post_install),
  };
  return JSON.stringify(ordered, null, 4);
}

export function parseManifest(text: string): Manifest {
  return ManifestSchema.parse(JSON.parse(text));
}

function nonEmpty(values: string[] | undefined): string[] | undefined {
  return values && values.length > 0 ? values : undefined;
}
