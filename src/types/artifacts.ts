import { z } from 'zod';
import { PublishConfigSchema } from './config.js';

// ─── Artifact Index (dist/artifacts.json) ───

export const ARTIFACT_TYPES = [
  'Archive',
  'Binary',
  'UploadableBinary',
  'Checksum',
  'Signature',
  'SourceArchive',
  'ScoopManifest',
] as const;

export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

const artifactFields = {
  name: z.string(),
  path: z.string(),
  goos: z.string().default(''),
  goarch: z.string().default(''),
  goamd64: z.string().default(''),
};

export const PlainArtifactSchema = z.object({
  ...artifactFields,
  type: z.enum(['Binary', 'UploadableBinary', 'Checksum', 'Signature', 'SourceArchive']),
});

export const ArchiveContentsSchema = z.object({
  wrapped_in: z.string().default(''),
  builds: z.array(PlainArtifactSchema),
});

export const ArchiveArtifactSchema = z.object({
  ...artifactFields,
  type: z.literal('Archive'),
  archive: ArchiveContentsSchema,
});

/** Written by the run phase so publish can pick the manifest up from disk alone. */
export const ScoopManifestArtifactSchema = z.object({
  ...artifactFields,
  type: z.literal('ScoopManifest'),
  scoop: PublishConfigSchema,
});

export const ArtifactRefSchema = z.discriminatedUnion('type', [
  ArchiveArtifactSchema,
  ScoopManifestArtifactSchema,
  PlainArtifactSchema,
]);

export type ArchiveArtifact = z.infer<typeof ArchiveArtifactSchema>;
export type ScoopManifestArtifact = z.infer<typeof ScoopManifestArtifactSchema>;
export type ArtifactRef = z.infer<typeof ArtifactRefSchema>;
