import { z } from 'zod';

// ─── Scoop App Manifest ───

export const ARCHITECTURE_KEYS = ['32bit', '64bit'] as const;
export type ArchitectureKey = (typeof ARCHITECTURE_KEYS)[number];

export const ResourceSchema = z.object({
  url: z.string(),
  bin: z.array(z.string()),
  hash: z.string(),
});

export const ManifestSchema = z.object({
  version: z.string(),
  architecture: z.record(z.enum(ARCHITECTURE_KEYS), ResourceSchema),
  homepage: z.string().optional(),
  license: z.string().optional(),
  description: z.string().optional(),
  persist: z.array(z.string()).optional(),
  pre_install: z.array(z.string()).optional(),
  post_install: z.array(z.string()).optional(),
});

export type Resource = z.infer<typeof ResourceSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
export type Architecture = Manifest['architecture'];
