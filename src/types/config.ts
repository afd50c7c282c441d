import { z } from 'zod';

export const DEFAULT_COMMIT_MESSAGE = 'Scoop update for {{ .ProjectName }} version {{ .Tag }}';
export const DEFAULT_AUTHOR_NAME = 'scoop-bucket-bot';
export const DEFAULT_AUTHOR_EMAIL = 'bot@scoop-bucket.dev';
export const DEFAULT_GOAMD64 = 'v1';

// ─── Shared ───
export const CommitAuthorSchema = z.object({
  name: z.string().default(DEFAULT_AUTHOR_NAME),
  email: z.string().default(DEFAULT_AUTHOR_EMAIL),
});

export const RepoRefSchema = z.object({
  owner: z.string().default(''),
  name: z.string().default(''),
  branch: z.string().optional(),
  token: z.string().optional(),
});

// YAML turns a bare `true` into a boolean; the guard compares strings.
export const SkipUploadSchema = z
  .union([z.boolean(), z.string()])
  .default('')
  .transform(value => String(value).trim());

// ─── Scoop Config ───
export const ScoopConfigSchema = z.object({
  name: z.string().default(''),
  bucket: RepoRefSchema.default({}),
  folder: z.string().default(''),
  commit_author: CommitAuthorSchema.default({}),
  commit_msg_template: z.string().default(DEFAULT_COMMIT_MESSAGE),
  homepage: z.string().default(''),
  license: z.string().default(''),
  description: z.string().default(''),
  persist: z.array(z.string()).default([]),
  pre_install: z.array(z.string()).default([]),
  post_install: z.array(z.string()).default([]),
  url_template: z.string().default(''),
  skip_upload: SkipUploadSchema,
  goamd64: z.string().default(DEFAULT_GOAMD64),
});

// ─── Project Config ───
export const ReleaseConfigSchema = z.object({
  github: z.object({
    owner: z.string(),
    name: z.string(),
  }).optional(),
  draft: z.boolean().default(false),
  disable: z.boolean().default(false),
});

export const ProjectConfigSchema = z.object({
  project_name: z.string().default(''),
  dist: z.string().default('dist'),
  env: z.array(z.string()).default([]),
  release: ReleaseConfigSchema.default({}),
  github_urls: z.object({
    api: z.string().default('https://api.github.com'),
    download: z.string().default('https://github.com'),
  }).default({}),
  scoop: ScoopConfigSchema.default({}),
});

export type CommitAuthor = z.infer<typeof CommitAuthorSchema>;
export type RepoRef = z.infer<typeof RepoRefSchema>;
export type ScoopConfig = z.infer<typeof ScoopConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;

/** The slice of the scoop config the publish phase needs, recorded with the manifest. */
export const PublishConfigSchema = ScoopConfigSchema.pick({
  bucket: true,
  folder: true,
  commit_msg_template: true,
  commit_author: true,
  skip_upload: true,
  url_template: true,
});

export type PublishConfig = z.infer<typeof PublishConfigSchema>;
