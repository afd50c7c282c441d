import { z } from 'zod';
import type { CommitAuthor, ReleaseContext, RepoRef } from '../types/index.js';
import { RemoteWriteError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { Template } from './template.js';

// ─── Contract ───

export interface Repo {
  owner: string;
  name: string;
  branch?: string;
}

export interface GitClient {
  /** Default download URL template for release artifacts on this host. */
  releaseUrlTemplate(ctx: ReleaseContext): Promise<string>;
  /** Create or update a single file in a repository with one commit. */
  createFile(
    author: CommitAuthor,
    repo: Repo,
    content: Buffer,
    filePath: string,
    message: string,
  ): Promise<void>;
  withToken(token: string): GitClient;
}

export type ApplyTemplate = (text: string) => string;

export function repoString(repo: Repo): string {
  return `${repo.owner}/${repo.name}`;
}

/** Expand owner, name and branch of a repository reference. */
export function templateRef(apply: ApplyTemplate, ref: RepoRef): RepoRef {
  return {
    ...ref,
    owner: apply(ref.owner),
    name: apply(ref.name),
    branch: ref.branch === undefined ? undefined : apply(ref.branch),
  };
}

export function repoFromRef(ref: RepoRef): Repo {
  const repo: Repo = { owner: ref.owner, name: ref.name };
  if (ref.branch) repo.branch = ref.branch;
  return repo;
}

/** Rescope the client when a repository-specific token is configured. */
export function newIfToken(ctx: ReleaseContext, client: GitClient, token?: string): GitClient {
  if (!token) return client;
  const expanded = new Template(ctx).apply(token);
  if (!expanded) return client;
  logger.debug('using repository-specific token');
  return client.withToken(expanded);
}

// ─── GitHub ───

const GITHUB_API_VERSION = '2022-11-28';
const REQUEST_TIMEOUT_MS = 30_000;

const ContentsSchema = z.object({
  sha: z.string(),
  content: z.string().default(''),
});

export interface GitHubClientOptions {
  token?: string;
  apiUrl?: string;
  downloadUrl?: string;
}

export class GitHubClient implements GitClient {
  private token: string;
  private apiUrl: string;
  private downloadUrl: string;

  constructor(options: GitHubClientOptions = {}) {
    this.token = options.token ?? '';
    this.apiUrl = (options.apiUrl || 'https://api.github.com').replace(/\/+$/, '');
    this.downloadUrl = (options.downloadUrl || 'https://github.com').replace(/\/+$/, '');
  }

  withToken(token: string): GitClient {
    return new GitHubClient({ token, apiUrl: this.apiUrl, downloadUrl: this.downloadUrl });
  }

  async releaseUrlTemplate(ctx: ReleaseContext): Promise<string> {
    const github = ctx.config.release.github;
    if (!github?.owner || !github.name) {
      throw new Error('release.github.owner and release.github.name are required to derive the default url_template');
    }
    const tmpl = new Template(ctx);
    return `${this.downloadUrl}/${tmpl.apply(github.owner)}/${tmpl.apply(github.name)}/releases/download/{{ .Tag }}/{{ .ArtifactName }}`;
  }

  /**
   * Commits `content` to `filePath` through the contents API. Identical
   * content is a no-op. Updates send the current blob sha, so a concurrent
   * writer makes GitHub answer 409 instead of silently overwriting.
   */
  async createFile(
    author: CommitAuthor,
    repo: Repo,
    content: Buffer,
    filePath: string,
    message: string,
  ): Promise<void> {
    const target = `${repoString(repo)}/${filePath}`;
    const url = `${this.apiUrl}/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}/contents/${filePath
      .split('/')
      .map(encodeURIComponent)
      .join('/')}`;

    const existing = await this.getFile(target, url, repo.branch);
    if (existing && existing.content.equals(content)) {
      logger.info('file unchanged, nothing to commit', { repo: repoString(repo), path: filePath });
      return;
    }

    const response = await this.request(target, url, {
      method: 'PUT',
      body: JSON.stringify({
        message,
        content: content.toString('base64'),
        branch: repo.branch,
        sha: existing?.sha,
        committer: author,
        author,
      }),
    });
    if (!response.ok) {
      throw new RemoteWriteError(target, await describeFailure(response), response.status);
    }

    logger.info('committed', { repo: repoString(repo), path: filePath });
  }

  private async getFile(
    target: string,
    url: string,
    branch?: string,
  ): Promise<{ sha: string; content: Buffer } | null> {
    const query = branch ? `?ref=${encodeURIComponent(branch)}` : '';
    const response = await this.request(target, url + query, { method: 'GET' });

    if (response.status === 404) return null;
    if (!response.ok) {
      throw new RemoteWriteError(target, await describeFailure(response), response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new RemoteWriteError(target, `invalid contents response: ${errorMessage(err)}`, response.status);
    }

    const parsed = ContentsSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteWriteError(target, 'unexpected contents response, is the path a directory?');
    }
    return { sha: parsed.data.sha, content: Buffer.from(parsed.data.content, 'base64') };
  }

  private async request(target: string, url: string, init: RequestInit): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'Content-Type': 'application/json',
      'X-GitHub-Api-Version': GITHUB_API_VERSION,
    };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    try {
      return await fetch(url, { ...init, headers, signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    } catch (err) {
      throw new RemoteWriteError(target, errorMessage(err));
    }
  }
}

async function describeFailure(response: Response): Promise<string> {
  const body = await response.text();
  const detail = body ? `: ${body.slice(0, 200)}` : '';
  return `HTTP ${response.status} ${response.statusText}${detail}`;
}

export function newClient(ctx: ReleaseContext): GitHubClient {
  return new GitHubClient({
    token: ctx.env.GITHUB_TOKEN,
    apiUrl: ctx.config.github_urls.api,
    downloadUrl: ctx.config.github_urls.download,
  });
}
