/**
 * Extract error message from unknown catch value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// ─── Fatal Errors ───

/** No Windows archive in the artifact set: scoop manifests are Windows-only. */
export class NoWindowsBuildError extends Error {
  constructor() {
    super('scoop requires a windows build and archive');
    this.name = 'NoWindowsBuildError';
  }
}

export class TemplateError extends Error {
  constructor(
    public readonly template: string,
    reason: string,
  ) {
    super(`failed to apply template "${template}": ${reason}`);
    this.name = 'TemplateError';
  }
}

export class ChecksumError extends Error {
  constructor(
    public readonly artifactPath: string,
    public readonly algorithm: string,
    reason: string,
  ) {
    super(`failed to compute ${algorithm} checksum of ${artifactPath}: ${reason}`);
    this.name = 'ChecksumError';
  }
}

/** Per-artifact build metadata is missing or malformed. */
export class MetadataError extends Error {
  constructor(
    public readonly artifact: string,
    reason: string,
  ) {
    super(`invalid metadata for artifact ${artifact}: ${reason}`);
    this.name = 'MetadataError';
  }
}

export class RemoteWriteError extends Error {
  constructor(
    public readonly target: string,
    reason: string,
    public readonly status?: number,
  ) {
    super(`failed to write ${target}: ${reason}`);
    this.name = 'RemoteWriteError';
  }
}
