import type { Semver } from '../types/index.js';

const SEMVER_PATTERN =
  /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

/** Parse a release tag such as `v1.2.3-rc.1+build.5`. The leading `v` is optional. */
export function parseSemver(tag: string): Semver {
  const match = SEMVER_PATTERN.exec(tag.trim());
  if (!match) {
    throw new Error(`failed to parse tag '${tag}' as semver`);
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    prerelease: match[4] ?? '',
    build: match[5] ?? '',
  };
}

export function isPrerelease(version: Semver): boolean {
  return version.prerelease !== '';
}
