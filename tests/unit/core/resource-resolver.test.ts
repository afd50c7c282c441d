import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { createHash } from 'crypto';
import { architectureKey, binaries, resolveResources } from '../../../src/core/resource-resolver.js';
import { ChecksumError, TemplateError } from '../../../src/core/errors.js';
import { fakeClient, makeArchive, makeContext, writeArchive } from '../../helpers/fixtures.js';

const sha256 = (content: string) => createHash('sha256').update(content).digest('hex');

describe('architectureKey', () => {
  it('should map amd64 and 386 and ignore everything else', () => {
    expect(architectureKey('amd64')).toBe('64bit');
    expect(architectureKey('386')).toBe('32bit');
    expect(architectureKey('arm64')).toBeUndefined();
  });
});

describe('binaries', () => {
  it('should join the wrap directory with each build name', () => {
    const archive = makeArchive({
      name: 'myapp_1.0.0_windows_amd64.zip',
      archive: {
        wrapped_in: 'myapp_1.0.0_windows_amd64',
        builds: [
          { name: 'myapp.exe', path: 'dist/a/myapp.exe', goos: 'windows', goarch: 'amd64', goamd64: 'v1', type: 'Binary' },
          { name: 'helper.exe', path: 'dist/b/helper.exe', goos: 'windows', goarch: 'amd64', goamd64: 'v1', type: 'Binary' },
        ],
      },
    });

    expect(binaries(archive)).toEqual(['myapp_1.0.0_windows_amd64/myapp.exe', 'myapp_1.0.0_windows_amd64/helper.exe']);
  });

  it('should use bare names when the archive is not wrapped', () => {
    expect(binaries(makeArchive({ name: 'myapp.zip' }))).toEqual(['myapp.exe']);
  });

  it('should give an empty list for an archive without builds', () => {
    expect(binaries(makeArchive({ name: 'myapp.zip', archive: { wrapped_in: '', builds: [] } }))).toEqual([]);
  });
});

describe('resolveResources', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scoop-resolver-test-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should resolve url, binaries and checksum for an archive', async () => {
    const ctx = makeContext({ scoop: { url_template: 'https://example.com/{{ .ArtifactName }}' } });
    const client = fakeClient();
    const filePath = await writeArchive(tempDir, 'myapp_windows_amd64.zip', 'amd64 archive');

    const { architecture } = await resolveResources(ctx, client, ctx.config.scoop, [
      makeArchive({ name: 'myapp_windows_amd64.zip', path: filePath }),
    ]);

    expect(architecture).toEqual({
      '64bit': {
        url: 'https://example.com/myapp_windows_amd64.zip',
        bin: ['myapp.exe'],
        hash: sha256('amd64 archive'),
      },
    });
    expect(client.releaseUrlTemplate).not.toHaveBeenCalled();
  });

  it('should produce both architectures for mixed amd64 and 386 input', async () => {
    const ctx = makeContext({ scoop: { url_template: 'https://example.com/{{ .ArtifactName }}' } });
    const amd64 = await writeArchive(tempDir, 'myapp_windows_amd64.zip', 'amd64 archive');
    const i386 = await writeArchive(tempDir, 'myapp_windows_386.zip', '386 archive');

    const { architecture } = await resolveResources(ctx, fakeClient(), ctx.config.scoop, [
      makeArchive({ name: 'myapp_windows_amd64.zip', path: amd64 }),
      makeArchive({ name: 'myapp_windows_386.zip', path: i386, goarch: '386', goamd64: '' }),
    ]);

    expect(Object.keys(architecture).sort()).toEqual(['32bit', '64bit']);
    expect(architecture['32bit']?.url).toBe('https://example.com/myapp_windows_386.zip');
    expect(architecture['32bit']?.hash).toBe(sha256('386 archive'));
  });

  it('should ask the client for the default url template exactly once', async () => {
    const ctx = makeContext();
    const client = fakeClient('https://github.com/acme/myapp/releases/download/{{ .Tag }}/{{ .ArtifactName }}');
    const archives = [
      makeArchive({ name: 'myapp_windows_amd64.zip', path: await writeArchive(tempDir, 'a.zip', 'a') }),
      makeArchive({ name: 'myapp_windows_386.zip', path: await writeArchive(tempDir, 'b.zip', 'b'), goarch: '386', goamd64: '' }),
      makeArchive({ name: 'myapp_windows_arm64.zip', path: await writeArchive(tempDir, 'c.zip', 'c'), goarch: 'arm64', goamd64: '' }),
    ];

    const { architecture, scoop } = await resolveResources(ctx, client, ctx.config.scoop, archives);

    expect(client.releaseUrlTemplate).toHaveBeenCalledTimes(1);
    expect(scoop.url_template).toBe('https://github.com/acme/myapp/releases/download/{{ .Tag }}/{{ .ArtifactName }}');
    expect(ctx.config.scoop.url_template).toBe('');
    expect(architecture['64bit']?.url).toBe('https://github.com/acme/myapp/releases/download/v1.0.0/myapp_windows_amd64.zip');
    expect(architecture['32bit']?.url).toBe('https://github.com/acme/myapp/releases/download/v1.0.0/myapp_windows_386.zip');
    expect(Object.keys(architecture)).toHaveLength(2);
  });

  it('should fail when an archive cannot be read', async () => {
    const ctx = makeContext({ scoop: { url_template: 'https://example.com/{{ .ArtifactName }}' } });
    const archive = makeArchive({ name: 'missing.zip', path: path.join(tempDir, 'missing.zip') });

    await expect(resolveResources(ctx, fakeClient(), ctx.config.scoop, [archive])).rejects.toThrow(ChecksumError);
  });

  it('should fail when the url template is invalid', async () => {
    const ctx = makeContext({ scoop: { url_template: 'https://example.com/{{ .Nope }}' } });
    const archive = makeArchive({ name: 'a.zip', path: await writeArchive(tempDir, 'a.zip', 'a') });

    await expect(resolveResources(ctx, fakeClient(), ctx.config.scoop, [archive])).rejects.toThrow(TemplateError);
  });
});
