import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { configGetCommand } from '../../../src/commands/config-cmd.js';
import { ConfigManager } from '../../../src/core/config.js';

describe('configGetCommand', () => {
  let tempDir: string;
  let originalCwd: () => string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scoop-configcmd-test-'));
    originalCwd = process.cwd;
    process.cwd = () => tempDir;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    process.cwd = originalCwd;
    process.exitCode = undefined;
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should print a nested scalar value', async () => {
    await new ConfigManager(tempDir).init({ project_name: 'myapp', scoop: { bucket: { owner: 'acme', name: 'apps' } } });

    await configGetCommand('scoop.bucket.owner');

    expect(logSpy).toHaveBeenCalledWith('acme');
  });

  it('should print defaults filled in on load', async () => {
    await new ConfigManager(tempDir).init({ project_name: 'myapp' });

    await configGetCommand('scoop.name');

    expect(logSpy).toHaveBeenCalledWith('myapp');
  });

  it('should print objects as YAML', async () => {
    await new ConfigManager(tempDir).init({ project_name: 'myapp', scoop: { bucket: { owner: 'acme', name: 'apps' } } });

    await configGetCommand('scoop.bucket');

    expect(logSpy).toHaveBeenCalledWith('owner: acme\nname: apps\n');
  });

  it('should report an unknown key', async () => {
    await new ConfigManager(tempDir).init({ project_name: 'myapp' });

    await configGetCommand('scoop.nope');

    expect(errorSpy.mock.calls.flat().join(' ')).toContain("Key 'scoop.nope' not found in config.");
    expect(process.exitCode).toBe(1);
  });

  it('should report a missing config file', async () => {
    await configGetCommand('project_name');

    expect(errorSpy.mock.calls.flat().join(' ')).toContain('No config found');
    expect(process.exitCode).toBe(1);
  });

  it('should read from a custom config path', async () => {
    await new ConfigManager(tempDir, 'ci/scoop.yaml').init({ project_name: 'other' });

    await configGetCommand('project_name', { config: 'ci/scoop.yaml' });

    expect(logSpy).toHaveBeenCalledWith('other');
  });
});
