import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import {
  assertLauncherOwned,
  installLauncher,
  readLauncher,
  removeLauncher,
  renderWrapperScript,
  restoreLauncher,
  shellQuote,
} from '../launcher.js';
import { isSwitchError } from '../errors.js';

async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), 'binswap-launcher-'));
}

describe('launcher', () => {
  let tempDir: string;
  let binDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    binDir = path.join(tempDir, 'bin');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('shellQuote should escape single quotes', () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });

  it('should render a wrapper script that forwards arguments', () => {
    const script = renderWrapperScript(
      { kind: 'wrapper', commandLine: 'make deploy', workingDirectory: "/srv/it's", env: { STAGE: 'prod' } },
      'deploy',
      'prod'
    );

    expect(script).toBe(
      [
        '#!/bin/sh',
        '# binswap launcher: deploy@prod',
        "cd '/srv/it'\\''s' || exit 1",
        "export STAGE='prod'",
        'make deploy "$@"',
        '',
      ].join('\n')
    );
  });

  describe('installLauncher', () => {
    it('should create the bin directory and a symlink', async () => {
      const launcherPath = await installLauncher(binDir, 'tool', { kind: 'symlink', target: '/opt/tool-1' });

      expect(launcherPath).toBe(path.join(binDir, 'tool'));
      expect(await fs.readlink(launcherPath)).toBe('/opt/tool-1');
    });

    it('should replace an existing launcher without leaving temporaries', async () => {
      await installLauncher(binDir, 'tool', { kind: 'symlink', target: '/opt/tool-1' });
      await installLauncher(binDir, 'tool', { kind: 'symlink', target: '/opt/tool-2' });

      expect(await fs.readlink(path.join(binDir, 'tool'))).toBe('/opt/tool-2');
      expect(await fs.readdir(binDir)).toEqual(['tool']);
    });

    it('should write an executable script', async () => {
      const launcherPath = await installLauncher(binDir, 'deploy', { kind: 'script', content: '#!/bin/sh\ntrue\n' });

      expect(await fs.readFile(launcherPath, 'utf-8')).toBe('#!/bin/sh\ntrue\n');
      expect((await fs.stat(launcherPath)).mode & 0o777).toBe(0o755);
    });

    it('should fail with InstallFailed when the bin directory cannot be created', async () => {
      const blocked = path.join(tempDir, 'file');
      await fs.writeFile(blocked, 'not a directory');

      await expect(
        installLauncher(path.join(blocked, 'bin'), 'tool', { kind: 'symlink', target: '/opt/tool' })
      ).rejects.toSatisfy((err: unknown) => isSwitchError(err, 'InstallFailed'));
    });
  });

  describe('readLauncher', () => {
    it('should report each kind of launcher', async () => {
      await fs.mkdir(binDir, { recursive: true });
      await fs.symlink('/opt/tool', path.join(binDir, 'linked'));
      await fs.writeFile(path.join(binDir, 'ours'), '#!/bin/sh\n# binswap launcher: ours@1\ntrue "$@"\n');
      await fs.writeFile(path.join(binDir, 'theirs'), '#!/bin/sh\necho hand written\n');
      await fs.mkdir(path.join(binDir, 'dir'));

      expect(await readLauncher(path.join(binDir, 'missing'))).toEqual({ kind: 'missing' });
      expect(await readLauncher(path.join(binDir, 'linked'))).toEqual({ kind: 'symlink', target: '/opt/tool' });
      expect((await readLauncher(path.join(binDir, 'ours'))).kind).toBe('script');
      expect(await readLauncher(path.join(binDir, 'theirs'))).toEqual({
        kind: 'foreign',
        reason: 'regular file not created by binswap',
      });
      expect(await readLauncher(path.join(binDir, 'dir'))).toEqual({
        kind: 'foreign',
        reason: 'directory or special file',
      });
    });
  });

  describe('assertLauncherOwned', () => {
    const known = new Set(['/opt/tool-1']);

    it('should accept missing launchers, our scripts and known symlinks', () => {
      expect(() => assertLauncherOwned({ kind: 'missing' }, known, 'tool', '/bin/tool')).not.toThrow();
      expect(() => assertLauncherOwned({ kind: 'script', content: '' }, known, 'tool', '/bin/tool')).not.toThrow();
      expect(() =>
        assertLauncherOwned({ kind: 'symlink', target: '/opt/tool-1' }, known, 'tool', '/bin/tool')
      ).not.toThrow();
    });

    it('should reject unknown symlinks and foreign files', () => {
      expect(() =>
        assertLauncherOwned({ kind: 'symlink', target: '/usr/bin/tool' }, known, 'tool', '/bin/tool')
      ).toThrow('/bin/tool links to /usr/bin/tool, which is not tracked for tool; remove it or use --force');
      expect(() =>
        assertLauncherOwned({ kind: 'foreign', reason: 'directory or special file' }, known, 'tool', '/bin/tool')
      ).toThrow('/bin/tool is a directory or special file; remove it or use --force');
    });
  });

  describe('restoreLauncher', () => {
    it('should put back a recorded symlink', async () => {
      await installLauncher(binDir, 'tool', { kind: 'symlink', target: '/opt/tool-1' });
      const recorded = await readLauncher(path.join(binDir, 'tool'));
      await installLauncher(binDir, 'tool', { kind: 'symlink', target: '/opt/tool-2' });

      expect(await restoreLauncher(binDir, 'tool', recorded)).toBe(true);
      expect(await fs.readlink(path.join(binDir, 'tool'))).toBe('/opt/tool-1');
    });

    it('should remove a launcher that was missing', async () => {
      await installLauncher(binDir, 'tool', { kind: 'script', content: '#!/bin/sh\n# binswap launcher: tool@1\n' });

      expect(await restoreLauncher(binDir, 'tool', { kind: 'missing' })).toBe(true);
      expect(await readLauncher(path.join(binDir, 'tool'))).toEqual({ kind: 'missing' });
    });

    it('should leave an unchanged launcher alone', async () => {
      await installLauncher(binDir, 'tool', { kind: 'symlink', target: '/opt/tool-1' });

      expect(await restoreLauncher(binDir, 'tool', { kind: 'symlink', target: '/opt/tool-1' })).toBe(false);
    });
  });

  it('removeLauncher should ignore a missing launcher', async () => {
    await expect(removeLauncher(binDir, 'tool')).resolves.toBeUndefined();
  });
});
