import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import type { RunPlan } from '@binswap/registry';
import { buildSpawnSpec, exitStatus, runPlan } from '../run.js';

describe('buildSpawnSpec', () => {
  it('should run command entries through sh with forwarded arguments', () => {
    const plan: RunPlan = {
      appName: 'deploy',
      tag: 'prod',
      command: 'make deploy',
      shell: true,
      cwd: '/srv/app',
      env: { STAGE: 'prod' },
    };

    expect(buildSpawnSpec(plan, ['--dry-run'], { PATH: '/usr/bin', STAGE: 'dev' })).toEqual({
      file: '/bin/sh',
      args: ['-c', 'make deploy "$@"', 'deploy', '--dry-run'],
      options: { cwd: '/srv/app', env: { PATH: '/usr/bin', STAGE: 'prod' }, stdio: 'inherit' },
    });
  });

  it('should execute path entries directly', () => {
    const plan: RunPlan = {
      appName: 'python',
      tag: '3.8',
      command: '/usr/bin/python3.8',
      shell: false,
      cwd: '/work',
      env: {},
    };

    expect(buildSpawnSpec(plan, ['-V'], {})).toEqual({
      file: '/usr/bin/python3.8',
      args: ['-V'],
      options: { cwd: '/work', env: {}, stdio: 'inherit' },
    });
  });
});

describe('exitStatus', () => {
  it('should pass an exit code through', () => {
    expect(exitStatus(0, null)).toBe(0);
    expect(exitStatus(3, null)).toBe(3);
  });

  it('should add the signal number to 128', () => {
    expect(exitStatus(null, 'SIGINT')).toBe(130);
    expect(exitStatus(null, 'SIGTERM')).toBe(143);
    expect(exitStatus(null, 'SIGKILL')).toBe(137);
  });
});

describe('runPlan', () => {
  it('should resolve with the exit status', async () => {
    const plan: RunPlan = { appName: 'fail', tag: '1', command: 'exit 3', shell: true, cwd: tmpdir(), env: {} };

    expect(await runPlan(plan, [])).toBe(3);
  });

  it('should report a child killed by a signal as 128 + signal number', async () => {
    const plan: RunPlan = { appName: 'stop', tag: '1', command: 'kill -TERM $$', shell: true, cwd: tmpdir(), env: {} };

    expect(await runPlan(plan, [])).toBe(143);
  });
});
