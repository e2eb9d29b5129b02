import { describe, it, expect } from 'vitest';
import { getActiveTag, list, listApplications } from '../query.js';
import type { Registry } from '../types.js';

const registry: Registry = {
  applications: {
    python: {
      activeTag: '3.8',
      entries: {
        '10.0': { kind: 'path', sourcePath: '/opt/python10', fingerprint: 'c' },
        '2.7': { kind: 'path', sourcePath: '/usr/bin/python2.7', fingerprint: 'a' },
        '3.8': { kind: 'path', sourcePath: '/usr/bin/python3.8', fingerprint: 'b' },
      },
    },
    deploy: {
      entries: {
        prod: { kind: 'command', commandLine: 'make deploy', workingDirectory: '/srv/app', description: 'release' },
      },
    },
  },
};

describe('query', () => {
  it('should list only active tags by default', () => {
    expect(list(registry)).toEqual([
      { appName: 'python', tag: '3.8', kind: 'path', summary: '/usr/bin/python3.8', isActive: true },
    ]);
  });

  it('should order applications by name and tags naturally', () => {
    expect(list(registry, { all: true }).map((row) => `${row.appName}@${row.tag}`)).toEqual([
      'deploy@prod',
      'python@2.7',
      'python@3.8',
      'python@10.0',
    ]);
  });

  it('should carry descriptions and command summaries', () => {
    expect(list(registry, { app: 'deploy', all: true })).toEqual([
      {
        appName: 'deploy',
        tag: 'prod',
        kind: 'command',
        summary: 'make deploy in /srv/app',
        isActive: false,
        description: 'release',
      },
    ]);
  });

  it('should throw for an unknown application filter', () => {
    expect(() => list(registry, { app: 'ruby' })).toThrow("Application ruby isn't tracked");
  });

  it('should summarize applications', () => {
    expect(listApplications(registry)).toEqual([
      { name: 'deploy', tagCount: 1 },
      { name: 'python', activeTag: '3.8', tagCount: 3 },
    ]);
  });

  it('should report the active tag', () => {
    expect(getActiveTag(registry, 'python')).toBe('3.8');
    expect(getActiveTag(registry, 'deploy')).toBeUndefined();
    expect(getActiveTag(registry, 'ruby')).toBeUndefined();
  });
});
