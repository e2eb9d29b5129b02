import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { FileRegistryRepository, parseRegistry, serializeRegistry } from '../repositories/registry.repository.js';
import { InMemoryRegistryRepository } from '../repositories/memory.repository.js';
import { isSwitchError } from '../errors.js';
import type { Registry } from '../types.js';

async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), 'binswap-repository-'));
}

const sample: Registry = {
  applications: {
    python: {
      activeTag: '3.8',
      entries: {
        '2.7': { kind: 'path', sourcePath: '/usr/bin/python2.7', fingerprint: 'aaaa' },
        '3.8': { kind: 'path', sourcePath: '/usr/bin/python3.8', fingerprint: 'bbbb', description: 'system' },
      },
    },
    deploy: {
      entries: {
        prod: { kind: 'command', commandLine: 'make deploy', workingDirectory: '/srv/app', env: { STAGE: 'prod' } },
      },
    },
  },
};

describe('registry repository', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    filePath = path.join(tempDir, 'config', 'binswap', 'registry.json');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('FileRegistryRepository', () => {
    it('should load an empty registry when no file exists', async () => {
      const repository = new FileRegistryRepository(filePath);
      expect(await repository.load()).toEqual({ applications: {} });
    });

    it('should save and load the same registry', async () => {
      const repository = new FileRegistryRepository(filePath);
      await repository.save(sample);

      expect(await repository.load()).toEqual(sample);
      expect(await fs.readFile(filePath, 'utf-8')).toBe(serializeRegistry(sample));
      expect(await fs.readdir(path.dirname(filePath))).toEqual(['registry.json']);
    });

    it('should write a versioned document', async () => {
      const repository = new FileRegistryRepository(filePath);
      await repository.save({ applications: {} });

      expect(await fs.readFile(filePath, 'utf-8')).toBe('{\n  "version": 1,\n  "applications": {}\n}\n');
    });

    it('should report a corrupt file with CorruptRegistry', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, '{ not json');

      await expect(new FileRegistryRepository(filePath).load()).rejects.toSatisfy((err: unknown) =>
        isSwitchError(err, 'CorruptRegistry')
      );
    });
  });

  describe('parseRegistry', () => {
    it('should strip unknown fields', () => {
      const content = JSON.stringify({
        version: 1,
        color: 'red',
        applications: {
          tool: { pinned: true, entries: { '1': { kind: 'command', commandLine: 'true', extra: 1 } } },
        },
      });

      expect(parseRegistry(content, 'test')).toEqual({
        applications: { tool: { entries: { '1': { kind: 'command', commandLine: 'true' } } } },
      });
    });

    it('should accept a document without a version', () => {
      expect(parseRegistry('{"applications":{}}', 'test')).toEqual({ applications: {} });
    });

    it('should reject a document from a newer version', () => {
      expect(() => parseRegistry('{"version":2,"applications":{}}', 'test')).toThrow(
        'Registry test is invalid: version: written by a newer binswap'
      );
    });

    it('should reject an active tag without an entry', () => {
      const content = JSON.stringify({
        version: 1,
        applications: { tool: { activeTag: '9', entries: { '1': { kind: 'command', commandLine: 'true' } } } },
      });

      expect(() => parseRegistry(content, 'test')).toThrow(
        'Registry test is invalid: applications.tool.activeTag: active tag "9" has no entry'
      );
    });

    it('should reject an unknown entry kind', () => {
      const content = JSON.stringify({
        version: 1,
        applications: { tool: { entries: { '1': { kind: 'url', href: 'x' } } } },
      });

      expect(() => parseRegistry(content, 'test')).toThrow(/^Registry test is invalid: applications\.tool\.entries\.1\.kind/);
    });

    it('should reject an application named __proto__', () => {
      const content = '{"version":1,"applications":{"__proto__":{"entries":{"1":{"kind":"command","commandLine":"true"}}}}}';

      expect(() => parseRegistry(content, 'test')).toThrow(
        'Registry test is invalid: applications.__proto__: reserved key "__proto__"'
      );
    });

    it('should reject a tag named __proto__', () => {
      const content = '{"version":1,"applications":{"tool":{"entries":{"__proto__":{"kind":"command","commandLine":"true"}}}}}';

      expect(() => parseRegistry(content, 'test')).toThrow(
        'Registry test is invalid: applications.tool.entries.__proto__: reserved key "__proto__"'
      );
    });
  });

  describe('InMemoryRegistryRepository', () => {
    it('should hand out independent copies', async () => {
      const repository = new InMemoryRegistryRepository(sample);
      const loaded = await repository.load();
      delete loaded.applications.python;

      expect(Object.keys((await repository.load()).applications)).toEqual(['python', 'deploy']);
      expect(repository.saveCount).toBe(0);
    });
  });
});
