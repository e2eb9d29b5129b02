import { describe, it, expect } from 'vitest';
import { assertAppName, expandPath, formatAppSpec, isValidAppName, isValidTag, parseAppSpec } from '../names.js';
import { isSwitchError } from '../errors.js';

describe('names', () => {
  describe('isValidAppName', () => {
    it('should accept plain command names', () => {
      expect(isValidAppName('python')).toBe(true);
      expect(isValidAppName('kubectl-1.28')).toBe(true);
    });

    it('should reject separators, whitespace and reserved names', () => {
      expect(isValidAppName('')).toBe(false);
      expect(isValidAppName('py@thon')).toBe(false);
      expect(isValidAppName('bin/python')).toBe(false);
      expect(isValidAppName('my app')).toBe(false);
      expect(isValidAppName('..')).toBe(false);
      expect(isValidAppName('__proto__')).toBe(false);
    });
  });

  describe('isValidTag', () => {
    it('should allow @ inside tags but not slashes', () => {
      expect(isValidTag('3.9.8')).toBe(true);
      expect(isValidTag('v1@beta')).toBe(true);
      expect(isValidTag('a/b')).toBe(false);
      expect(isValidTag('.')).toBe(false);
    });
  });

  describe('parseAppSpec', () => {
    it('should split at the first @', () => {
      expect(parseAppSpec('python@3.9.8')).toEqual({ appName: 'python', tag: '3.9.8' });
      expect(parseAppSpec('tool@v1@beta')).toEqual({ appName: 'tool', tag: 'v1@beta' });
    });

    it('should return no tag when there is no @', () => {
      expect(parseAppSpec('python')).toEqual({ appName: 'python' });
    });

    it('should reject an empty tag', () => {
      expect(() => parseAppSpec('python@')).toThrow('Invalid tag ""');
    });

    it('should reject an empty application name with InvalidName', () => {
      try {
        parseAppSpec('@3.8');
        expect.unreachable();
      } catch (err) {
        expect(isSwitchError(err, 'InvalidName')).toBe(true);
      }
    });
  });

  it('should format specs back', () => {
    expect(formatAppSpec('python', '3.8')).toBe('python@3.8');
    expect(formatAppSpec('python')).toBe('python');
  });

  it('assertAppName should throw for invalid names', () => {
    expect(() => assertAppName('a b')).toThrow('Invalid application name "a b"');
  });

  describe('expandPath', () => {
    it('should expand ~ against the home directory', () => {
      expect(expandPath('~', '/home/tester', '/work')).toBe('/home/tester');
      expect(expandPath('~/bin/tool', '/home/tester', '/work')).toBe('/home/tester/bin/tool');
    });

    it('should resolve relative paths against cwd', () => {
      expect(expandPath('tools/../bin/tool', '/home/tester', '/work')).toBe('/work/bin/tool');
    });

    it('should normalize absolute paths', () => {
      expect(expandPath('/usr//bin/./python3', '/home/tester', '/work')).toBe('/usr/bin/python3');
    });
  });
});
