import { describe, it, expect } from 'vitest';
import { isSwitchError } from '@binswap/registry';
import { requireTaggedSpec } from '../commands/app-spec.js';

describe('requireTaggedSpec', () => {
  it('should return application and tag', () => {
    expect(requireTaggedSpec('python@3.8')).toEqual({ appName: 'python', tag: '3.8' });
  });

  it('should fail with MissingTag without a tag', () => {
    try {
      requireTaggedSpec('python');
      expect.unreachable();
    } catch (err) {
      expect(isSwitchError(err, 'MissingTag')).toBe(true);
    }
  });
});
