import { describe, it, expect } from 'vitest';
import { SwitchError, getLogPath } from '@binswap/registry';
import { describeFailure } from '../error-handler.js';

describe('describeFailure', () => {
  it('should add a hint for known error codes', () => {
    const error = new SwitchError('NoActiveTag', "Application python doesn't have an active tag");

    expect(describeFailure(error)).toEqual({
      message: "Application python doesn't have an active tag",
      hint: 'Select a tag first: binswap use <app>@<tag>',
    });
  });

  it('should pass the message through when there is no hint', () => {
    const error = new SwitchError('InstallFailed', 'Cannot install launcher /bin/tool: EACCES');

    expect(describeFailure(error)).toEqual({ message: 'Cannot install launcher /bin/tool: EACCES' });
  });

  it('should point unexpected errors at the debug log', () => {
    expect(describeFailure(new Error('boom'))).toEqual({
      message: 'Unexpected error: boom',
      hint: `Details in ${getLogPath()}`,
    });
  });
});
