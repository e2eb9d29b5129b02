import { SwitchError, parseAppSpec } from '@binswap/registry';

/**
 * Parse `<app>@<tag>` where the tag is mandatory
 */
export function requireTaggedSpec(value: string): { appName: string; tag: string } {
  const { appName, tag } = parseAppSpec(value);
  if (tag === undefined) {
    throw new SwitchError('MissingTag', `Tag not specified for application ${appName}`, { appName });
  }
  return { appName, tag };
}
