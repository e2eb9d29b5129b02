/**
 * binswap CLI commands
 */

export { trackCommand } from './track.js';
export { useCommand } from './use.js';
export { listCommand } from './list.js';
export { untrackCommand } from './untrack.js';
export { unlinkCommand } from './unlink.js';
export { renameTagCommand } from './rename-tag.js';
export { describeCommand } from './describe.js';
export { runCommand } from './run.js';
export { configCommand } from './config.js';
