/**
 * Execute an application's active entry in the foreground
 */

import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import { constants } from 'os';
import type { RunPlan } from '@binswap/registry';

export interface SpawnSpec {
  file: string;
  args: string[];
  options: SpawnOptions;
}

/**
 * Command entries run through sh so the stored command line keeps its
 * quoting; extra arguments are appended as "$@".
 */
export function buildSpawnSpec(
  plan: RunPlan,
  args: string[],
  baseEnv: NodeJS.ProcessEnv = process.env
): SpawnSpec {
  const options: SpawnOptions = {
    cwd: plan.cwd,
    env: { ...baseEnv, ...plan.env },
    stdio: 'inherit',
  };

  if (plan.shell) {
    return { file: '/bin/sh', args: ['-c', `${plan.command} "$@"`, plan.appName, ...args], options };
  }
  return { file: plan.command, args, options };
}

/**
 * Shell-style exit status: the child's code, or 128 + the signal number
 * that killed it
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + constants.signals[signal];
  return 1;
}

/**
 * Run to completion and resolve with the exit status
 */
export function runPlan(plan: RunPlan, args: string[]): Promise<number> {
  const spec = buildSpawnSpec(plan, args);

  return new Promise((resolve, reject) => {
    const child = spawn(spec.file, spec.args, spec.options);
    const forward = () => child.kill('SIGINT');
    process.on('SIGINT', forward);

    child.on('error', (error) => {
      process.off('SIGINT', forward);
      reject(error);
    });
    child.on('exit', (code, signal) => {
      process.off('SIGINT', forward);
      resolve(exitStatus(code, signal));
    });
  });
}
