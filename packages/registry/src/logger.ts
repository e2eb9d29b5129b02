/**
 * Debug log for binswap
 *
 * Appends to the settings' log path (~/.local/share/binswap/debug.log by
 * default). A failure to log never fails the command.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getSettings } from './settings.js';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CMD';

// Past this size the log moves to <log>.old when a session starts
const ROTATE_AT_BYTES = 5 * 1024 * 1024;

let logPath: string | null = null;
let sessionOpen = false;

export function getLogPath(): string {
  if (!logPath) {
    logPath = getSettings().logPath;
  }
  return logPath;
}

/**
 * Forget the cached path and session (for testing)
 */
export function resetLogger(): void {
  logPath = null;
  sessionOpen = false;
}

function append(file: string, text: string): void {
  try {
    fs.appendFileSync(file, text);
  } catch {
    // nowhere left to report it
  }
}

function rotate(file: string): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const stats = fs.statSync(file, { throwIfNoEntry: false });
    if (stats && stats.size > ROTATE_AT_BYTES) {
      fs.renameSync(file, `${file}.old`);
    }
  } catch {
    // a log that keeps growing is still usable
  }
}

function openSession(): void {
  if (sessionOpen) return;
  sessionOpen = true;

  const file = getLogPath();
  rotate(file);
  const rule = '='.repeat(80);
  append(file, `\n${rule}\n[${new Date().toISOString()}] binswap session started (pid ${process.pid})\n${rule}\n`);
}

function describeData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack ? `\n  Error: ${data.message}\n  Stack: ${data.stack}` : `\n  Error: ${data.message}`;
  }
  if (typeof data !== 'object' || data === null) {
    return `\n  Data: ${String(data)}`;
  }
  try {
    return `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
  } catch {
    return '\n  Data: [Could not serialize]';
  }
}

/**
 * One log line, with optional data indented below it
 */
export function formatEntry(level: LogLevel, message: string, data?: unknown): string {
  const head = `[${new Date().toISOString()}] [${level}] ${message}`;
  return (data === undefined ? head : head + describeData(data)) + '\n';
}

function write(level: LogLevel, message: string, data?: unknown): void {
  openSession();
  append(getLogPath(), formatEntry(level, message, data));
}

export function logInfo(message: string, data?: unknown): void {
  write('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  write('WARN', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  write('DEBUG', message, data);
}

/**
 * Record a failure with its name, code and stack under `context`
 */
export function logFullError(context: string, error: unknown, extra?: Record<string, unknown>): void {
  const details: Record<string, unknown> = { context, ...extra };

  if (error instanceof Error) {
    details.errorName = error.name;
    details.errorMessage = error.message;
    if ('code' in error) details.errorCode = error.code;
    details.errorStack = error.stack;
  } else {
    details.rawError = String(error);
  }

  write('ERROR', `Error in ${context}`, details);
}

export interface CommandLogger {
  debug(message: string, data?: unknown): void;
  command(cmd: string, args?: Record<string, unknown>): void;
}

/**
 * Logger that prefixes every line with the command name
 */
export function createCommandLogger(commandName: string): CommandLogger {
  return {
    debug: (message, data) => logDebug(`[${commandName}] ${message}`, data),
    command: (cmd, args) => write('CMD', `[${commandName}] Executing: ${cmd}`, args),
  };
}
