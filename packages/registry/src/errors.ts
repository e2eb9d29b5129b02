/**
 * Error kinds reported by the registry and switch engine
 */

export type SwitchErrorCode =
  | 'CorruptRegistry'
  | 'SourceNotFound'
  | 'TargetMissing'
  | 'EmptyCommand'
  | 'AmbiguousTag'
  | 'MissingTag'
  | 'NoActiveTag'
  | 'UnknownTag'
  | 'UnknownApplication'
  | 'InstallFailed'
  | 'InvalidName'
  | 'TagExists'
  | 'UnmanagedLauncher';

/**
 * Registry-specific error class
 */
export class SwitchError extends Error {
  readonly code: SwitchErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: SwitchErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SwitchError';
    this.code = code;
    this.details = details;
  }
}

export function isSwitchError(error: unknown, code?: SwitchErrorCode): error is SwitchError {
  return error instanceof SwitchError && (code === undefined || error.code === code);
}

/**
 * Node system error with an errno code, e.g. ENOENT
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
