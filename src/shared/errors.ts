export enum PatchErrorCode {
  INVALID_REFERENCE = 'INVALID_REFERENCE',
  UNKNOWN_COMMIT = 'UNKNOWN_COMMIT',
  LOCAL_COMMIT = 'LOCAL_COMMIT',
  CONFLICTING_FILTER = 'CONFLICTING_FILTER',
  NUMBER_OUT_OF_RANGE = 'NUMBER_OUT_OF_RANGE',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_DESTINATION = 'INVALID_DESTINATION',
  INVALID_PATCH = 'INVALID_PATCH',
  GIT_ERROR = 'GIT_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  USAGE_ERROR = 'USAGE_ERROR',
}

export class PatchError extends Error {
  readonly code: PatchErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: PatchErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PatchError';
    this.code = code;
    this.context = context;
  }
}

export function isPatchError(err: unknown, code?: PatchErrorCode): err is PatchError {
  return err instanceof PatchError && (code === undefined || err.code === code);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
