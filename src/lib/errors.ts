/** Error categories for deploy-sync */
export const ErrorCode = {
  // Config errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
  EXCLUSIONS_NOT_FOUND: 'EXCLUSIONS_NOT_FOUND',
  SYNC_PATHS_OVERLAP: 'SYNC_PATHS_OVERLAP',

  // Step errors
  SERVICE_STOP_FAILED: 'SERVICE_STOP_FAILED',
  SYNC_FAILED: 'SYNC_FAILED',
  SERVICE_START_FAILED: 'SERVICE_START_FAILED',
  STEP_FAILED: 'STEP_FAILED',

  // State errors
  STATE_NOT_FOUND: 'STATE_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Codes raised before any step runs; the CLI exits 3 for these */
export const CONFIG_ERROR_CODES: readonly ErrorCode[] = [
  ErrorCode.CONFIG_NOT_FOUND,
  ErrorCode.CONFIG_PARSE_ERROR,
  ErrorCode.CONFIG_VALIDATION_ERROR,
  ErrorCode.EXCLUSIONS_NOT_FOUND,
  ErrorCode.SYNC_PATHS_OVERLAP,
];

/** Deploy error with code and optional remediation hint */
export class DeployError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'DeployError';
  }
}

export function isConfigError(err: unknown): err is DeployError {
  return err instanceof DeployError && CONFIG_ERROR_CODES.includes(err.code);
}
