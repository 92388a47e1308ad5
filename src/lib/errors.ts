/** Error categories for hostprep */
export const ErrorCode = {
  // Plan errors
  PLAN_NOT_FOUND: 'PLAN_NOT_FOUND',
  PLAN_PARSE_ERROR: 'PLAN_PARSE_ERROR',
  PLAN_VALIDATION_ERROR: 'PLAN_VALIDATION_ERROR',

  // Registry errors
  DUPLICATE_STEP_NAME: 'DUPLICATE_STEP_NAME',
  STEP_NOT_FOUND: 'STEP_NOT_FOUND',

  // Run preconditions
  PRIVILEGE_REQUIRED: 'PRIVILEGE_REQUIRED',

  // Step errors
  SSHD_CONFIG_NOT_FOUND: 'SSHD_CONFIG_NOT_FOUND',
  EMPTY_SSH_KEY: 'EMPTY_SSH_KEY',
  INVALID_SSH_KEY: 'INVALID_SSH_KEY',

  // CLI errors
  INTERACTIVE_REQUIRED: 'INTERACTIVE_REQUIRED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** hostprep error with code and optional remediation hint */
export class ProvisionError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'ProvisionError';
  }
}

/** Raised at registration time when two steps share a name */
export class DuplicateStepNameError extends ProvisionError {
  constructor(public readonly stepName: string) {
    super(
      ErrorCode.DUPLICATE_STEP_NAME,
      `duplicate step name: "${stepName}"`,
      'Every step in a plan needs its own name',
    );
    this.name = 'DuplicateStepNameError';
  }
}

/** Raised when the run is started without the required privilege */
export class PrivilegeError extends ProvisionError {
  constructor(message: string) {
    super(ErrorCode.PRIVILEGE_REQUIRED, message, 'Run with sudo or as root.');
    this.name = 'PrivilegeError';
  }
}

/** Human-readable message for any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
