/**
 * Process exit codes for renum
 */
export const ExitCode = {
  /** Enum values (or help/version) were printed */
  SUCCESS: 0,
  /** Something threw while rendering */
  UNEXPECTED_ERROR: 1,
  /** No input string could be obtained, or an option value was bad */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function describeExitCode(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'success';
    case ExitCode.UNEXPECTED_ERROR:
      return 'unexpected error';
    case ExitCode.USAGE_ERROR:
      return 'no input string';
  }
}
