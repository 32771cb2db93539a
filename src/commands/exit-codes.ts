/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  MANIFEST_INVALID: 1,
  GRAMMAR_UNRESOLVED: 2,
  INVALID_ARGS: 3,
  INPUT_UNREADABLE: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
