/**
 * Process exit codes returned by runParser
 */

export const ExitCode = {
  /** Parsed cleanly, or help was printed */
  SUCCESS: 0,
  /** The parser threw, e.g. a tree parsed twice */
  UNEXPECTED_ERROR: 1,
  /** The command line did not match the tree */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
