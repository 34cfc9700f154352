/** Process exit codes of the `circuitc` command. */
export const EXIT_CODES = {
  COMPILE_ERRORS: 1,
  INVALID_INPUT: 2,
  INTERNAL_COMPILER_ERROR: 3,
  UNEXPECTED_FAILURE: 4,
} as const;
