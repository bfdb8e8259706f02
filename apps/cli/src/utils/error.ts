/**
 * Formats an unknown error into a string message.
 * Handles Error instances and falls back to String().
 */
export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

/**
 * Print a fatal error to stderr and exit with status 1.
 */
export const exitWithError = (error: unknown): never => {
  console.error(`Error: ${formatError(error)}`);
  process.exit(1);
};
