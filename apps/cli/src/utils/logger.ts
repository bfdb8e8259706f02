/**
 * Console logger for CLI commands.
 *
 * info goes to stdout, warn and error to stderr, debug to stdout only when
 * verbose. Every line carries a local ISO-8601 timestamp with UTC offset.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logs a phase transition, e.g. "[Parse] 1204 lines" */
  phase(phase: string, message: string): void;
  readonly verbose: boolean;
}

export interface LoggerOptions {
  readonly verbose?: boolean;
  /** Clock override for tests */
  readonly now?: () => Date;
}

const MS_PER_MINUTE = 60_000;

/**
 * Format a date as local time with its UTC offset:
 * 2025-07-15T12:23:45.123+02:00
 */
export const formatTimestamp = (date: Date): string => {
  const offset = -date.getTimezoneOffset();
  const offsetHours = String(Math.floor(Math.abs(offset) / 60)).padStart(
    2,
    "0"
  );
  const offsetMinutes = String(Math.abs(offset) % 60).padStart(2, "0");
  const offsetSign = offset >= 0 ? "+" : "-";

  const local = new Date(date.getTime() + offset * MS_PER_MINUTE);
  const iso = local.toISOString().slice(0, -1); // Remove trailing 'Z'
  return `${iso}${offsetSign}${offsetHours}:${offsetMinutes}`;
};

/**
 * Create a logger. Debug output is dropped unless verbose.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const verbose = options.verbose ?? false;
  const now = options.now ?? (() => new Date());

  const line = (message: string): string =>
    `${formatTimestamp(now())} ${message}`;

  return {
    verbose,
    debug(message: string): void {
      if (verbose) {
        console.log(line(`debug: ${message}`));
      }
    },
    info(message: string): void {
      console.log(line(message));
    },
    warn(message: string): void {
      console.error(line(`warning: ${message}`));
    },
    error(message: string): void {
      console.error(line(`error: ${message}`));
    },
    phase(phase: string, message: string): void {
      if (verbose) {
        console.log(line(`[${phase}] ${message}`));
      }
    },
  };
};
