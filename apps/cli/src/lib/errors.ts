/**
 * Error classes shared by CLI commands.
 * Every fatal condition maps to one class so commands can report it by name.
 */

/** Unreadable or undecodable input file */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/** Output file could not be written */
export class OutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OutputError";
  }
}

/** Invalid or missing configuration (flags, env, token files) */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class JenkinsAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JenkinsAuthError";
  }
}

export class JenkinsNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JenkinsNotFoundError";
  }
}

export class JenkinsRequestError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "JenkinsRequestError";
    this.status = status;
  }
}

export class JenkinsNetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JenkinsNetworkError";
  }
}

export class JenkinsTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JenkinsTimeoutError";
  }
}

export class GitHubApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "GitHubApiError";
    this.status = status;
  }
}

/**
 * True for the DOMException fetch rejects with when AbortSignal.timeout fires.
 */
export const isTimeoutError = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === "TimeoutError" || error.name === "AbortError");
