/**
 * Jenkins HTTP client.
 *
 * Fetches pipeline run console logs using HTTP Basic authentication with a
 * username and API token.
 */

import {
  isTimeoutError,
  JenkinsAuthError,
  JenkinsNetworkError,
  JenkinsNotFoundError,
  JenkinsRequestError,
  JenkinsTimeoutError,
} from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export type ConsoleFormat = "text" | "html" | "timestamps";

export const CONSOLE_FORMATS: readonly ConsoleFormat[] = [
  "text",
  "html",
  "timestamps",
];

export const isConsoleFormat = (value: string): value is ConsoleFormat =>
  CONSOLE_FORMATS.some((format) => format === value);

export interface JenkinsCredentials {
  readonly username: string;
  readonly token: string;
}

export interface FetchConsoleOptions {
  readonly baseUrl: string;
  readonly pipelineName: string;
  readonly runNumber: number;
  readonly format?: ConsoleFormat;
  readonly credentials: JenkinsCredentials;
  readonly timeoutMs?: number;
}

export interface ConsoleLog {
  readonly url: string;
  readonly content: string;
}

// ============================================================================
// Constants
// ============================================================================

export const JENKINS_TIMEOUT_MS = 60_000;

const CONSOLE_PATHS: Record<ConsoleFormat, string> = {
  text: "consoleText",
  html: "consoleFull",
  timestamps:
    "timestamps/?time=HH:mm:ss&timeZone=GMT-7&appendLog&locale=en_US",
};

// ============================================================================
// URL Helpers
// ============================================================================

/**
 * Build the console URL for a run. Folder paths ("folder/pipeline") get a
 * job/ prefix per segment, each segment percent-encoded.
 */
export const buildConsoleUrl = (
  baseUrl: string,
  pipelineName: string,
  runNumber: number,
  format: ConsoleFormat = "text"
): string => {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  const jobPath = pipelineName
    .split("/")
    .filter((segment) => segment !== "")
    .map((segment) => `job/${encodeURIComponent(segment)}`)
    .join("/");
  return `${base}${jobPath}/${runNumber}/${CONSOLE_PATHS[format]}`;
};

export const basicAuthHeader = ({ username, token }: JenkinsCredentials) =>
  `Basic ${Buffer.from(`${username}:${token}`, "utf-8").toString("base64")}`;

// ============================================================================
// Requests
// ============================================================================

/**
 * Fetch a run's console log.
 */
export const fetchConsoleLog = async (
  options: FetchConsoleOptions
): Promise<ConsoleLog> => {
  const {
    baseUrl,
    pipelineName,
    runNumber,
    format = "text",
    credentials,
    timeoutMs = JENKINS_TIMEOUT_MS,
  } = options;
  const url = buildConsoleUrl(baseUrl, pipelineName, runNumber, format);

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Authorization: basicAuthHeader(credentials) },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new JenkinsTimeoutError(
        "Request timed out. The Jenkins server may be slow to respond."
      );
    }
    throw new JenkinsNetworkError(
      `Unable to connect to Jenkins server at '${baseUrl}'. Please check the URL.`
    );
  }

  if (response.status === 401) {
    throw new JenkinsAuthError(
      "Authentication failed. Please check your username and API token."
    );
  }

  if (response.status === 404) {
    throw new JenkinsNotFoundError(
      `Pipeline run not found. Please check that pipeline name '${pipelineName}' and run number '${runNumber}' are correct.`
    );
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw new JenkinsRequestError(
      `Failed to retrieve console log. HTTP status code: ${response.status}${body ? `\nResponse: ${body}` : ""}`,
      response.status
    );
  }

  return { url, content: await response.text() };
};
