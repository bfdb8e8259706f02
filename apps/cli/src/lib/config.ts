/**
 * Configuration for the CLI.
 *
 * Values come from the environment (a .env file is loaded at startup in
 * development) and are overridden by command-line flags.
 */

import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Config is the resolved environment configuration.
 */
export interface Config {
  jenkinsUrl: string;
  jenkinsUsername: string;
  jenkinsToken?: string;
  githubToken?: string;
  githubApiUrl: string;
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

type Env = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_JENKINS_URL = "https://ci.adoptium.net/";
export const DEFAULT_JENKINS_USERNAME = "anonymous";
export const DEFAULT_GITHUB_API_URL = "https://api.github.com";

const ALLOWED_PROTOCOLS = ["http:", "https:"] as const;
const TOKEN_VISIBLE_CHARS = 4;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validates a server URL. Must be absolute http(s).
 */
export const validateUrl = (url: string): ValidationResult => {
  if (!url || url.trim() === "") {
    return { valid: false, error: "URL is required" };
  }

  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return { valid: false, error: `Invalid URL: ${url}` };
  }

  if (!ALLOWED_PROTOCOLS.some((protocol) => protocol === parsed.protocol)) {
    return {
      valid: false,
      error: `URL must use http or https: ${url}`,
    };
  }

  return { valid: true };
};

/**
 * Validates a pipeline run number. Must be a positive integer.
 */
export const validateRunNumber = (value: string): ValidationResult => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { valid: false, error: "Run number must be a positive integer" };
  }
  const n = Number.parseInt(trimmed, 10);
  if (n < 1 || !Number.isSafeInteger(n)) {
    return { valid: false, error: "Run number must be a positive integer" };
  }
  return { valid: true };
};

/**
 * Validates a pipeline name. Folder paths use "/" separators.
 */
export const validatePipelineName = (name: string): ValidationResult => {
  const segments = name.split("/").filter((segment) => segment.trim() !== "");
  if (segments.length === 0) {
    return { valid: false, error: "Pipeline name is required" };
  }
  if (segments.some((segment) => segment === "." || segment === "..")) {
    return {
      valid: false,
      error: `Pipeline name cannot contain "." or ".." segments: ${name}`,
    };
  }
  return { valid: true };
};

/**
 * Mask a token for display, keeping the last few characters.
 */
export const maskToken = (token: string): string => {
  if (token.length <= TOKEN_VISIBLE_CHARS) {
    return "****";
  }
  return `****${token.slice(-TOKEN_VISIBLE_CHARS)}`;
};

// ============================================================================
// Config Loading
// ============================================================================

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const requireValidUrl = (name: string, url: string): string => {
  const result = validateUrl(url);
  if (!result.valid) {
    throw new ConfigError(`${name}: ${result.error ?? "invalid URL"}`);
  }
  return url;
};

/**
 * Loads configuration from the environment with defaults.
 * Throws ConfigError for invalid URLs.
 */
export const loadConfig = (env: Env = process.env): Config => ({
  jenkinsUrl: requireValidUrl(
    "JENKINS_URL",
    nonEmpty(env.JENKINS_URL) ?? DEFAULT_JENKINS_URL
  ),
  jenkinsUsername: nonEmpty(env.JENKINS_USERNAME) ?? DEFAULT_JENKINS_USERNAME,
  jenkinsToken: nonEmpty(env.JENKINS_TOKEN),
  githubToken: nonEmpty(env.GITHUB_TOKEN),
  githubApiUrl: requireValidUrl(
    "GITHUB_API_URL",
    nonEmpty(env.GITHUB_API_URL) ?? DEFAULT_GITHUB_API_URL
  ),
});
