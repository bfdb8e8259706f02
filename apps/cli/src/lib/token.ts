/**
 * Token resolution for commands that accept --token or --token-file.
 */

import { readFile } from "node:fs/promises";
import { ConfigError } from "./errors.js";

export interface TokenSources {
  /** Value of --token */
  readonly token?: string;
  /** Value of --token-file */
  readonly tokenFile?: string;
  /** Token from the environment, used when neither flag is given */
  readonly envToken?: string;
  /** Environment variable name, for messages */
  readonly envName: string;
  /** Service name, for messages ("Jenkins", "GitHub") */
  readonly service: string;
}

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

/**
 * Read a token file and trim surrounding whitespace.
 */
export const readTokenFile = async (path: string): Promise<string> => {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new ConfigError(`Token file '${path}' not found`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Error reading token file '${path}': ${message}`);
  }
  return content.trim();
};

/**
 * Resolve a token from flags or the environment.
 * --token and --token-file are mutually exclusive; an empty token is an
 * error. Returns undefined only when nothing was given and required is false.
 */
export const resolveToken = async (
  sources: TokenSources,
  { required = true }: { readonly required?: boolean } = {}
): Promise<string | undefined> => {
  const { token, tokenFile, envToken, envName, service } = sources;

  if (token !== undefined && tokenFile !== undefined) {
    throw new ConfigError("--token and --token-file are mutually exclusive");
  }

  let resolved: string | undefined;
  if (token !== undefined) {
    resolved = token.trim();
  } else if (tokenFile !== undefined) {
    resolved = await readTokenFile(tokenFile);
  } else if (envToken !== undefined) {
    resolved = envToken.trim();
  }

  if (resolved === undefined) {
    if (required) {
      throw new ConfigError(
        `Either --token or --token-file must be provided (or set ${envName})`
      );
    }
    return undefined;
  }

  if (resolved === "") {
    throw new ConfigError(`${service} token is empty`);
  }
  return resolved;
};
