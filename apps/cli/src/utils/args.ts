/**
 * Narrowing helpers for citty's parsed args.
 */

import { ConfigError } from "../lib/errors.js";

/**
 * A string flag's value, or undefined when the flag was not given.
 */
export const stringArg = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

/**
 * A required string flag. Blank values count as missing.
 */
export const requireStringArg = (value: unknown, flag: string): string => {
  const str = stringArg(value);
  if (str === undefined || str.trim() === "") {
    throw new ConfigError(`Missing required option --${flag}`);
  }
  return str;
};

export const booleanArg = (value: unknown): boolean => value === true;
