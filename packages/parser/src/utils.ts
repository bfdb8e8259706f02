/**
 * Parser utilities for trigger extraction.
 * Contains shared helpers used across parsers.
 */

import type { Coerced, TriggerParameters } from "./types.js";

// ============================================================================
// ANSI Escape Code Handling
// ============================================================================

/**
 * Pattern matching ANSI escape sequences for terminal output.
 * Covers:
 * - CSI sequences: ESC[ followed by parameters and a final byte (0x40-0x7E)
 *   Examples: \x1b[0m (reset), \x1b[31m (red), \x1b[2J (clear screen)
 * - OSC sequences: ESC] ... (BEL | ESC\)
 * - Simple escape sequences: ESC followed by single char
 *
 * ReDoS safety: [^\x07\x1b]* with bounded alternatives prevents catastrophic
 * backtracking.
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: intentional ANSI escape sequence matching
const ansiEscapePattern =
  /\x1b\[[0-9;:?]*[A-Za-z]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)?|\x1b[()][AB012]|\x1b[@-_]/g;

/**
 * Remove ANSI escape sequences from a string.
 * Jenkins' AnsiColor plugin leaves them in plain-text console logs.
 */
export const stripAnsi = (s: string): string =>
  s.replace(ansiEscapePattern, "");

// ============================================================================
// Typed Value Coercion
// ============================================================================

const booleanPattern = /^(true|false)$/i;
const integerPattern = /^[+-]?\d+$/;

/**
 * Convert "true"/"false" (any case) to a boolean.
 * Other non-empty text is returned as written; empty text yields undefined.
 */
export const parseBoolean = (value: string): Coerced<boolean> | undefined => {
  const trimmed = value.trim();
  if (trimmed === "") {
    return undefined;
  }
  if (booleanPattern.test(trimmed)) {
    return trimmed.toLowerCase() === "true";
  }
  return trimmed;
};

/**
 * Convert decimal text to an integer.
 * Other non-empty text is returned as written; empty text yields undefined.
 */
export const parseInteger = (value: string): Coerced<number> | undefined => {
  const trimmed = value.trim();
  if (trimmed === "") {
    return undefined;
  }
  if (integerPattern.test(trimmed)) {
    const n = Number.parseInt(trimmed, 10);
    if (Number.isSafeInteger(n)) {
      return n;
    }
  }
  return trimmed;
};

// ============================================================================
// URL Helpers
// ============================================================================

/**
 * Percent-decode a string, returning it unchanged when it is not valid
 * percent-encoding.
 */
export const safeDecodeURIComponent = (s: string): string => {
  try {
    return decodeURIComponent(s);
  } catch {
    return s;
  }
};

const jobSegmentPattern = /\/job\/([^/?#\s]+)/g;

/**
 * Derive a job name from a Jenkins job URL.
 * https://ci.example.org/job/folder/job/AQA_Test_Pipeline/ -> "AQA_Test_Pipeline"
 * Returns undefined when the string has no /job/ segment.
 */
export const jobNameFromUrl = (url: string): string | undefined => {
  let last: string | undefined;
  for (const match of url.matchAll(jobSegmentPattern)) {
    last = match[1];
  }
  return last === undefined ? undefined : safeDecodeURIComponent(last);
};

const quotedPattern = /'([^']+)'|"([^"]+)"/;

/**
 * Take the first quoted string from text, or its first whitespace token.
 * "'https://host/job/x' now" -> "https://host/job/x"
 */
export const firstQuotedOrToken = (text: string): string | undefined => {
  const quoted = quotedPattern.exec(text);
  if (quoted) {
    return quoted[1] ?? quoted[2];
  }
  const token = text.trim().split(/\s+/)[0];
  return token ? token : undefined;
};

// ============================================================================
// Parameter Lists
// ============================================================================

/**
 * A parameter key: identifier-like, allowing dots and dashes.
 */
export const parameterKeyPattern = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/** A key followed by "=" at the start of the remaining text */
const nextKeyPattern = /^[A-Za-z_][A-Za-z0-9_.-]*\s*=/;

/** Surrounding brackets or braces of a printed list */
const listDelimiterPattern = /^\s*[[{]([\s\S]*)[\]}]\s*$/;

const count = (s: string, ch: string): number => s.split(ch).length - 1;

/**
 * Remove list delimiters. A list printed over several lines opens on one
 * line and closes on another, so an unbalanced opening or closing bracket
 * is stripped on its own. Balanced brackets inside values are kept.
 */
const stripListDelimiters = (list: string): string => {
  const enclosed = listDelimiterPattern.exec(list)?.[1];
  if (enclosed !== undefined) {
    return enclosed;
  }
  let body = list.trim();
  for (const [open, close] of [
    ["[", "]"],
    ["{", "}"],
  ] as const) {
    const opens = count(body, open);
    const closes = count(body, close);
    if (body.startsWith(open) && opens > closes) {
      body = body.slice(1);
    } else if (body.endsWith(close) && closes > opens) {
      body = body.slice(0, -1);
    }
  }
  return body;
};

/**
 * Clean a parameter value: trim and percent-decode URLs.
 */
const cleanParameterValue = (value: string): string => {
  const trimmed = value.trim();
  if (trimmed.startsWith("http")) {
    return safeDecodeURIComponent(trimmed);
  }
  return trimmed;
};

/**
 * Check whether the comma at commaIndex ends a parameter.
 * It does when the following text starts a new KEY= pair, or when it is
 * the last character, so URL query strings with commas stay intact.
 */
const isParameterEnd = (s: string, commaIndex: number): boolean => {
  const rest = s.slice(commaIndex + 1).trimStart();
  if (rest === "") {
    return true;
  }
  return nextKeyPattern.test(rest);
};

/**
 * Split a printed parameter list into key/value pairs.
 * Accepts [A=1, B=2], {A=1, B=2} and A=1, B=2, and either half of a list
 * split across lines ("[A=1," and "B=2]").
 *
 * @example
 * ```typescript
 * splitParameterList("[TARGETS=sanity.openjdk, URL=https://x/y?a=1,2]");
 * // { TARGETS: "sanity.openjdk", URL: "https://x/y?a=1,2" }
 * ```
 */
export const splitParameterList = (list: string): TriggerParameters => {
  const parameters: TriggerParameters = {};
  const body = stripListDelimiters(list);

  let key: string | undefined;
  let current = "";

  const commit = (): void => {
    if (key !== undefined && parameterKeyPattern.test(key)) {
      parameters[key] = cleanParameterValue(current);
    }
    key = undefined;
    current = "";
  };

  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === "=" && key === undefined) {
      key = current.trim().replace(/,+$/, "").trim();
      current = "";
    } else if (ch === "," && key !== undefined && isParameterEnd(body, i)) {
      commit();
    } else {
      current += ch;
    }
  }
  commit();

  return parameters;
};

const keyValueTokenPattern = /^([A-Za-z_][A-Za-z0-9_.-]*)=(.*)$/;

/**
 * Parse whitespace-separated KEY=VALUE tokens.
 * Returns undefined if any token is not a KEY=VALUE pair or there are none.
 *
 * @example
 * ```typescript
 * parseKeyValueTokens("PLATFORMS=x86-64_linux JDK_VERSION=21");
 * // { PLATFORMS: "x86-64_linux", JDK_VERSION: "21" }
 * ```
 */
export const parseKeyValueTokens = (
  text: string
): TriggerParameters | undefined => {
  const tokens = text.trim().split(/\s+/).filter((t) => t !== "");
  if (tokens.length === 0) {
    return undefined;
  }
  const parameters: TriggerParameters = {};
  for (const token of tokens) {
    const match = keyValueTokenPattern.exec(token);
    if (!match?.[1]) {
      return undefined;
    }
    parameters[match[1]] = cleanParameterValue(match[2] ?? "");
  }
  return parameters;
};
