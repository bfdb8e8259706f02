/**
 * Jenkins console context parser.
 *
 * Jenkins console format:
 * - The Timestamper plugin prefixes lines with a time or date-time:
 *   [2025-07-15T10:23:45.123Z] message, 2025-07-15 10:23:45 message,
 *   [10:23:45] message, 10:23:45 message
 * - Raw log files embed console notes as concealed text:
 *   ESC[8mha:////<base64>ESC[0m
 * - AnsiColor output carries ANSI escape sequences
 * - Pipeline flow markers: [Pipeline] {, [Pipeline] }, [Pipeline] // stage
 *
 * This parser strips the prefix and notes, keeping the timestamp as context.
 */

import { stripAnsi } from "../utils.js";
import type { ContextParser, LineContext, ParseLineResult } from "./types.js";

/**
 * Date-time prefix, optionally bracketed.
 * Groups: 1=date, 2=time, 3=fraction, 4=zone
 */
const DATE_TIME_PREFIX_REGEX =
  /^\[?(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(?:[.,](\d+))?(Z|[+-]\d{2}:?\d{2})?\]?(?:\s+|$)/;

/**
 * Time-only prefix from the Timestamper plugin's default format.
 * Groups: 1=time, 2=fraction
 */
const TIME_PREFIX_REGEX = /^\[?(\d{2}:\d{2}:\d{2})(?:\.(\d+))?\]?(?:\s+|$)/;

/**
 * Concealed console note in raw log files.
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: console notes are delimited by escape sequences
const CONSOLE_NOTE_REGEX = /\x1b\[8mha:[^\x1b]*\x1b\[0m/g;

/**
 * Pipeline flow markers that carry no log content.
 */
const FLOW_MARKER_REGEX = /^\[Pipeline\]\s*(?:\{|\}|\/\/.*)?\s*$/;

interface TimestampMatch {
  readonly timestamp: string;
  readonly rest: string;
}

/**
 * Split a leading timestamp from the line.
 * Date-times are normalized to ISO-8601 ("T" separator, "." fraction).
 */
const splitTimestamp = (line: string): TimestampMatch | undefined => {
  const dateTime = DATE_TIME_PREFIX_REGEX.exec(line);
  if (dateTime) {
    const [whole, date, time, fraction, zone] = dateTime;
    const iso = `${date}T${time}${fraction ? `.${fraction}` : ""}${zone ?? ""}`;
    return { timestamp: iso, rest: line.slice(whole.length) };
  }

  const timeOnly = TIME_PREFIX_REGEX.exec(line);
  if (timeOnly) {
    const [whole, time, fraction] = timeOnly;
    return {
      timestamp: `${time}${fraction ? `.${fraction}` : ""}`,
      rest: line.slice(whole.length),
    };
  }

  return undefined;
};

/**
 * JenkinsParser extracts context from Jenkins console output.
 */
class JenkinsParser implements ContextParser {
  parseLine = (line: string): ParseLineResult => {
    const withoutNotes = stripAnsi(line.replace(CONSOLE_NOTE_REGEX, ""));
    const split = splitTimestamp(withoutNotes);
    const cleanLine = split ? split.rest : withoutNotes;

    const ctx: LineContext = {
      timestamp: split?.timestamp ?? "",
    };

    return {
      ctx,
      cleanLine,
      skip: FLOW_MARKER_REGEX.test(cleanLine.trim()),
    };
  };
}

/**
 * Create a Jenkins console context parser.
 */
export const createJenkinsContextParser = (): ContextParser =>
  new JenkinsParser();

/**
 * Singleton instance for convenience.
 */
export const jenkinsParser: ContextParser = createJenkinsContextParser();
