/**
 * Console context parser types.
 * Context parsers handle the log FORMAT (timestamp prefixes, console notes).
 * They extract line context and clean lines for trigger parsers.
 */

/**
 * LineContext contains context extracted from a console log line.
 */
export interface LineContext {
  /** Timestamp prefix of the line, ISO-8601 where a date was present; "" if none */
  readonly timestamp: string;
}

/**
 * Result of parsing a console log line.
 */
export interface ParseLineResult {
  /** Extracted context */
  readonly ctx: LineContext;
  /** Cleaned line (with timestamp prefix and console notes removed) */
  readonly cleanLine: string;
  /** Whether to skip this line entirely (pipeline flow markers) */
  readonly skip: boolean;
}

/**
 * ContextParser extracts log-format context from console lines.
 *
 * @example
 * ```typescript
 * const result = jenkinsParser.parseLine("[2025-07-15T10:23:45Z] Remote build started!");
 * // { ctx: { timestamp: "2025-07-15T10:23:45Z" },
 * //   cleanLine: "Remote build started!", skip: false }
 * ```
 */
export interface ContextParser {
  /**
   * Extracts context from a log line.
   * Returns the context, the cleaned line, and whether to skip.
   */
  parseLine(line: string): ParseLineResult;
}
