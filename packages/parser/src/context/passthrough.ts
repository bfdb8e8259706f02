/**
 * Passthrough context parser.
 * Passes lines through unchanged without any format-specific processing.
 * Use this when parsing text that carries no timestamp prefixes.
 */

import type { ContextParser, ParseLineResult } from "./types.js";

/**
 * Create a passthrough context parser.
 * Lines pass through unchanged with empty context.
 */
export const createPassthroughParser = (): ContextParser => ({
  parseLine(line: string): ParseLineResult {
    return {
      ctx: { timestamp: "" },
      cleanLine: line,
      skip: false,
    };
  },
});

/**
 * Singleton instance for convenience.
 */
export const passthroughParser: ContextParser = createPassthroughParser();
