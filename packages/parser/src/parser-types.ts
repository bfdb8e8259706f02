/**
 * Parser interface types for trigger parsers.
 */

import type { TriggerRecord } from "./types.js";

// ============================================================================
// Parse Context
// ============================================================================

/**
 * ParseContext provides shared context for trigger parsers during extraction.
 */
export interface ParseContext {
  /** Timestamp of the current line from the context parser, "" if none */
  timestamp: string;

  /** 1-based line number of the current line in the transcript */
  lineNumber: number;
}

/**
 * Create a new ParseContext positioned before the first line.
 */
export const createParseContext = (): ParseContext => ({
  timestamp: "",
  lineNumber: 0,
});

// ============================================================================
// Errors
// ============================================================================

/**
 * MalformedTriggerError is thrown by a parser that recognized a trigger but
 * cannot build a record from it (e.g. a configuration block naming no job).
 * The extractor reports it and moves on.
 */
export class MalformedTriggerError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(message);
    this.name = "MalformedTriggerError";
    this.line = line;
  }
}

// ============================================================================
// Trigger Parser Interface
// ============================================================================

/**
 * ParseResult represents the result of parsing a line.
 * null means the line did not complete a trigger record.
 */
export type ParseResult = TriggerRecord | null;

/**
 * TriggerParser defines the interface for one trigger shape.
 */
export interface TriggerParser {
  /**
   * Unique identifier for this parser ("detailed", "simple", "announcement").
   */
  readonly id: string;

  /**
   * Parse order priority. Higher values are tried first and win ties.
   */
  readonly priority: number;

  /**
   * Returns a confidence score (0.0-1.0) indicating how likely this parser
   * can handle the given line. Returns 0 if the line doesn't match.
   */
  canParse(line: string, ctx: ParseContext): number;

  /**
   * Extracts a trigger record from the line.
   * Returns null if the line doesn't complete a record, including when it
   * opens a multi-line record.
   */
  parse(line: string, ctx: ParseContext): ParseResult;

  /**
   * Returns true if this parser handles multi-line records.
   */
  supportsMultiLine(): boolean;

  /**
   * Processes a continuation line for a multi-line record.
   * Returns true if the line was consumed, false if it ends the record.
   */
  continueMultiLine(line: string, ctx: ParseContext): boolean;

  /**
   * Finalizes the current multi-line record and returns it.
   * Called when continueMultiLine returns false or when input ends.
   */
  finishMultiLine(ctx: ParseContext): ParseResult;

  /**
   * Clears any accumulated multi-line state.
   */
  reset(): void;
}

// ============================================================================
// Base Parser Implementation
// ============================================================================

/**
 * Abstract base class for single-line parsers.
 */
export abstract class BaseParser implements TriggerParser {
  abstract readonly id: string;
  abstract readonly priority: number;

  abstract canParse(line: string, ctx: ParseContext): number;
  abstract parse(line: string, ctx: ParseContext): ParseResult;

  supportsMultiLine(): boolean {
    return false;
  }

  continueMultiLine(_line: string, _ctx: ParseContext): boolean {
    return false;
  }

  finishMultiLine(_ctx: ParseContext): ParseResult {
    return null;
  }

  reset(): void {
    // No-op for single-line parsers
  }
}

/**
 * Abstract base class for parsers with multi-line support.
 */
export abstract class MultiLineParser implements TriggerParser {
  abstract readonly id: string;
  abstract readonly priority: number;

  abstract canParse(line: string, ctx: ParseContext): number;
  abstract parse(line: string, ctx: ParseContext): ParseResult;
  abstract continueMultiLine(line: string, ctx: ParseContext): boolean;
  abstract finishMultiLine(ctx: ParseContext): ParseResult;
  abstract reset(): void;

  supportsMultiLine(): boolean {
    return true;
  }
}
