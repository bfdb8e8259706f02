/**
 * @temurin-ci/parser - remote-trigger extraction from Jenkins console logs
 *
 * Architecture:
 * - html.ts   : HTML console page to plain-text transcript
 * - context/  : console log FORMAT parsers (jenkins, passthrough)
 * - parsers/  : trigger CONTENT parsers (detailed, simple, announcement)
 * - spawned.ts: downstream job extraction from plain console text
 */

// ============================================================================
// Context Parsers (console log FORMAT)
// ============================================================================

export type {
  ContextParser,
  LineContext,
  ParseLineResult,
} from "./context/index.js";

export {
  createJenkinsContextParser,
  createPassthroughParser,
  jenkinsParser,
  passthroughParser,
} from "./context/index.js";

// ============================================================================
// Trigger Parsers (trigger CONTENT)
// ============================================================================

export {
  ANNOUNCEMENT_MARKER,
  AnnouncementParser,
  CONFIGURATION_HEADER,
  createAnnouncementParser,
  createDetailedParser,
  createSimpleParser,
  DetailedTriggerParser,
  SimpleTriggerParser,
} from "./parsers/index.js";

// ============================================================================
// Core Types
// ============================================================================

export type {
  AnomalyReporter,
  ExtractionAnomaly,
  ExtractOptions,
} from "./extractor.js";
export type {
  ParseContext,
  ParseResult,
  TriggerParser,
} from "./parser-types.js";
export type { SerializeOptions } from "./serialize.js";
export type {
  ParentInfo,
  SpawnedJob,
  SpawnedJobsResult,
} from "./spawned.js";
export type {
  AnnouncementTrigger,
  Coerced,
  DetailedTrigger,
  ExtractionResult,
  SimpleTrigger,
  TriggerParameters,
  TriggerRecord,
  TriggerType,
} from "./types.js";

// ============================================================================
// Core Utilities
// ============================================================================

export { createExtractor, Extractor, maxLineLength } from "./extractor.js";
export {
  decodeEntities,
  extractHref,
  htmlToLines,
  htmlToText,
  stripTags,
} from "./html.js";
export {
  BaseParser,
  createParseContext,
  MalformedTriggerError,
  MultiLineParser,
} from "./parser-types.js";
export { createRegistry, ParserRegistry } from "./registry.js";
export {
  isSensitiveKey,
  orderRecordKeys,
  REDACTED,
  redactParameters,
  serializeRecord,
  serializeResult,
  toJsonDocument,
} from "./serialize.js";
export {
  extractParentInfo,
  extractSpawnedJobs,
  parseSpawnedJobs,
  UNKNOWN_BUILD,
  UNKNOWN_PARENT,
} from "./spawned.js";
export { countByType, createExtractionResult } from "./types.js";
export {
  firstQuotedOrToken,
  jobNameFromUrl,
  parseBoolean,
  parseInteger,
  parseKeyValueTokens,
  splitParameterList,
  stripAnsi,
} from "./utils.js";

// ============================================================================
// Default Registry Factory
// ============================================================================

import {
  createAnnouncementParser,
  createDetailedParser,
  createSimpleParser,
} from "./parsers/index.js";
import { createRegistry, type ParserRegistry } from "./registry.js";

/**
 * Create a parser registry with all trigger parsers registered.
 *
 * Priority order (highest to lowest):
 * - Detailed (90)
 * - Simple (80)
 * - Announcement (70)
 */
export const createDefaultRegistry = (): ParserRegistry => {
  const registry = createRegistry();
  registry.register(createDetailedParser());
  registry.register(createSimpleParser());
  registry.register(createAnnouncementParser());
  return registry;
};

// ============================================================================
// Convenience API for Simple Usage
// ============================================================================

import { jenkinsParser } from "./context/index.js";
import {
  createExtractor,
  type ExtractOptions,
  type Extractor,
} from "./extractor.js";
import { htmlToText } from "./html.js";
import { createExtractionResult, type ExtractionResult } from "./types.js";

/**
 * Singleton extractor with default registry.
 * Created lazily on first use.
 */
let defaultExtractor: Extractor | undefined;

const getDefaultExtractor = (): Extractor => {
  if (!defaultExtractor) {
    defaultExtractor = createExtractor(createDefaultRegistry());
  }
  return defaultExtractor;
};

/**
 * Extract remote triggers from plain console text with Jenkins timestamps.
 */
export const extractTriggersFromText = (
  text: string,
  options: ExtractOptions = {}
): ExtractionResult =>
  createExtractionResult(
    getDefaultExtractor().extract(text, jenkinsParser, options)
  );

/**
 * Extract remote triggers from an HTML console page.
 * Plain text without markup is accepted as well.
 *
 * @example
 * ```typescript
 * import { extractTriggers, serializeResult } from "@temurin-ci/parser";
 *
 * const result = extractTriggers(html);
 * await writeFile("triggers.json", serializeResult(result));
 * ```
 */
export const extractTriggers = (
  html: string,
  options: ExtractOptions = {}
): ExtractionResult => extractTriggersFromText(htmlToText(html), options);
