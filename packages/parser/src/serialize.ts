/**
 * Serialization helpers for extraction output.
 * Provides JSON serialization with stable key order and parameter redaction.
 */

import type {
  ExtractionResult,
  TriggerParameters,
  TriggerRecord,
  TriggerType,
} from "./types.js";

// ============================================================================
// Field Redaction
// ============================================================================

/**
 * Parameter names that may carry credentials and should be redacted.
 */
const sensitiveFields = new Set([
  "token",
  "apikey",
  "api_key",
  "password",
  "passwd",
  "secret",
  "credentials",
  "authorization",
  "auth",
]);

export const REDACTED = "[REDACTED]";

/**
 * Check if a parameter name represents a sensitive field.
 */
export const isSensitiveKey = (key: string): boolean => {
  const lower = key.toLowerCase();
  return (
    sensitiveFields.has(lower) ||
    lower.includes("secret") ||
    lower.includes("token") ||
    lower.includes("password")
  );
};

/**
 * Return a copy of the parameters with sensitive values replaced.
 */
export const redactParameters = (
  parameters: TriggerParameters
): TriggerParameters => {
  const result: TriggerParameters = {};
  for (const [key, value] of Object.entries(parameters)) {
    result[key] = isSensitiveKey(key) ? REDACTED : value;
  }
  return result;
};

// ============================================================================
// Key Order
// ============================================================================

/**
 * Field order per trigger type. trigger_type and job_name always lead.
 */
const recordFieldOrder: Readonly<Record<TriggerType, readonly string[]>> = {
  eclipse_temurin_announcement: [
    "trigger_type",
    "job_name",
    "timestamp",
    "parameters",
  ],
  simple: ["trigger_type", "job_name", "target", "line"],
  detailed: [
    "trigger_type",
    "job_name",
    "remote_jenkins_name",
    "parameters",
    "block_build_until_complete",
    "connection_retry_limit",
    "trust_all_certificates",
    "remote_job_url",
    "authentication_user",
    "csrf_protection_enabled",
    "remote_build_url",
    "remote_build_result",
  ],
};

/**
 * Copy a record into a plain object whose keys follow recordFieldOrder.
 * Keys outside the order keep their relative order at the end; undefined
 * values are dropped.
 */
export const orderRecordKeys = (
  record: TriggerRecord
): Record<string, unknown> => {
  const remaining = new Map<string, unknown>(Object.entries(record));
  const ordered: Record<string, unknown> = {};

  for (const key of recordFieldOrder[record.trigger_type]) {
    const value = remaining.get(key);
    remaining.delete(key);
    if (value !== undefined) {
      ordered[key] = value;
    }
  }
  for (const [key, value] of remaining) {
    if (value !== undefined) {
      ordered[key] = value;
    }
  }

  return ordered;
};

// ============================================================================
// JSON Serialization
// ============================================================================

/**
 * Options for JSON serialization.
 */
export interface SerializeOptions {
  /** Redact sensitive parameter values (default: false) */
  readonly redact?: boolean;
  /** Indentation (default: 2) */
  readonly indent?: number;
}

const redactRecord = (record: TriggerRecord): TriggerRecord => {
  if (record.trigger_type === "simple") {
    return record;
  }
  return { ...record, parameters: redactParameters(record.parameters) };
};

/**
 * Serialize a value as indented JSON with a trailing newline.
 * Non-ASCII text is written as-is.
 */
export const toJsonDocument = (value: unknown, indent = 2): string =>
  `${JSON.stringify(value, null, indent)}\n`;

/**
 * Serialize an extraction result to the remote-trigger JSON document.
 *
 * @example
 * ```typescript
 * serializeResult(createExtractionResult([]));
 * // '{\n  "remote_triggers": [],\n  "total_triggers": 0\n}\n'
 * ```
 */
export const serializeResult = (
  result: ExtractionResult,
  opts: SerializeOptions = {}
): string => {
  const { redact = false, indent = 2 } = opts;

  const triggers = result.remote_triggers.map((record) =>
    orderRecordKeys(redact ? redactRecord(record) : record)
  );

  return toJsonDocument(
    {
      remote_triggers: triggers,
      total_triggers: triggers.length,
    },
    indent
  );
};

/**
 * Serialize a single record to compact JSON with ordered keys.
 */
export const serializeRecord = (
  record: TriggerRecord,
  opts: SerializeOptions = {}
): string => {
  const { redact = false } = opts;
  return JSON.stringify(orderRecordKeys(redact ? redactRecord(record) : record));
};
