/**
 * HTML to plain-text conversion for Jenkins console pages.
 *
 * Jenkins serves console output (consoleFull, progressive HTML) as a <pre>
 * wrapped transcript where each log line is already a text line, with
 * console notes rendered as <span>/<a> markup. Converting keeps the line
 * structure: tags are dropped, line-breaking elements become newlines and
 * entities are decoded.
 */

// ============================================================================
// Patterns
// ============================================================================

/** Elements whose content is never console text */
const invisibleElementPattern = /<(script|style|head)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;

const commentPattern = /<!--[\s\S]*?-->/g;

/**
 * Anchor element. Groups: 1=attributes, 2=inner HTML
 */
const anchorPattern = /<a\b([^>]*)>([\s\S]*?)<\/a\s*>/gi;

/** href attribute value, single, double or unquoted */
const hrefPattern = /\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/i;

const lineBreakPattern = /<br\s*\/?>/gi;

/** Closing tags of elements that end a line when rendered */
const blockEndPattern = /<\/(?:p|div|pre|tr|li|h[1-6]|table|ul|ol)\s*>/gi;

/**
 * Any tag. Requires a letter, "/" or "!" after "<" so that a literal
 * "a < b" in unescaped text survives.
 */
const tagPattern = /<\/?[A-Za-z!][^>]*>/g;

const entityPattern = /&(#x[0-9a-f]+|#\d+|[a-z][a-z0-9]*);/gi;

const namedEntities: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "–",
  mdash: "—",
  hellip: "…",
  copy: "©",
};

// ============================================================================
// Entities
// ============================================================================

const MAX_CODE_POINT = 0x10_ffff;

/**
 * Decode a single entity body (without & and ;).
 * Returns undefined for unknown names and invalid code points.
 */
const decodeEntity = (entity: string): string | undefined => {
  if (entity.startsWith("#")) {
    const isHex = entity[1] === "x" || entity[1] === "X";
    const code = Number.parseInt(entity.slice(isHex ? 2 : 1), isHex ? 16 : 10);
    if (Number.isNaN(code) || code <= 0 || code > MAX_CODE_POINT) {
      return undefined;
    }
    return String.fromCodePoint(code);
  }
  return namedEntities[entity.toLowerCase()];
};

/**
 * Decode HTML entities. Unknown entities are left as written.
 */
export const decodeEntities = (s: string): string =>
  s.replace(entityPattern, (whole, entity: string) => decodeEntity(entity) ?? whole);

// ============================================================================
// Tags
// ============================================================================

/**
 * Remove all tags from a fragment without adding line breaks.
 */
export const stripTags = (s: string): string => s.replace(tagPattern, "");

/**
 * Extract the href attribute from an element's attribute string.
 */
export const extractHref = (attributes: string): string | undefined => {
  const match = hrefPattern.exec(attributes);
  if (!match) {
    return undefined;
  }
  return match[1] ?? match[2] ?? match[3];
};

/**
 * Render anchors as their text. An anchor without text renders as its href
 * so auto-linked URLs are not lost.
 */
const renderAnchors = (html: string): string =>
  html.replace(anchorPattern, (_whole, attributes: string, inner: string) => {
    const text = stripTags(inner);
    if (text.trim() !== "") {
      return text;
    }
    return extractHref(attributes) ?? "";
  });

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert an HTML document (or fragment) to plain text.
 * Plain text input passes through with only entity decoding applied.
 *
 * @example
 * ```typescript
 * htmlToText('<pre>a &amp; b<br>c</pre>');
 * // "a & b\nc\n"
 * ```
 */
export const htmlToText = (html: string): string => {
  let text = html.replace(/\r\n?/g, "\n");
  text = text.replace(commentPattern, "");
  text = text.replace(invisibleElementPattern, "");
  text = renderAnchors(text);
  text = text.replace(lineBreakPattern, "\n");
  text = text.replace(blockEndPattern, "\n");
  text = stripTags(text);
  return decodeEntities(text);
};

/**
 * Convert an HTML document to its plain-text lines, in order.
 */
export const htmlToLines = (html: string): string[] =>
  htmlToText(html).split("\n");
