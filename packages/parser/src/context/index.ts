// biome-ignore-all lint/performance/noBarrelFile: This is the context module's public API

/**
 * Console context parsers.
 * Handle log FORMAT (timestamp prefixes, console notes, flow markers).
 */

// Parsers
export { createJenkinsContextParser, jenkinsParser } from "./jenkins.js";
export { createPassthroughParser, passthroughParser } from "./passthrough.js";
// Types
export type { ContextParser, LineContext, ParseLineResult } from "./types.js";
