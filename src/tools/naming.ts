import { FETCH_DOCS_PREFIX } from '../types/tools.js';

/**
 * MCP tool names allow letters, digits, underscore and hyphen;
 * everything else in a source name becomes an underscore.
 */
export function sanitizeToolSegment(name: string): string {
  return name.trim().replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Tool name for a doc source. A maxLength of 0 means no limit.
 */
export function toolNameFor(sourceName: string, maxLength = 60): string {
  const base = `${FETCH_DOCS_PREFIX}${sanitizeToolSegment(sourceName)}`;
  return maxLength > 0 ? base.slice(0, maxLength) : base;
}
