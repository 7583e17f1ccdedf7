/**
 * llms.txt index parser
 *
 * An index lists documents as markdown list items:
 *
 *   # Project
 *   > Summary
 *   ## Guides
 *   - [Getting started](https://docs.example/start.md): First steps
 *
 * Headings of level two or deeper name the section of the entries that
 * follow. Lines that are not list items are ignored; list items that
 * start like a link but do not parse are skipped.
 */

import { dirname, isAbsolute, resolve } from 'path';
import { isRemoteLocation, normalizeLocalPath } from '../config/sources.js';
import { IndexParseError } from '../errors/index.js';
import type { LinkEntry } from '../types/docs.js';

const ENTRY_PATTERN = /^\s*[-*+]\s+\[([^\]]*)\]\(\s*<?([^)\s>]*)>?(?:\s+"[^"]*")?\s*\)\s*(?::\s*(.*))?$/;
const LINK_ITEM_PATTERN = /^\s*[-*+]\s+\[/;
const SECTION_PATTERN = /^#{2,6}\s+(.+?)\s*#*\s*$/;

export interface ParsedIndex {
  entries: LinkEntry[];
  /** List items that looked like links but could not be parsed */
  skipped: number;
}

/**
 * Resolve a link target against the location of the index that lists it
 */
export function resolveTarget(target: string, baseLocation: string): string | null {
  if (isRemoteLocation(baseLocation)) {
    try {
      const url = new URL(target, baseLocation);
      return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : null;
    } catch {
      return null;
    }
  }

  if (isRemoteLocation(target)) {
    try {
      return new URL(target).href;
    } catch {
      return null;
    }
  }
  if (target.startsWith('file://')) {
    return normalizeLocalPath(target);
  }
  if (/^[a-z][a-z0-9+.-]*:/i.test(target)) {
    return null;
  }
  return isAbsolute(target) ? resolve(target) : resolve(dirname(normalizeLocalPath(baseLocation)), target);
}

/**
 * Parse index text into link entries; zero entries is a parse failure
 */
export function parseIndex(text: string, baseLocation: string): ParsedIndex {
  const entries: LinkEntry[] = [];
  let skipped = 0;
  let section: string | undefined;

  for (const line of text.split(/\r?\n/)) {
    const heading = line.match(SECTION_PATTERN);
    if (heading?.[1]) {
      section = heading[1];
      continue;
    }

    if (!LINK_ITEM_PATTERN.test(line)) {
      continue;
    }

    const match = line.match(ENTRY_PATTERN);
    const title = match?.[1]?.trim();
    const rawTarget = match?.[2]?.trim();
    if (!title || !rawTarget) {
      skipped++;
      continue;
    }

    const target = resolveTarget(rawTarget, baseLocation);
    if (!target) {
      skipped++;
      continue;
    }

    const description = match?.[3]?.trim();
    entries.push({
      title,
      target,
      ...(description ? { description } : {}),
      ...(section ? { section } : {}),
    });
  }

  if (entries.length === 0) {
    throw new IndexParseError(
      baseLocation,
      skipped > 0 ? `no valid link entries (${skipped} malformed)` : 'no link entries found'
    );
  }

  return { entries, skipped };
}

/**
 * Render entries back to an llms.txt-style listing, grouped by section
 */
export function formatIndex(sourceName: string, entries: LinkEntry[], description?: string): string {
  const lines: string[] = [`# ${sourceName}`];
  if (description) {
    lines.push('', `> ${description}`);
  }

  let currentSection: string | undefined;
  let first = true;
  for (const entry of entries) {
    if (first || entry.section !== currentSection) {
      lines.push('');
      if (entry.section) {
        lines.push(`## ${entry.section}`, '');
      }
      currentSection = entry.section;
      first = false;
    }
    lines.push(`- [${entry.title}](${entry.target})${entry.description ? `: ${entry.description}` : ''}`);
  }

  return lines.join('\n');
}
