import { existsSync, readFileSync } from 'fs';
import { basename, extname, resolve } from 'path';
import { ConfigurationError } from '../errors/index.js';
import type { DocSource } from '../types/docs.js';
import { DocSourceListSchema, type DocSourceInput } from './schema.js';

/**
 * Doc source normalization and loading
 */

export function isRemoteLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/**
 * Map `file://` or relative paths to absolute paths
 */
export function normalizeLocalPath(location: string): string {
  if (location.startsWith('file://')) {
    const path = location.slice('file://'.length);
    try {
      return resolve(decodeURIComponent(path));
    } catch {
      // Malformed percent escapes are kept literally
      return resolve(path);
    }
  }
  return resolve(location);
}

/**
 * Default source name: hostname for remote indexes, file stem for local ones
 */
export function defaultSourceName(location: string): string {
  if (isRemoteLocation(location)) {
    return new URL(location).hostname;
  }
  const path = normalizeLocalPath(location);
  return basename(path, extname(path));
}

export function toDocSource(input: DocSourceInput): DocSource {
  const raw = input.location ?? input.llms_txt;
  if (raw === undefined) {
    throw new ConfigurationError('Doc source is missing its location', { source: input });
  }

  let location: string;
  if (isRemoteLocation(raw)) {
    try {
      location = new URL(raw).href;
    } catch (error) {
      throw new ConfigurationError(`Invalid doc source URL: ${raw}`, { location: raw }, error instanceof Error ? error : undefined);
    }
  } else {
    location = normalizeLocalPath(raw);
  }

  return {
    name: input.name ?? defaultSourceName(location),
    location,
    ...(input.description ? { description: input.description } : {}),
  };
}

/**
 * Parse `--urls` entries, each `url_or_path` or `name:url_or_path`
 */
export function parseSourceEntries(entries: string[]): DocSourceInput[] {
  const sources: DocSourceInput[] = [];
  for (const entry of entries) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }
    const separator = trimmed.indexOf(':');
    if (separator > 0 && !isRemoteLocation(trimmed) && !trimmed.startsWith('file://')) {
      sources.push({ name: trimmed.slice(0, separator), llms_txt: trimmed.slice(separator + 1) });
    } else {
      sources.push({ llms_txt: trimmed });
    }
  }
  return sources;
}

/**
 * Load a JSON file containing a list of doc sources
 */
export function loadSourcesFile(filePath: string): DocSourceInput[] {
  const absolute = resolve(filePath);
  if (!existsSync(absolute)) {
    throw new ConfigurationError(`Config file not found: ${absolute}`, { path: absolute });
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(absolute, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Error loading config file ${absolute}: ${error instanceof Error ? error.message : String(error)}`,
      { path: absolute }
    );
  }

  const parsed = DocSourceListSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Config file must contain a list of doc sources: ${parsed.error.message}`, {
      path: absolute,
    });
  }
  return parsed.data;
}

/**
 * Append sources that are not already present (deep equality on the config entry)
 */
export function mergeSourceInputs(target: DocSourceInput[], extra: DocSourceInput[]): DocSourceInput[] {
  const key = (s: DocSourceInput): string =>
    JSON.stringify([s.name ?? null, s.location ?? s.llms_txt ?? null, s.description ?? null]);
  const seen = new Set(target.map(key));
  const merged = [...target];
  for (const source of extra) {
    if (!seen.has(key(source))) {
      seen.add(key(source));
      merged.push(source);
    }
  }
  return merged;
}
