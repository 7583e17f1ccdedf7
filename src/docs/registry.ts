/**
 * Source Registry
 * Holds the configured doc sources and loads their indexes through the fetcher
 */

import { ConfigurationError, GatewayError, IndexParseError, IndexUnavailableError, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { DocSource, FetchOptions, LinkEntry } from '../types/docs.js';
import type { ResourceFetcher } from './fetcher.js';
import { parseIndex } from './llms-txt.js';

export interface LoadedIndex {
  entries: LinkEntry[];
  /** The index text was cut at the content limit, so later entries are missing */
  truncated: boolean;
}

interface CachedIndex extends LoadedIndex {
  fetchedAt: number;
}

export interface SourceRegistryOptions {
  /** Milliseconds a parsed index is reused; 0 re-reads on every call */
  cacheTTL?: number;
  logger?: Logger;
}

export class SourceRegistry {
  private readonly sources: readonly DocSource[];
  private readonly fetcher: ResourceFetcher;
  private readonly cacheTTL: number;
  private readonly logger?: Logger;
  private readonly cache: Map<string, CachedIndex> = new Map();

  constructor(sources: readonly DocSource[], fetcher: ResourceFetcher, options: SourceRegistryOptions = {}) {
    if (sources.length === 0) {
      throw new ConfigurationError('No documentation sources configured. Use --json or --urls to add at least one.');
    }
    this.sources = Object.freeze([...sources]);
    this.fetcher = fetcher;
    this.cacheTTL = options.cacheTTL ?? 0;
    this.logger = options.logger;
  }

  list(): readonly DocSource[] {
    return this.sources;
  }

  get(name: string): DocSource | undefined {
    return this.sources.find((source) => source.name === name);
  }

  /**
   * Fetch and parse a source's index file
   */
  async loadIndex(source: DocSource, options: FetchOptions = {}): Promise<LoadedIndex> {
    const cached = this.cache.get(source.name);
    if (cached && this.cacheTTL > 0 && Date.now() - cached.fetchedAt < this.cacheTTL) {
      return { entries: cached.entries, truncated: cached.truncated };
    }

    let text: string;
    let truncated: boolean;
    try {
      const result = await this.fetcher.fetch(source.location, options);
      text = result.content;
      truncated = result.truncated;
    } catch (error) {
      this.logger?.warn('Index unavailable', {
        source: source.name,
        location: source.location,
        reason: error instanceof Error ? error.message : String(error),
      });
      throw new IndexUnavailableError(source.name, source.location, toError(error));
    }

    try {
      const { entries, skipped } = parseIndex(text, source.location);
      if (skipped > 0) {
        this.logger?.debug('Skipped malformed index entries', { source: source.name, skipped });
      }
      if (truncated) {
        this.logger?.warn('Index truncated at the content limit', { source: source.name, entries: entries.length });
      }
      if (this.cacheTTL > 0) {
        this.cache.set(source.name, { entries, truncated, fetchedAt: Date.now() });
      }
      return { entries, truncated };
    } catch (error) {
      if (error instanceof IndexParseError) {
        this.logger?.warn('Index could not be parsed', { source: source.name, reason: error.message });
        throw error;
      }
      throw error instanceof GatewayError ? error : new IndexParseError(source.location, toError(error).message);
    }
  }

  clearCache(): void {
    this.cache.clear();
  }
}
