/**
 * Documentation gateway type definitions
 */

/**
 * A configured documentation set: one index file, local or remote.
 * Created at startup and never mutated afterwards.
 */
export interface DocSource {
  readonly name: string;
  /** Absolute URL or local filesystem path of the index file */
  readonly location: string;
  readonly description?: string;
}

/**
 * One link listed in an index file
 */
export interface LinkEntry {
  title: string;
  /** Absolute URL or absolute local path */
  target: string;
  description?: string;
  /** Nearest preceding `##` heading, if any */
  section?: string;
}

export interface FetchResult {
  content: string;
  truncated: boolean;
  /** Resolved URL or absolute path that was read */
  target: string;
  contentType?: string;
}

export interface FetchOptions {
  signal?: AbortSignal;
}
