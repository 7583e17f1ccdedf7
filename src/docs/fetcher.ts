/**
 * Resource Fetcher
 * The only place documentation is read from the network or the filesystem.
 * Every remote request is checked against the allowlist before it is sent,
 * every local read against the allowed local roots.
 */

import { readFile, realpath } from 'fs/promises';
import { extname, isAbsolute, relative, resolve } from 'path';
import type { OversizePolicy } from '../config/schema.js';
import { isRemoteLocation, normalizeLocalPath } from '../config/sources.js';
import {
  DomainNotAllowedError,
  GatewayError,
  InvalidTargetError,
  NotFoundError,
  PathNotAllowedError,
  TooLargeError,
  UpstreamError,
  toError,
} from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import { describePolicy, isAllowed, type AllowlistPolicy } from '../policy/allowlist.js';
import type { FetchOptions, FetchResult } from '../types/docs.js';
import { htmlToMarkdown, isHtmlContent, isHtmlContentType } from './converter.js';

/**
 * Minimal HTTP surface the fetcher needs; the global fetch satisfies it
 */
export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;

export interface ResourceFetcherOptions {
  /** Milliseconds before a remote request is aborted */
  timeout: number;
  followRedirects: boolean;
  maxRedirects: number;
  /** Characters */
  maxContentLength: number;
  oversize: OversizePolicy;
  userAgent: string;
  /** Directories any local file may be read from */
  allowedLocalRoots: string[];
  /** Directories of local indexes; only visible documentation files under them are readable */
  documentRoots: string[];
  /** Local index files, readable whatever their extension */
  indexFiles: string[];
}

interface LocalAccess {
  openRoots: string[];
  documentRoots: string[];
  indexFiles: string[];
}

export type ClassifiedTarget = { kind: 'remote'; url: URL } | { kind: 'local'; path: string };

const NOT_FOUND_STATUSES = new Set([404, 410]);
const MARKDOWN_EXTENSIONS = new Set(['.md', '.mdx', '.markdown', '.txt']);
const HTML_EXTENSIONS = new Set(['.html', '.htm']);
const DOCUMENT_EXTENSIONS = new Set([...MARKDOWN_EXTENSIONS, ...HTML_EXTENSIONS]);

/** UTF-8 needs at most this many bytes per UTF-16 code unit */
const MAX_BYTES_PER_CHAR = 3;

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400 && status !== 304;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function isWithin(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

function isVisibleDocument(root: string, path: string): boolean {
  const rel = relative(root, path);
  if (!isWithin(root, path) || !DOCUMENT_EXTENSIONS.has(extname(rel).toLowerCase())) {
    return false;
  }
  return !rel.split(/[\\/]/).some((segment) => segment.startsWith('.'));
}

function permits(access: LocalAccess, path: string): boolean {
  return (
    access.indexFiles.includes(path) ||
    access.openRoots.some((root) => isWithin(root, path)) ||
    access.documentRoots.some((root) => isVisibleDocument(root, path))
  );
}

/**
 * Read a response body, stopping once more than maxBytes have arrived.
 * A multi-byte character split by the cut is dropped.
 */
async function readBody(response: Response, maxBytes: number): Promise<{ text: string; capped: boolean }> {
  if (!response.body) {
    return { text: '', capped: false };
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = '';
  let received = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      return { text: text + decoder.decode(), capped: false };
    }
    const room = maxBytes - received;
    if (value.byteLength > room) {
      text += decoder.decode(value.subarray(0, room), { stream: true });
      await reader.cancel();
      return { text, capped: true };
    }
    received += value.byteLength;
    text += decoder.decode(value, { stream: true });
  }
}

/**
 * Cut to at most max code units without splitting a surrogate pair
 */
function truncateText(content: string, max: number): string {
  const last = content.charCodeAt(max - 1);
  const end = max > 0 && last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
  return content.slice(0, end);
}

export class ResourceFetcher {
  private readonly policy: AllowlistPolicy;
  private readonly options: ResourceFetcherOptions;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly access: LocalAccess;
  private realAccess?: Promise<LocalAccess>;

  constructor(
    policy: AllowlistPolicy,
    options: ResourceFetcherOptions,
    deps: { transport?: HttpTransport; logger?: Logger } = {}
  ) {
    this.policy = policy;
    this.options = options;
    this.access = {
      openRoots: options.allowedLocalRoots.map((root) => resolve(root)),
      documentRoots: options.documentRoots.map((root) => resolve(root)),
      indexFiles: options.indexFiles.map((file) => resolve(file)),
    };
    this.transport = deps.transport ?? ((url, init) => fetch(url, init));
    this.logger = deps.logger;
  }

  /**
   * Classify a target as a remote URL or a local path
   */
  classify(target: string): ClassifiedTarget {
    const trimmed = target.trim();
    if (!trimmed) {
      throw new InvalidTargetError(target, 'empty target');
    }

    if (isRemoteLocation(trimmed)) {
      try {
        return { kind: 'remote', url: new URL(trimmed) };
      } catch {
        throw new InvalidTargetError(trimmed, 'malformed URL');
      }
    }

    if (trimmed.startsWith('file://')) {
      return { kind: 'local', path: normalizeLocalPath(trimmed) };
    }

    // Any other scheme (ftp:, data:, javascript:) but not a Windows drive letter
    if (/^[a-z][a-z0-9+.-]*:/i.test(trimmed) && !/^[a-z]:[\\/]/i.test(trimmed)) {
      throw new InvalidTargetError(trimmed, 'unsupported URL scheme');
    }

    return { kind: 'local', path: normalizeLocalPath(trimmed) };
  }

  /**
   * Fetch a URL or local path and return bounded markdown
   */
  async fetch(target: string, options: FetchOptions = {}): Promise<FetchResult> {
    const classified = this.classify(target);

    if (classified.kind === 'remote') {
      const { body, capped, contentType, finalUrl } = await this.fetchRemote(classified.url, options.signal);
      const html = contentType && !isGenericContentType(contentType) ? isHtmlContentType(contentType) : isHtmlContent(body);
      return this.finalize(finalUrl, body, html, contentType, capped);
    }

    const body = await this.readLocal(classified.path);
    const extension = extname(classified.path).toLowerCase();
    const html = HTML_EXTENSIONS.has(extension) || (!MARKDOWN_EXTENSIONS.has(extension) && isHtmlContent(body));
    return this.finalize(classified.path, body, html, html ? 'text/html' : 'text/plain');
  }

  private assertHostAllowed(url: URL): void {
    if (!isAllowed(this.policy, url.hostname)) {
      this.logger?.warn('Blocked request to host outside the allowlist', { host: url.hostname, url: url.href });
      throw new DomainNotAllowedError(url.hostname, describePolicy(this.policy));
    }
  }

  private async fetchRemote(
    start: URL,
    signal?: AbortSignal
  ): Promise<{ body: string; capped: boolean; contentType: string | null; finalUrl: string }> {
    let current = start;

    for (let hop = 0; ; hop++) {
      this.assertHostAllowed(current);

      const { response, body, capped } = await this.request(current, signal);

      if (isRedirect(response.status)) {
        const location = response.headers.get('location');
        if (!this.options.followRedirects) {
          throw new UpstreamError(
            `HTTP ${response.status} redirect from ${current.href}${location ? ` to ${location}` : ''} was not followed (redirects are disabled)`,
            { url: current.href, status: response.status, location }
          );
        }
        if (!location) {
          throw new UpstreamError(`HTTP ${response.status} from ${current.href} without a Location header`, {
            url: current.href,
            status: response.status,
          });
        }
        if (hop >= this.options.maxRedirects) {
          throw new UpstreamError(`Too many redirects fetching ${start.href}`, {
            url: start.href,
            maxRedirects: this.options.maxRedirects,
          });
        }

        const next = new URL(location, current);
        if (next.protocol !== 'http:' && next.protocol !== 'https:') {
          throw new UpstreamError(`Redirect to unsupported URL ${next.href}`, { url: current.href, location });
        }
        this.logger?.debug('Following redirect', { from: current.href, to: next.href });
        current = next;
        continue;
      }

      if (NOT_FOUND_STATUSES.has(response.status)) {
        throw new NotFoundError(current.href, { status: response.status });
      }
      if (!response.ok) {
        throw new UpstreamError(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''} fetching ${current.href}`, {
          url: current.href,
          status: response.status,
        });
      }

      return { body, capped, contentType: response.headers.get('content-type'), finalUrl: current.href };
    }
  }

  /**
   * One GET with a bounded wait, cancellable through the caller's signal.
   * The body is read inside the same deadline, and only as far as the content limit can use.
   */
  private async request(
    url: URL,
    signal?: AbortSignal
  ): Promise<{ response: Response; body: string; capped: boolean }> {
    if (signal?.aborted) {
      throw new UpstreamError(`Request to ${url.href} was cancelled`, { url: url.href });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      this.logger?.debug('Fetching remote resource', { url: url.href });
      const response = await this.transport(url.href, {
        method: 'GET',
        redirect: 'manual',
        signal: controller.signal,
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/markdown, text/plain, text/html;q=0.9, */*;q=0.5',
        },
      });
      if (isRedirect(response.status)) {
        return { response, body: '', capped: false };
      }
      const { text, capped } = await readBody(response, this.options.maxContentLength * MAX_BYTES_PER_CHAR);
      if (capped) {
        this.logger?.debug('Stopped reading oversized response body', { url: url.href });
      }
      return { response, body: text, capped };
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      if (timedOut) {
        throw new UpstreamError(`Request to ${url.href} timed out after ${this.options.timeout}ms`, {
          url: url.href,
          timeout: this.options.timeout,
        });
      }
      if (signal?.aborted) {
        throw new UpstreamError(`Request to ${url.href} was cancelled`, { url: url.href });
      }
      const cause = toError(error);
      throw new UpstreamError(`Encountered an HTTP error fetching ${url.href}: ${cause.message}`, { url: url.href }, cause);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private resolveRealAccess(): Promise<LocalAccess> {
    if (!this.realAccess) {
      // Paths that do not exist yet are compared as given
      const real = (paths: string[]): Promise<string[]> =>
        Promise.all(paths.map((path) => realpath(path).catch(() => path)));
      this.realAccess = Promise.all([
        real(this.access.openRoots),
        real(this.access.documentRoots),
        real(this.access.indexFiles),
      ]).then(([openRoots, documentRoots, indexFiles]) => ({ openRoots, documentRoots, indexFiles }));
    }
    return this.realAccess;
  }

  private async readLocal(path: string): Promise<string> {
    const roots = [...this.access.openRoots, ...this.access.documentRoots];
    if (!permits(this.access, path)) {
      this.logger?.warn('Blocked read outside the allowed local paths', { path });
      throw new PathNotAllowedError(path, roots);
    }

    try {
      // Symlinks must not lead out of the allowed roots either
      const real = await realpath(path);
      if (!permits(await this.resolveRealAccess(), real)) {
        this.logger?.warn('Blocked read through a link leaving the allowed local paths', { path, real });
        throw new PathNotAllowedError(path, roots);
      }
      this.logger?.debug('Reading local resource', { path });
      return await readFile(real, 'utf-8');
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
        throw new NotFoundError(path);
      }
      if (hasErrorCode(error, 'EISDIR')) {
        throw new InvalidTargetError(path, 'is a directory');
      }
      const cause = toError(error);
      throw new UpstreamError(`Error reading local file ${path}: ${cause.message}`, { path }, cause);
    }
  }

  private finalize(
    target: string,
    raw: string,
    html: boolean,
    contentType: string | null,
    capped = false
  ): FetchResult {
    let content = html ? htmlToMarkdown(raw) : raw;
    let truncated = capped;
    const max = this.options.maxContentLength;

    if (this.options.oversize === 'fail' && (capped || content.length > max)) {
      throw new TooLargeError(target, max, capped ? undefined : content.length);
    }
    if (content.length > max) {
      this.logger?.debug('Truncating oversized content', { target, length: content.length, max });
      content = truncateText(content, max);
      truncated = true;
    }

    return {
      content,
      truncated,
      target,
      ...(contentType ? { contentType } : {}),
    };
  }
}

function isGenericContentType(contentType: string): boolean {
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase();
  return !mediaType || mediaType === 'application/octet-stream';
}
