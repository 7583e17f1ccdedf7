/**
 * Test utilities and helper functions
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { defaultConfig } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import type { HttpTransport, ResourceFetcherOptions } from '../docs/fetcher.js';
import { Logger } from '../logger/index.js';
import type { ToolCallResponse } from '../types/tools.js';

/**
 * A logger that writes nothing
 */
export function createTestLogger(): Logger {
  return new Logger({ ...defaultConfig.logging, silent: true });
}

/**
 * Create a config for testing; sections are merged over the defaults
 */
export function createTestConfig(overrides: Partial<Config> = {}): Config {
  const base = structuredClone(defaultConfig);
  return {
    ...base,
    ...overrides,
    logging: { ...base.logging, silent: true, ...overrides.logging },
  };
}

export function createFetcherOptions(overrides: Partial<ResourceFetcherOptions> = {}): ResourceFetcherOptions {
  return {
    ...defaultConfig.fetch,
    allowedLocalRoots: [],
    documentRoots: [],
    indexFiles: [],
    ...overrides,
  };
}

export interface FakeRoute {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
}

export interface FakeTransport {
  transport: HttpTransport;
  /** Every URL requested, in order */
  calls: string[];
  /** Init of every request, in order */
  inits: RequestInit[];
}

/**
 * In-process stand-in for the network; unknown URLs answer 404
 */
export function createFakeTransport(routes: Record<string, FakeRoute>): FakeTransport {
  const calls: string[] = [];
  const inits: RequestInit[] = [];

  const transport: HttpTransport = async (url, init) => {
    calls.push(url);
    inits.push(init);
    const route = routes[url];
    if (!route) {
      return new Response('missing', { status: 404, statusText: 'Not Found' });
    }
    return new Response(route.body ?? '', {
      status: route.status ?? 200,
      headers: route.headers ?? { 'content-type': 'text/plain' },
    });
  };

  return { transport, calls, inits };
}

/**
 * Transport that never answers until its signal aborts
 */
export function createHangingTransport(): HttpTransport {
  return (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => {
        reject(new Error('aborted'));
      });
    });
}

export function createTempDir(prefix = 'docs-gateway-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Text of a tool response content item
 */
export function responseText(response: ToolCallResponse, index = 0): string {
  const item = response.content[index];
  if (item?.type !== 'text') {
    throw new Error(`Expected text content at index ${index}`);
  }
  return item.text;
}
