/**
 * Unit tests for the resource fetcher
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll } from '@jest/globals';
import { mkdirSync, symlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { ResourceFetcher, type HttpTransport } from './fetcher.js';
import { buildAllowlistPolicy } from '../policy/allowlist.js';
import {
  DomainNotAllowedError,
  InvalidTargetError,
  NotFoundError,
  PathNotAllowedError,
  TooLargeError,
  UpstreamError,
} from '../errors/index.js';
import {
  createFakeTransport,
  createFetcherOptions,
  createHangingTransport,
  createTempDir,
  removeTempDir,
} from '../__tests__/utils.js';

const policy = buildAllowlistPolicy([{ name: 'Docs', location: 'https://docs.example/llms.txt' }]);
const MARKDOWN = { 'content-type': 'text/markdown' };

describe('ResourceFetcher', () => {
  describe('remote targets', () => {
    it('should return markdown unchanged', async () => {
      const { transport } = createFakeTransport({
        'https://docs.example/a.md': { body: '# A\n\nSome text', headers: MARKDOWN },
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      const result = await fetcher.fetch('https://docs.example/a.md');

      expect(result).toEqual({
        content: '# A\n\nSome text',
        truncated: false,
        target: 'https://docs.example/a.md',
        contentType: 'text/markdown',
      });
    });

    it('should convert HTML to markdown', async () => {
      const { transport } = createFakeTransport({
        'https://docs.example/page': {
          body: '<html><body><h1>Title</h1><p>Hello <strong>world</strong></p></body></html>',
          headers: { 'content-type': 'text/html; charset=utf-8' },
        },
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      const result = await fetcher.fetch('https://docs.example/page');

      expect(result.content).toBe('# Title\n\nHello **world**');
    });

    it('should sniff HTML when the content type is generic', async () => {
      const { transport } = createFakeTransport({
        'https://docs.example/page': {
          body: '<!DOCTYPE html><html><body><h2>Setup</h2></body></html>',
          headers: { 'content-type': 'application/octet-stream' },
        },
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      const result = await fetcher.fetch('https://docs.example/page');

      expect(result.content).toBe('## Setup');
    });

    it('should send a GET with manual redirects and the configured user agent', async () => {
      const { transport, inits } = createFakeTransport({
        'https://docs.example/a.md': { body: 'A', headers: MARKDOWN },
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ userAgent: 'test-agent/1.0' }), { transport });

      await fetcher.fetch('https://docs.example/a.md');

      expect(inits[0]?.method).toBe('GET');
      expect(inits[0]?.redirect).toBe('manual');
      expect(inits[0]?.headers).toMatchObject({ 'User-Agent': 'test-agent/1.0' });
    });

    it('should reject hosts outside the allowlist without sending a request', async () => {
      const { transport, calls } = createFakeTransport({});
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      await expect(fetcher.fetch('https://other.example/page.md')).rejects.toThrow(DomainNotAllowedError);
      await expect(fetcher.fetch('https://other.example/page.md')).rejects.toThrow(
        'Domain not allowed: other.example. Allowed domains: docs.example'
      );
      expect(calls).toHaveLength(0);
    });

    it('should reject subdomains of an allowed host', async () => {
      const { transport, calls } = createFakeTransport({});
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      await expect(fetcher.fetch('https://api.docs.example/a.md')).rejects.toThrow(DomainNotAllowedError);
      expect(calls).toHaveLength(0);
    });

    it('should allow any host under the wildcard policy', async () => {
      const { transport } = createFakeTransport({
        'https://other.example/page.md': { body: 'other', headers: MARKDOWN },
      });
      const fetcher = new ResourceFetcher({ kind: 'allow-all' }, createFetcherOptions(), { transport });

      const result = await fetcher.fetch('https://other.example/page.md');

      expect(result.content).toBe('other');
    });

    it('should map 404 to NotFoundError', async () => {
      const { transport } = createFakeTransport({});
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      await expect(fetcher.fetch('https://docs.example/missing.md')).rejects.toThrow(NotFoundError);
    });

    it('should map other error statuses to UpstreamError', async () => {
      const { transport } = createFakeTransport({
        'https://docs.example/a.md': { status: 500, body: 'boom' },
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      await expect(fetcher.fetch('https://docs.example/a.md')).rejects.toThrow(
        'HTTP 500 fetching https://docs.example/a.md'
      );
    });

    it('should wrap transport failures', async () => {
      const transport: HttpTransport = async () => {
        throw new Error('socket hang up');
      };
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      await expect(fetcher.fetch('https://docs.example/a.md')).rejects.toThrow(
        'Encountered an HTTP error fetching https://docs.example/a.md: socket hang up'
      );
    });

    it('should time out slow requests', async () => {
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ timeout: 20 }), {
        transport: createHangingTransport(),
      });

      await expect(fetcher.fetch('https://docs.example/a.md')).rejects.toThrow(
        'Request to https://docs.example/a.md timed out after 20ms'
      );
    });

    it('should stop when the caller cancels', async () => {
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport: createHangingTransport() });
      const controller = new AbortController();

      const pending = fetcher.fetch('https://docs.example/a.md', { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toThrow('Request to https://docs.example/a.md was cancelled');
    });

    it('should not send a request that is already cancelled', async () => {
      const { transport, calls } = createFakeTransport({});
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });
      const controller = new AbortController();
      controller.abort();

      await expect(fetcher.fetch('https://docs.example/a.md', { signal: controller.signal })).rejects.toThrow(
        UpstreamError
      );
      expect(calls).toHaveLength(0);
    });
  });

  describe('redirects', () => {
    const redirect = (location: string) => ({ status: 302, headers: { location } });

    it('should not follow redirects by default', async () => {
      const { transport, calls } = createFakeTransport({
        'https://docs.example/a.md': redirect('https://docs.example/b.md'),
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions(), { transport });

      await expect(fetcher.fetch('https://docs.example/a.md')).rejects.toThrow(
        'HTTP 302 redirect from https://docs.example/a.md to https://docs.example/b.md was not followed (redirects are disabled)'
      );
      expect(calls).toEqual(['https://docs.example/a.md']);
    });

    it('should follow redirects within the allowlist when enabled', async () => {
      const { transport, calls } = createFakeTransport({
        'https://docs.example/a.md': redirect('/b.md'),
        'https://docs.example/b.md': { body: 'B', headers: MARKDOWN },
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ followRedirects: true }), { transport });

      const result = await fetcher.fetch('https://docs.example/a.md');

      expect(result.content).toBe('B');
      expect(result.target).toBe('https://docs.example/b.md');
      expect(calls).toEqual(['https://docs.example/a.md', 'https://docs.example/b.md']);
    });

    it('should check every hop against the allowlist', async () => {
      const { transport, calls } = createFakeTransport({
        'https://docs.example/a.md': redirect('https://other.example/b.md'),
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ followRedirects: true }), { transport });

      await expect(fetcher.fetch('https://docs.example/a.md')).rejects.toThrow(DomainNotAllowedError);
      expect(calls).toEqual(['https://docs.example/a.md']);
    });

    it('should give up after the maximum number of redirects', async () => {
      const { transport } = createFakeTransport({
        'https://docs.example/a.md': redirect('https://docs.example/b.md'),
        'https://docs.example/b.md': redirect('https://docs.example/c.md'),
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ followRedirects: true, maxRedirects: 1 }), {
        transport,
      });

      await expect(fetcher.fetch('https://docs.example/a.md')).rejects.toThrow(
        'Too many redirects fetching https://docs.example/a.md'
      );
    });
  });

  describe('content limits', () => {
    const routes = { 'https://docs.example/a.md': { body: 'abcdefghijklmnop', headers: MARKDOWN } };

    it('should truncate oversized content and flag it', async () => {
      const { transport } = createFakeTransport(routes);
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ maxContentLength: 10 }), { transport });

      const result = await fetcher.fetch('https://docs.example/a.md');

      expect(result.content).toBe('abcdefghij');
      expect(result.truncated).toBe(true);
    });

    it('should fail on oversized content when configured to', async () => {
      const { transport } = createFakeTransport(routes);
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ maxContentLength: 10, oversize: 'fail' }), {
        transport,
      });

      await expect(fetcher.fetch('https://docs.example/a.md')).rejects.toThrow(TooLargeError);
    });

    it('should keep content at exactly the maximum', async () => {
      const { transport } = createFakeTransport(routes);
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ maxContentLength: 16 }), { transport });

      const result = await fetcher.fetch('https://docs.example/a.md');

      expect(result.truncated).toBe(false);
      expect(result.content).toHaveLength(16);
    });

    it('should not split a surrogate pair when truncating', async () => {
      const { transport } = createFakeTransport({
        'https://docs.example/a.md': { body: 'ab\u{1F600}cd', headers: MARKDOWN },
      });
      const fetcher = new ResourceFetcher(policy, createFetcherOptions({ maxContentLength: 3 }), { transport });

      const result = await fetcher.fetch('https://docs.example/a.md');

      expect(result.content).toBe('ab');
      expect(result.truncated).toBe(true);
    });

    describe('unbounded bodies', () => {
      let pulls: number;
      const endless: HttpTransport = async () => {
        const chunk = new TextEncoder().encode('x'.repeat(1000));
        const body = new ReadableStream<Uint8Array>({
          pull(controller) {
            pulls++;
            controller.enqueue(chunk);
          },
        });
        return new Response(body, { headers: MARKDOWN });
      };

      beforeEach(() => {
        pulls = 0;
      });

      it('should stop reading once the limit is reached', async () => {
        const fetcher = new ResourceFetcher(policy, createFetcherOptions({ maxContentLength: 10 }), {
          transport: endless,
        });

        const result = await fetcher.fetch('https://docs.example/a.md');

        expect(result.content).toBe('xxxxxxxxxx');
        expect(result.truncated).toBe(true);
        expect(pulls).toBeLessThan(5);
      });

      it('should fail without knowing the full length when configured to', async () => {
        const fetcher = new ResourceFetcher(policy, createFetcherOptions({ maxContentLength: 10, oversize: 'fail' }), {
          transport: endless,
        });

        await expect(fetcher.fetch('https://docs.example/a.md')).rejects.toThrow(
          'Content of https://docs.example/a.md exceeds the maximum of 10 characters'
        );
      });
    });
  });

  describe('classify', () => {
    const fetcher = new ResourceFetcher(policy, createFetcherOptions());

    it('should reject empty targets', () => {
      expect(() => fetcher.classify('  ')).toThrow(InvalidTargetError);
    });

    it('should reject unsupported schemes', () => {
      expect(() => fetcher.classify('ftp://docs.example/a.md')).toThrow('unsupported URL scheme');
    });

    it('should reject malformed URLs', () => {
      expect(() => fetcher.classify('https://')).toThrow('malformed URL');
    });

    it('should treat file URLs as local paths', () => {
      expect(fetcher.classify('file:///srv/docs/a.md')).toEqual({ kind: 'local', path: '/srv/docs/a.md' });
    });
  });

  describe('local targets', () => {
    let root: string;
    let outside: string;
    let fetcher: ResourceFetcher;

    beforeAll(() => {
      root = createTempDir();
      outside = createTempDir();
      mkdirSync(join(root, 'guides'));
      writeFileSync(join(root, 'guides', 'intro.md'), '# Intro\n');
      writeFileSync(join(root, 'page.html'), '<html><body><h2>Setup</h2></body></html>');
      writeFileSync(join(outside, 'secret.md'), 'secret');
      symlinkSync(join(outside, 'secret.md'), join(root, 'link.md'));
      fetcher = new ResourceFetcher(policy, createFetcherOptions({ allowedLocalRoots: [root] }));
    });

    afterAll(() => {
      removeTempDir(root);
      removeTempDir(outside);
    });

    it('should read files under an allowed root', async () => {
      const result = await fetcher.fetch(join(root, 'guides', 'intro.md'));

      expect(result).toEqual({
        content: '# Intro\n',
        truncated: false,
        target: join(root, 'guides', 'intro.md'),
        contentType: 'text/plain',
      });
    });

    it('should read file URLs', async () => {
      const result = await fetcher.fetch(pathToFileURL(join(root, 'guides', 'intro.md')).href);

      expect(result.content).toBe('# Intro\n');
    });

    it('should convert local HTML files', async () => {
      const result = await fetcher.fetch(join(root, 'page.html'));

      expect(result.content).toBe('## Setup');
      expect(result.contentType).toBe('text/html');
    });

    it('should reject paths outside the allowed roots', async () => {
      await expect(fetcher.fetch(join(outside, 'secret.md'))).rejects.toThrow(PathNotAllowedError);
    });

    it('should reject traversal out of a root', async () => {
      await expect(fetcher.fetch(`${root}/guides/../../secret.md`)).rejects.toThrow(PathNotAllowedError);
    });

    it('should reject links that lead outside the allowed roots', async () => {
      await expect(fetcher.fetch(join(root, 'link.md'))).rejects.toThrow(PathNotAllowedError);
    });

    it('should report missing files as not found', async () => {
      await expect(fetcher.fetch(join(root, 'missing.md'))).rejects.toThrow(NotFoundError);
    });

    it('should reject directories', async () => {
      await expect(fetcher.fetch(join(root, 'guides'))).rejects.toThrow('is a directory');
    });

    it('should not apply the domain allowlist to local files', async () => {
      const strict = new ResourceFetcher({ kind: 'allow-list', hosts: new Set<string>() }, createFetcherOptions({ allowedLocalRoots: [root] }));

      const result = await strict.fetch(join(root, 'guides', 'intro.md'));

      expect(result.content).toBe('# Intro\n');
    });
  });

  describe('index directories', () => {
    let root: string;
    let fetcher: ResourceFetcher;

    beforeAll(() => {
      root = createTempDir();
      mkdirSync(join(root, 'guides'));
      mkdirSync(join(root, '.private'));
      writeFileSync(join(root, 'docs.index'), '- [Intro](guides/intro.md)\n');
      writeFileSync(join(root, 'other.index'), 'unlisted');
      writeFileSync(join(root, 'guides', 'intro.md'), '# Intro\n');
      writeFileSync(join(root, 'notes'), 'plain');
      writeFileSync(join(root, '.env'), 'API_KEY=test-secret\n');
      writeFileSync(join(root, '.private', 'draft.md'), '# Draft\n');
      symlinkSync(join(root, '.env'), join(root, 'env.md'));
      fetcher = new ResourceFetcher(
        policy,
        createFetcherOptions({ documentRoots: [root], indexFiles: [join(root, 'docs.index')] })
      );
    });

    afterAll(() => {
      removeTempDir(root);
    });

    it('should read documentation files', async () => {
      const result = await fetcher.fetch(join(root, 'guides', 'intro.md'));

      expect(result.content).toBe('# Intro\n');
    });

    it('should read the index file whatever its extension', async () => {
      const result = await fetcher.fetch(join(root, 'docs.index'));

      expect(result.content).toBe('- [Intro](guides/intro.md)\n');
    });

    it('should refuse other files', async () => {
      await expect(fetcher.fetch(join(root, 'other.index'))).rejects.toThrow(PathNotAllowedError);
      await expect(fetcher.fetch(join(root, 'notes'))).rejects.toThrow(PathNotAllowedError);
    });

    it('should refuse hidden files and directories', async () => {
      await expect(fetcher.fetch(join(root, '.env'))).rejects.toThrow(PathNotAllowedError);
      await expect(fetcher.fetch(join(root, '.private', 'draft.md'))).rejects.toThrow(PathNotAllowedError);
    });

    it('should refuse documentation names that link to hidden files', async () => {
      await expect(fetcher.fetch(join(root, 'env.md'))).rejects.toThrow(PathNotAllowedError);
    });
  });
});
