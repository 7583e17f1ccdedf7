import { isRemoteLocation } from '../config/sources.js';
import type { DocSource } from '../types/docs.js';

/**
 * Domain allowlist policy
 *
 * Hosts are matched exactly and case-insensitively on the hostname alone.
 * There is no subdomain wildcard and no port distinction: allowing
 * `docs.example` never grants `api.docs.example`.
 */

export const ALLOW_ALL_MARKER = '*';

export type AllowlistPolicy =
  | { readonly kind: 'allow-all' }
  | { readonly kind: 'allow-list'; readonly hosts: ReadonlySet<string> };

/**
 * Reduce a configured domain (`example.com`, `https://example.com/`,
 * `Example.COM:8080`) to a lower-case hostname, or null when unusable
 */
export function normalizeDomain(domain: string): string | null {
  const trimmed = domain.trim();
  if (!trimmed) {
    return null;
  }

  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  try {
    const host = new URL(candidate).hostname.toLowerCase();
    return host || null;
  } catch {
    return null;
  }
}

/**
 * Build the policy: the host of every remote source, plus the explicit
 * extra domains. Local sources contribute nothing.
 */
export function buildAllowlistPolicy(sources: readonly DocSource[], extraDomains: readonly string[] = []): AllowlistPolicy {
  if (extraDomains.some((domain) => domain.trim() === ALLOW_ALL_MARKER)) {
    return { kind: 'allow-all' };
  }

  const hosts = new Set<string>();
  for (const source of sources) {
    if (isRemoteLocation(source.location)) {
      const host = normalizeDomain(source.location);
      if (host) {
        hosts.add(host);
      }
    }
  }
  for (const domain of extraDomains) {
    const host = normalizeDomain(domain);
    if (host) {
      hosts.add(host);
    }
  }

  return { kind: 'allow-list', hosts };
}

export function isAllowed(policy: AllowlistPolicy, host: string): boolean {
  switch (policy.kind) {
    case 'allow-all':
      return true;
    case 'allow-list':
      return policy.hosts.has(host.toLowerCase());
  }
}

export function describePolicy(policy: AllowlistPolicy): string[] {
  switch (policy.kind) {
    case 'allow-all':
      return [ALLOW_ALL_MARKER];
    case 'allow-list':
      return [...policy.hosts].sort();
  }
}
