import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables, config files or flags override them
 */
export const defaultConfig: Config = {
  server: {
    port: 8000,
    host: '127.0.0.1',
    nodeEnv: 'development',
  },
  logging: {
    level: 'info',
    format: 'json',
    dir: '',
    maxFiles: 10,
    maxSize: '10m',
    silent: false,
  },
  mcp: {
    serverName: 'llms-txt',
    serverVersion: '0.1.0',
    transport: 'stdio',
  },
  fetch: {
    timeout: 10000,
    followRedirects: false,
    maxRedirects: 5,
    maxContentLength: 200000,
    oversize: 'truncate',
    userAgent: 'docs-gateway-mcp/0.1',
  },
  access: {
    allowedDomains: [],
    allowedLocalPaths: [],
  },
  tools: {
    maxToolNameLength: 60,
  },
  index: {
    cacheTTL: 0,
  },
  sources: [],
};
