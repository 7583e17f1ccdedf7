import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import type { ZodType } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { CliOptions } from '../cli/args.js';
import {
  ConfigSchema,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  OversizePolicySchema,
  TransportSchema,
  type Config,
} from './schema.js';
import { defaultConfig } from './defaults.js';
import { loadSourcesFile, mergeSourceInputs, parseSourceEntries } from './sources.js';

const PartialConfigSchema = ConfigSchema.deepPartial();

export interface ConfigLoaderOptions {
  /** Parsed command-line flags; highest priority */
  cli?: CliOptions;
  /** Directory holding default.json (defaults to ./config) */
  configDir?: string;
}

/**
 * Load configuration from flags, environment variables and config files
 * Priority: Command line > Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;
  private readonly options: ConfigLoaderOptions;

  constructor(options: ConfigLoaderOptions = {}) {
    this.options = options;

    // Load .env file if it exists
    loadEnv();

    this.config = this.deepClone(defaultConfig);
    this.loadFromFile();
    this.loadFromEnv();
    this.loadFromCli();
    this.validate();
  }

  private deepClone(obj: Config): Config {
    return structuredClone(obj);
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(): void {
    const configPath = join(this.options.configDir ?? join(process.cwd(), 'config'), 'default.json');
    if (!existsSync(configPath)) {
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read config file ${configPath}: ${(error instanceof Error ? error.message : String(error))}`, {
        path: configPath,
      });
    }

    const parsed = PartialConfigSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid config file ${configPath}: ${parsed.error.message}`, { path: configPath });
    }

    const fileConfig = parsed.data;
    if (fileConfig.server) Object.assign(this.config.server, fileConfig.server);
    if (fileConfig.logging) Object.assign(this.config.logging, fileConfig.logging);
    if (fileConfig.mcp) Object.assign(this.config.mcp, fileConfig.mcp);
    if (fileConfig.fetch) Object.assign(this.config.fetch, fileConfig.fetch);
    if (fileConfig.access) Object.assign(this.config.access, fileConfig.access);
    if (fileConfig.tools) Object.assign(this.config.tools, fileConfig.tools);
    if (fileConfig.index) Object.assign(this.config.index, fileConfig.index);
    if (fileConfig.sources) {
      this.config.sources = mergeSourceInputs(this.config.sources, fileConfig.sources);
    }
  }

  /**
   * Read an enumerated environment variable, rejecting unknown values
   */
  private envEnum<T>(name: string, schema: ZodType<T>): T | undefined {
    const value = process.env[name];
    if (!value) {
      return undefined;
    }
    const result = schema.safeParse(value.toLowerCase());
    if (!result.success) {
      throw new ConfigurationError(`Invalid value for ${name}: "${value}"`, { variable: name, value });
    }
    return result.data;
  }

  private envList(name: string): string[] | undefined {
    const value = process.env[name];
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = process.env;

    // Server configuration
    if (env['DOCS_GATEWAY_PORT']) {
      this.config.server.port = parseInt(env['DOCS_GATEWAY_PORT'], 10);
    }
    if (env['DOCS_GATEWAY_HOST']) {
      this.config.server.host = env['DOCS_GATEWAY_HOST'];
    }
    this.config.server.nodeEnv = this.envEnum('NODE_ENV', NodeEnvSchema) ?? this.config.server.nodeEnv;

    // Logging configuration
    this.config.logging.level = this.envEnum('DOCS_GATEWAY_LOG_LEVEL', LogLevelSchema) ?? this.config.logging.level;
    this.config.logging.format = this.envEnum('DOCS_GATEWAY_LOG_FORMAT', LogFormatSchema) ?? this.config.logging.format;
    if (env['DOCS_GATEWAY_LOG_DIR'] !== undefined) {
      this.config.logging.dir = env['DOCS_GATEWAY_LOG_DIR'];
    }
    if (env['DOCS_GATEWAY_LOG_MAX_FILES']) {
      this.config.logging.maxFiles = parseInt(env['DOCS_GATEWAY_LOG_MAX_FILES'], 10);
    }
    if (env['DOCS_GATEWAY_LOG_MAX_SIZE']) {
      this.config.logging.maxSize = env['DOCS_GATEWAY_LOG_MAX_SIZE'];
    }

    // MCP configuration
    if (env['DOCS_GATEWAY_SERVER_NAME']) {
      this.config.mcp.serverName = env['DOCS_GATEWAY_SERVER_NAME'];
    }
    this.config.mcp.transport = this.envEnum('DOCS_GATEWAY_TRANSPORT', TransportSchema) ?? this.config.mcp.transport;

    // Fetch configuration
    if (env['DOCS_GATEWAY_FETCH_TIMEOUT']) {
      this.config.fetch.timeout = parseInt(env['DOCS_GATEWAY_FETCH_TIMEOUT'], 10);
    }
    if (env['DOCS_GATEWAY_FOLLOW_REDIRECTS']) {
      this.config.fetch.followRedirects = env['DOCS_GATEWAY_FOLLOW_REDIRECTS'] === 'true';
    }
    if (env['DOCS_GATEWAY_MAX_CONTENT_LENGTH']) {
      this.config.fetch.maxContentLength = parseInt(env['DOCS_GATEWAY_MAX_CONTENT_LENGTH'], 10);
    }
    this.config.fetch.oversize = this.envEnum('DOCS_GATEWAY_OVERSIZE', OversizePolicySchema) ?? this.config.fetch.oversize;

    // Access configuration
    this.config.access.allowedDomains = this.envList('DOCS_GATEWAY_ALLOWED_DOMAINS') ?? this.config.access.allowedDomains;
    this.config.access.allowedLocalPaths = this.envList('DOCS_GATEWAY_ALLOWED_PATHS') ?? this.config.access.allowedLocalPaths;

    // Tools and index configuration
    if (env['DOCS_GATEWAY_MAX_TOOL_NAME_LENGTH']) {
      this.config.tools.maxToolNameLength = parseInt(env['DOCS_GATEWAY_MAX_TOOL_NAME_LENGTH'], 10);
    }
    if (env['DOCS_GATEWAY_INDEX_CACHE_TTL']) {
      this.config.index.cacheTTL = parseInt(env['DOCS_GATEWAY_INDEX_CACHE_TTL'], 10);
    }
  }

  /**
   * Apply command-line flags and load the sources they name
   */
  private loadFromCli(): void {
    const cli = this.options.cli;
    if (!cli) {
      return;
    }

    if (cli.sourcesFile) {
      this.config.sources = mergeSourceInputs(this.config.sources, loadSourcesFile(cli.sourcesFile));
    }
    if (cli.urls) {
      this.config.sources = mergeSourceInputs(this.config.sources, parseSourceEntries(cli.urls));
    }

    if (cli.allowedDomains) {
      this.config.access.allowedDomains = [...this.config.access.allowedDomains, ...cli.allowedDomains];
    }
    if (cli.allowedPaths) {
      this.config.access.allowedLocalPaths = [...this.config.access.allowedLocalPaths, ...cli.allowedPaths];
    }
    if (cli.followRedirects !== undefined) {
      this.config.fetch.followRedirects = cli.followRedirects;
    }
    if (cli.timeout !== undefined) {
      this.config.fetch.timeout = Math.round(cli.timeout * 1000);
    }
    if (cli.maxContentLength !== undefined) {
      this.config.fetch.maxContentLength = cli.maxContentLength;
    }
    if (cli.oversize !== undefined) {
      this.config.fetch.oversize = cli.oversize;
    }
    if (cli.maxToolNameLength !== undefined) {
      this.config.tools.maxToolNameLength = cli.maxToolNameLength;
    }
    if (cli.transport !== undefined) {
      this.config.mcp.transport = cli.transport;
    }
    if (cli.host !== undefined) {
      this.config.server.host = cli.host;
    }
    if (cli.port !== undefined) {
      this.config.server.port = cli.port;
    }
    if (cli.logLevel !== undefined) {
      this.config.logging.level = cli.logLevel;
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(): void {
    const result = ConfigSchema.safeParse(this.config);
    if (!result.success) {
      throw new ConfigurationError(`Configuration validation failed: ${result.error.message}`);
    }
    this.config = result.data;
  }

  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(options?: ConfigLoaderOptions): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader(options);
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export type { Config } from './schema.js';
