import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export const TransportSchema = z.enum(['stdio', 'sse']);
export const OversizePolicySchema = z.enum(['truncate', 'fail']);

/**
 * A documentation source as written in configuration.
 * `llms_txt` is accepted as an alias of `location`.
 */
export const DocSourceInputSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    location: z.string().trim().min(1).optional(),
    llms_txt: z.string().trim().min(1).optional(),
    description: z.string().optional(),
  })
  .refine((source) => source.location !== undefined || source.llms_txt !== undefined, {
    message: 'Each doc source needs a "llms_txt" or "location" entry',
  });

export const DocSourceListSchema = z.array(DocSourceInputSchema);

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8000),
  host: z.string().default('127.0.0.1'),
  nodeEnv: NodeEnvSchema.default('development'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  // Empty string disables file transports
  dir: z.string().default(''),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().default('10m'),
  silent: z.boolean().default(false),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().default('llms-txt'),
  serverVersion: z.string().default('0.1.0'),
  transport: TransportSchema.default('stdio'),
});

export const FetchConfigSchema = z.object({
  timeout: z.number().int().min(1).default(10000),
  followRedirects: z.boolean().default(false),
  maxRedirects: z.number().int().min(0).default(5),
  maxContentLength: z.number().int().min(1).default(200000),
  oversize: OversizePolicySchema.default('truncate'),
  userAgent: z.string().default('docs-gateway-mcp/0.1'),
});

export const AccessConfigSchema = z.object({
  allowedDomains: z.array(z.string()).default([]),
  allowedLocalPaths: z.array(z.string()).default([]),
});

export const ToolsConfigSchema = z.object({
  // 0 means no limit
  maxToolNameLength: z.number().int().min(0).default(60),
});

export const IndexConfigSchema = z.object({
  // 0 disables caching; the index is re-read on every call
  cacheTTL: z.number().int().min(0).default(0),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
  fetch: FetchConfigSchema,
  access: AccessConfigSchema,
  tools: ToolsConfigSchema,
  index: IndexConfigSchema,
  sources: DocSourceListSchema.default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type Transport = z.infer<typeof TransportSchema>;
export type OversizePolicy = z.infer<typeof OversizePolicySchema>;
export type DocSourceInput = z.infer<typeof DocSourceInputSchema>;
