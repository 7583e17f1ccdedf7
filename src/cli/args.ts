import { parseArgs } from 'util';
import type { ZodType } from 'zod';
import { ValidationError } from '../errors/index.js';
import { OversizePolicySchema, TransportSchema, LogLevelSchema, type OversizePolicy, type Transport, type LogLevel } from '../config/schema.js';

/**
 * Command-line options, already typed and validated.
 * Every field is optional; unset fields leave configuration untouched.
 */
export interface CliOptions {
  sourcesFile?: string;
  urls?: string[];
  allowedDomains?: string[];
  allowedPaths?: string[];
  followRedirects?: boolean;
  /** Seconds, as on the command line */
  timeout?: number;
  maxContentLength?: number;
  oversize?: OversizePolicy;
  maxToolNameLength?: number;
  transport?: Transport;
  host?: string;
  port?: number;
  logLevel?: LogLevel;
  help?: boolean;
  version?: boolean;
}

export const USAGE = `Usage: docs-gateway-mcp [options]

Expose llms.txt documentation sources as MCP tools.

Options:
  -j, --json <file>               JSON config file with a list of doc sources
  -u, --urls <entry...>           llms.txt URLs or paths, as 'url_or_path' or 'name:url_or_path'
      --allowed-domains <d...>    Additional domains to allow; '*' allows all domains
      --allowed-paths <p...>      Additional local directories documents may be read from
      --follow-redirects          Follow HTTP redirects (each hop is checked against the allowlist)
      --timeout <seconds>         HTTP request timeout (default: 10)
      --max-content-length <n>    Maximum characters returned per document (default: 200000)
      --oversize <mode>           'truncate' or 'fail' when content exceeds the maximum
      --max-tool-name-length <n>  Maximum tool name length, 0 for unlimited (default: 60)
      --transport <t>             'stdio' or 'sse' (default: stdio)
      --host <host>               Host to bind with --transport sse (default: 127.0.0.1)
      --port <port>               Port to bind with --transport sse (default: 8000)
      --log-level <level>         debug, info, warn or error
  -V, --version                   Show version information and exit
  -h, --help                      Show this help message

Examples:
  docs-gateway-mcp --urls LangGraph:https://langchain-ai.github.io/langgraph/llms.txt
  docs-gateway-mcp --urls LocalDocs:/path/to/llms.txt --allowed-domains '*'
  docs-gateway-mcp --json sample_config.json --transport sse --port 9000
  docs-gateway-mcp --json sample_config.json --allowed-domains https://example.com/ another.example
`;

/**
 * Collect values for flags that accept several space-separated values
 * (`--urls a b c`) by repeating the flag before each value
 */
function collectMultiValues(argv: string[], multi: Set<string>): string[] {
  const out: string[] = [];
  let current: string | null = null;

  for (const arg of argv) {
    if (arg.startsWith('-')) {
      const flag = arg.split('=')[0] ?? arg;
      current = multi.has(flag) ? flag : null;
      out.push(arg);
    } else if (current !== null && out[out.length - 1] !== current) {
      out.push(current, arg);
    } else {
      out.push(arg);
    }
  }
  return out;
}

const MULTI_VALUE_FLAGS = new Set(['--urls', '-u', '--allowed-domains', '--allowed-paths']);

function toInt(flag: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ValidationError(`${flag} expects an integer >= ${min}, got "${value}"`, { flag, value });
  }
  return parsed;
}

function toEnum<T extends string>(
  flag: string,
  schema: ZodType<T>,
  value: string | undefined
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid value for ${flag}: "${value}"`, { flag, value });
  }
  return result.data;
}

/**
 * Parse process arguments (without the node and script entries)
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: collectMultiValues(argv, MULTI_VALUE_FLAGS),
    strict: true,
    allowPositionals: false,
    options: {
      json: { type: 'string', short: 'j' },
      urls: { type: 'string', short: 'u', multiple: true },
      'allowed-domains': { type: 'string', multiple: true },
      'allowed-paths': { type: 'string', multiple: true },
      'follow-redirects': { type: 'boolean' },
      timeout: { type: 'string' },
      'max-content-length': { type: 'string' },
      oversize: { type: 'string' },
      'max-tool-name-length': { type: 'string' },
      transport: { type: 'string' },
      host: { type: 'string' },
      port: { type: 'string' },
      'log-level': { type: 'string' },
      version: { type: 'boolean', short: 'V' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  let timeout: number | undefined;
  if (values.timeout !== undefined) {
    timeout = Number(values.timeout);
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ValidationError(`--timeout expects a positive number of seconds, got "${values.timeout}"`);
    }
  }

  return {
    sourcesFile: values.json,
    urls: values.urls,
    allowedDomains: values['allowed-domains'],
    allowedPaths: values['allowed-paths'],
    followRedirects: values['follow-redirects'],
    timeout,
    maxContentLength: toInt('--max-content-length', values['max-content-length'], 1),
    oversize: toEnum('--oversize', OversizePolicySchema, values.oversize),
    maxToolNameLength: toInt('--max-tool-name-length', values['max-tool-name-length'], 0),
    transport: toEnum('--transport', TransportSchema, values.transport),
    host: values.host,
    port: toInt('--port', values.port, 1),
    logLevel: toEnum('--log-level', LogLevelSchema, values['log-level']?.toLowerCase()),
    help: values.help,
    version: values.version,
  };
}
