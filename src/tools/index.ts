/**
 * Tools registry and handlers
 * Central module for all MCP tools
 */

import type { z, ZodTypeAny } from 'zod';
import type { ResourceFetcher } from '../docs/fetcher.js';
import type { SourceRegistry } from '../docs/registry.js';
import { ErrorCode, GatewayError, ToolError, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import { describePolicy, type AllowlistPolicy } from '../policy/allowlist.js';
import {
  FetchDocsArgsSchema,
  LIST_DOC_SOURCES_TOOL,
  ListDocSourcesArgsSchema,
  type ToolCallResponse,
  type ToolDescriptor,
} from '../types/tools.js';
import { buildDocTools, type DocTool } from './fetch-docs.js';
import { formatValidationErrors, validateToolArgs } from './validation.js';

export interface ToolRegistryDeps {
  registry: SourceRegistry;
  fetcher: ResourceFetcher;
  policy: AllowlistPolicy;
  maxToolNameLength: number;
  logger?: Logger;
}

function jsonResponse(payload: unknown): ToolCallResponse {
  return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
}

/**
 * Render a failure as a structured error result the calling agent can branch on
 */
export function errorResponse(error: unknown): ToolCallResponse {
  const payload =
    error instanceof GatewayError
      ? { ...error.context, error: error.name, code: error.code, message: error.message }
      : { error: 'UnknownError', code: ErrorCode.UNKNOWN_ERROR, message: toError(error).message };

  return { ...jsonResponse(payload), isError: true };
}

export class ToolRegistry {
  private readonly deps: ToolRegistryDeps;
  private readonly docTools: Map<string, DocTool>;

  constructor(deps: ToolRegistryDeps) {
    this.deps = deps;
    this.docTools = new Map(buildDocTools(deps).map((tool) => [tool.name, tool]));
  }

  /**
   * Get all available MCP tools
   */
  listAllTools(): ToolDescriptor[] {
    return [
      ...[...this.docTools.values()].map((tool) => tool.descriptor),
      {
        name: LIST_DOC_SOURCES_TOOL,
        description:
          'List all documentation sources with the tool that fetches each one and the domains documents may be fetched from.',
        inputSchema: {
          type: 'object',
          properties: {},
        },
      },
    ];
  }

  isValidToolName(name: string): boolean {
    return name === LIST_DOC_SOURCES_TOOL || this.docTools.has(name);
  }

  /**
   * Call a tool by name; failures come back as isError results, never as throws
   */
  async callTool(name: string, args: unknown, signal?: AbortSignal): Promise<ToolCallResponse> {
    try {
      if (name === LIST_DOC_SOURCES_TOOL) {
        this.parseArgs(name, ListDocSourcesArgsSchema, args);
        return this.listDocSources();
      }

      const tool = this.docTools.get(name);
      if (!tool) {
        throw new ToolError(`Unknown tool: ${name}`, ErrorCode.TOOL_NOT_FOUND, {
          availableTools: this.listAllTools().map((t) => t.name),
        });
      }

      return await tool.invoke(this.parseArgs(name, FetchDocsArgsSchema, args), signal);
    } catch (error) {
      this.deps.logger?.warn('Tool call failed', {
        tool: name,
        error: error instanceof GatewayError ? error.toString() : toError(error).message,
      });
      return errorResponse(error);
    }
  }

  private parseArgs<S extends ZodTypeAny>(name: string, schema: S, args: unknown): z.infer<S> {
    const validation = validateToolArgs(schema, args ?? {});
    if (!validation.success) {
      throw new ToolError(
        `Invalid tool arguments. ${formatValidationErrors(validation.errors)}`,
        ErrorCode.TOOL_INVALID_INPUT,
        { tool: name, details: validation.errors }
      );
    }
    return validation.data;
  }

  private listDocSources(): ToolCallResponse {
    const sources = [...this.docTools.values()].map((tool) => ({
      name: tool.source.name,
      tool: tool.name,
      location: tool.source.location,
      ...(tool.source.description ? { description: tool.source.description } : {}),
    }));

    return jsonResponse({
      sources,
      allowedDomains: describePolicy(this.deps.policy),
    });
  }
}
