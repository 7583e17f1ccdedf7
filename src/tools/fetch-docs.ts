/**
 * Per-source documentation tools
 * One fetch_docs_<name> tool is built for every configured doc source
 */

import type { ResourceFetcher } from '../docs/fetcher.js';
import { formatIndex, resolveTarget } from '../docs/llms-txt.js';
import type { LoadedIndex, SourceRegistry } from '../docs/registry.js';
import { ToolNameCollisionError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { DocSource, FetchResult } from '../types/docs.js';
import type { FetchDocsArgs, ToolCallResponse, ToolDescriptor } from '../types/tools.js';
import { toolNameFor } from './naming.js';

export interface DocTool {
  readonly name: string;
  readonly source: DocSource;
  readonly descriptor: ToolDescriptor;
  invoke(args: FetchDocsArgs, signal?: AbortSignal): Promise<ToolCallResponse>;
}

export interface DocToolDeps {
  registry: SourceRegistry;
  fetcher: ResourceFetcher;
  maxToolNameLength: number;
  logger?: Logger;
}

function describeSource(source: DocSource): string {
  const subject = source.description ? `${source.name}: ${source.description}` : source.name;
  return (
    `Fetch and return documentation content for ${subject}. ` +
    'Call without "url" to list the documents in the index, then call again with one of the listed URLs.'
  );
}

export function fetchResultToResponse(result: FetchResult): ToolCallResponse {
  const response: ToolCallResponse = {
    content: [{ type: 'text', text: result.content }],
  };
  if (result.truncated) {
    response.content.push({
      type: 'text',
      text: `[Content truncated to ${result.content.length} characters: ${result.target}]`,
    });
  }
  return response;
}

function indexToResponse(source: DocSource, index: LoadedIndex): ToolCallResponse {
  const response: ToolCallResponse = {
    content: [{ type: 'text', text: formatIndex(source.name, index.entries, source.description) }],
  };
  if (index.truncated) {
    response.content.push({
      type: 'text',
      text: `[Index truncated at the content limit after ${index.entries.length} entries; later entries are missing: ${source.location}]`,
    });
  }
  return response;
}

function createDocTool(name: string, source: DocSource, deps: DocToolDeps): DocTool {
  const descriptor: ToolDescriptor = {
    name,
    description: describeSource(source),
    inputSchema: {
      type: 'object',
      properties: {
        url: {
          type: 'string',
          description: 'URL or path of a document listed in the index. Omit it to list the index.',
        },
      },
    },
  };

  return {
    name,
    source,
    descriptor,
    async invoke(args: FetchDocsArgs, signal?: AbortSignal): Promise<ToolCallResponse> {
      if (!args.url) {
        const index = await deps.registry.loadIndex(source, { signal });
        deps.logger?.debug('Listed doc source index', {
          source: source.name,
          entries: index.entries.length,
          truncated: index.truncated,
        });
        return indexToResponse(source, index);
      }

      const target = resolveTarget(args.url, source.location) ?? args.url;
      const result = await deps.fetcher.fetch(target, { signal });
      deps.logger?.debug('Fetched document', {
        source: source.name,
        target: result.target,
        length: result.content.length,
        truncated: result.truncated,
      });
      return fetchResultToResponse(result);
    },
  };
}

/**
 * Build one tool per source, in configuration order.
 * Two sources that map to the same tool name abort startup.
 */
export function buildDocTools(deps: DocToolDeps): DocTool[] {
  const owners = new Map<string, DocSource>();
  const tools: DocTool[] = [];

  for (const source of deps.registry.list()) {
    const name = toolNameFor(source.name, deps.maxToolNameLength);
    const owner = owners.get(name);
    if (owner) {
      throw new ToolNameCollisionError(name, [owner.name, source.name]);
    }
    owners.set(name, source);
    tools.push(createDocTool(name, source, deps));
  }

  return tools;
}
