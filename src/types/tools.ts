/**
 * MCP Tool type definitions
 */

import { z } from 'zod';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Tool descriptor as advertised by tools/list
 */
export type ToolDescriptor = Tool;

/**
 * Tool call response interface - uses MCP SDK type
 */
export type ToolCallResponse = CallToolResult;

export const FETCH_DOCS_PREFIX = 'fetch_docs_';
export const LIST_DOC_SOURCES_TOOL = 'list_doc_sources';

/**
 * Arguments of every fetch_docs_* tool; no url lists the index
 */
export const FetchDocsArgsSchema = z.object({
  url: z.string().trim().min(1).optional(),
});

export type FetchDocsArgs = z.infer<typeof FetchDocsArgsSchema>;

export const ListDocSourcesArgsSchema = z.object({});
