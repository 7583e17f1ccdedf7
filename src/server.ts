import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'http';
import { dirname } from 'path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import { isRemoteLocation, toDocSource } from './config/sources.js';
import { ResourceFetcher, type HttpTransport } from './docs/fetcher.js';
import { SourceRegistry } from './docs/registry.js';
import { LifecycleManager } from './lifecycle/index.js';
import { buildAllowlistPolicy, describePolicy, type AllowlistPolicy } from './policy/allowlist.js';
import { ToolRegistry } from './tools/index.js';
import type { DocSource } from './types/docs.js';

export interface DocsGatewayDeps {
  /** HTTP transport for remote documents; defaults to the global fetch */
  httpTransport?: HttpTransport;
  /** Called with the exit code after shutdown */
  exit?: (code: number) => void;
}

const SSE_PATH = '/sse';
const MESSAGES_PATH = '/messages';

/**
 * Docs Gateway MCP Server
 * Wires the allowlist, fetcher, source registry and tools to the MCP protocol
 */
export class DocsGatewayServer {
  private readonly server: Server;
  private readonly logger: Logger;
  private readonly config: Config;
  private readonly lifecycle: LifecycleManager;
  private readonly sources: DocSource[];
  private readonly policy: AllowlistPolicy;
  private readonly tools: ToolRegistry;
  private stdioTransport?: StdioServerTransport;
  private httpServer?: HttpServer;
  private readonly sseSessions = new Map<string, SSEServerTransport>();

  constructor(config: Config, logger: Logger, deps: DocsGatewayDeps = {}) {
    this.config = config;
    this.logger = logger;

    this.sources = config.sources.map(toDocSource);
    this.policy = buildAllowlistPolicy(this.sources, config.access.allowedDomains);

    const localIndexes = this.sources.filter((s) => !isRemoteLocation(s.location)).map((s) => s.location);
    const fetcher = new ResourceFetcher(
      this.policy,
      {
        ...config.fetch,
        allowedLocalRoots: config.access.allowedLocalPaths,
        documentRoots: localIndexes.map((location) => dirname(location)),
        indexFiles: localIndexes,
      },
      { transport: deps.httpTransport, logger: logger.child({ component: 'fetcher' }) }
    );

    const registry = new SourceRegistry(this.sources, fetcher, {
      cacheTTL: config.index.cacheTTL,
      logger: logger.child({ component: 'registry' }),
    });

    this.tools = new ToolRegistry({
      registry,
      fetcher,
      policy: this.policy,
      maxToolNameLength: config.tools.maxToolNameLength,
      logger: logger.child({ component: 'tools' }),
    });

    this.server = this.createMcpServer();
    this.lifecycle = new LifecycleManager(logger, { exit: deps.exit });
    this.setupLifecycleHooks();
  }

  /**
   * Setup lifecycle hooks
   */
  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('log-sources', async () => {
      this.logger.info('Loaded documentation sources', {
        sources: this.sources.map((s) => ({ name: s.name, location: s.location })),
        allowedDomains: describePolicy(this.policy),
      });
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.stdioTransport) {
        this.logger.info('Closing MCP transport');
        await this.stdioTransport.close();
      }
    });

    this.lifecycle.onShutdown('close-http-server', async () => {
      await Promise.all([...this.sseSessions.values()].map((transport) => transport.close()));
      this.sseSessions.clear();
      const httpServer = this.httpServer;
      if (httpServer) {
        await new Promise<void>((resolve, reject) => {
          httpServer.close((error) => (error ? reject(error) : resolve()));
        });
      }
    });
  }

  /**
   * Build an MCP server with the tool handlers installed.
   * A server serves one transport, so every SSE session gets its own.
   */
  createMcpServer(): Server {
    const server = new Server(
      {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.debug('Received list_tools request');
      return { tools: this.tools.listAllTools() };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const toolName = request.params.name;
      this.logger.debug('Received call_tool request', { tool: toolName, args: request.params.arguments });
      return this.tools.callTool(toolName, request.params.arguments, extra.signal);
    });

    return server;
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    try {
      await this.lifecycle.startup();

      switch (this.config.mcp.transport) {
        case 'stdio':
          await this.startStdio();
          break;
        case 'sse':
          await this.startSse();
          break;
      }
    } catch (error) {
      this.logger.error('Failed to start MCP server', error);
      throw error;
    }
  }

  private async startStdio(): Promise<void> {
    this.logger.info('Starting MCP server with stdio transport');
    this.stdioTransport = new StdioServerTransport();
    this.server.onclose = () => {
      void this.lifecycle.shutdown('client disconnected');
    };
    await this.server.connect(this.stdioTransport);
    this.logger.info('MCP server started successfully');
  }

  private async startSse(): Promise<void> {
    const { host, port } = this.config.server;
    const httpServer = createServer((req, res) => {
      this.handleHttpRequest(req, res).catch((error: unknown) => {
        this.logger.error('SSE request failed', error, { url: req.url });
        if (!res.headersSent) {
          res.writeHead(500).end('Internal server error');
        }
      });
    });
    this.httpServer = httpServer;

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(port, host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });
    this.logger.info('MCP server listening with SSE transport', { url: `http://${host}:${port}${SSE_PATH}` });
  }

  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (req.method === 'GET' && url.pathname === SSE_PATH) {
      const transport = new SSEServerTransport(MESSAGES_PATH, res);
      this.sseSessions.set(transport.sessionId, transport);
      res.on('close', () => {
        this.sseSessions.delete(transport.sessionId);
      });
      this.logger.debug('SSE session opened', { sessionId: transport.sessionId });
      await this.createMcpServer().connect(transport);
      return;
    }

    if (req.method === 'POST' && url.pathname === MESSAGES_PATH) {
      const sessionId = url.searchParams.get('sessionId') ?? '';
      const transport = this.sseSessions.get(sessionId);
      if (!transport) {
        res.writeHead(404).end(`Unknown session: ${sessionId}`);
        return;
      }
      await transport.handlePostMessage(req, res);
      return;
    }

    res.writeHead(404).end('Not found');
  }

  /**
   * Install signal handlers so SIGINT and SIGTERM shut the server down
   */
  handleSignals(): void {
    this.lifecycle.handleSignals();
  }

  getTools(): ToolRegistry {
    return this.tools;
  }
}
