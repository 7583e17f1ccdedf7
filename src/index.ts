#!/usr/bin/env node

/**
 * Docs Gateway MCP Server - Entry Point
 * Serves llms.txt documentation sources to MCP clients, one fetch tool per source
 */

import { USAGE, parseCliArgs, type CliOptions } from './cli/args.js';
import { getConfig } from './config/index.js';
import { getLogger } from './logger/index.js';
import { DocsGatewayServer } from './server.js';
import { GatewayError, toError } from './errors/index.js';

function parseArgsOrExit(argv: string[]): CliOptions {
  try {
    return parseCliArgs(argv);
  } catch (error) {
    console.error(`Error: ${toError(error).message}\n`);
    console.error(USAGE);
    process.exit(2);
  }
}

async function main(): Promise<void> {
  const cli = parseArgsOrExit(process.argv.slice(2));

  if (cli.help) {
    console.log(USAGE);
    return;
  }

  try {
    const config = getConfig({ cli });

    if (cli.version) {
      console.log(`${config.mcp.serverName} ${config.mcp.serverVersion}`);
      return;
    }

    const logger = getLogger(config.logging);

    logger.info('Starting Docs Gateway MCP Server', {
      version: config.mcp.serverVersion,
      transport: config.mcp.transport,
      nodeEnv: config.server.nodeEnv,
    });

    const server = new DocsGatewayServer(config, logger);
    server.handleSignals();
    await server.start();
  } catch (error) {
    if (error instanceof GatewayError) {
      console.error(`Startup failed: ${error.toString()}`);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
