#!/usr/bin/env node

/**
 * Configuration Validation Script
 * Validates configuration, doc sources and tool names without starting the server
 */

import { parseCliArgs } from '../cli/args.js';
import { toError } from '../errors/index.js';
import { Logger } from '../logger/index.js';
import { DocsGatewayServer } from '../server.js';
import { getConfig } from './index.js';

try {
  console.log('Validating configuration...');
  const config = getConfig({ cli: parseCliArgs(process.argv.slice(2)) });
  const gateway = new DocsGatewayServer(config, new Logger({ ...config.logging, silent: true }));

  console.log('Configuration is valid!');
  console.log('\nTools:');
  for (const tool of gateway.getTools().listAllTools()) {
    console.log(`  ${tool.name}`);
  }
  console.log('\nConfiguration:');
  console.log(JSON.stringify(config, null, 2));
  process.exit(0);
} catch (error) {
  console.error('Configuration validation failed:');
  console.error(toError(error).message);
  process.exit(1);
}
