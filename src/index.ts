#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CommanderError } from 'commander';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { createCliClientFactory } from './clients/cli-lakehouse-client.js';
import { loadServerConfig } from './config.js';
import { SERVER_NAME } from './constants.js';
import { getErrorMessage } from './errors.js';
import { loadInstructionCatalog } from './instructions/catalog.js';
import { createServer, type ServerDependencies } from './server.js';
import { createToolRegistry } from './tools/index.js';
import { startHttpTransport } from './transports/http.js';

// Load environment variables from the package root's .env file
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, '../.env') });

const LOG_PREFIX = `[${SERVER_NAME}]`;

async function main() {
  const config = loadServerConfig(process.argv.slice(2));
  const catalog = await loadInstructionCatalog(config.instructionsDir);

  const deps: ServerDependencies = {
    tools: createToolRegistry(catalog),
    clientFactory: createCliClientFactory({
      cliPath: config.cliPath,
      commandTimeoutMs: config.commandTimeoutMs,
    }),
    profile: config.profile,
  };
  const credentials = config.profile ? `profile '${config.profile}'` : 'host default profile';

  let shutdown: () => Promise<void>;
  if (config.transport === 'stdio') {
    const server = createServer(deps);
    await server.connect(new StdioServerTransport());
    console.error(`${LOG_PREFIX} MCP Server started on stdio (${credentials})`);
    shutdown = () => server.close();
  } else {
    const running = await startHttpTransport({
      kind: config.transport,
      host: config.host,
      port: config.port,
      createMcpServer: () => createServer(deps),
    });
    console.error(`${LOG_PREFIX} MCP Server started on ${config.transport} at ${running.url} (${credentials})`);
    shutdown = () => running.close();
  }

  const stop = (signal: NodeJS.Signals) => {
    console.error(`${LOG_PREFIX} ${signal} received, shutting down`);
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`${LOG_PREFIX} Shutdown failed: ${getErrorMessage(error)}`);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  console.error(`${LOG_PREFIX} Server error: ${getErrorMessage(error)}`);
  process.exit(1);
});
