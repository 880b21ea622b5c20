#!/usr/bin/env node

import { installStdioHygiene, logServer } from './utils/stdioHygiene.js';

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { loadConfig, type RinexConfig } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { getTools, handleToolCall } from './tools/index.js';

export function createServer(config: RinexConfig): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getTools(config.toolMode) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(request.params.name, request.params.arguments ?? {}, config.toolMode, { config });
  });

  return server;
}

async function main() {
  installStdioHygiene();

  let config: RinexConfig;
  try {
    config = loadConfig();
  } catch (err) {
    logServer('Invalid configuration:', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
    return;
  }

  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logServer(`Server started (${config.toolMode} mode)`);
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    logServer('Fatal:', err);
    process.exitCode = 1;
  });
}
