#!/usr/bin/env node
/**
 * EU AI Act Compliance MCP server, STDIO transport.
 */
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { loadConfig } from './config.js';

async function main(): Promise<void> {
  const { server, registry } = createServer(loadConfig());
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async (): Promise<void> => {
    for (const failure of registry.shutdownAll()) console.error(`[server] ${failure.message}`);
    await server.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((err) => { console.error('[server] Shutdown failed:', err); process.exit(1); });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => { console.error('EU AI Act compliance server failed:', err); process.exit(1); });
