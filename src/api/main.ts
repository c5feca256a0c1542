#!/usr/bin/env node
/**
 * REST scoring API entry point.
 */
import { buildApiServer } from './server.js';
import { loadConfig } from '../config.js';
import { ScoringClient } from '../security/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const app = buildApiServer({ scoring: new ScoringClient(config.scoring), logger: true });
  await app.listen({ host: config.api.host, port: config.api.port });

  const shutdown = async (): Promise<void> => {
    await app.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((err) => { console.error('[api] Shutdown failed:', err); process.exit(1); });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => { console.error('Scoring API failed:', err); process.exit(1); });
