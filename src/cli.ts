#!/usr/bin/env node
/**
 * Runs the orchestrator behind the HTTP/WebSocket API.
 *
 * Usage:
 *   npx tsx src/cli.ts --rom roms/game.gb --layout layouts/my-title.json --autostart
 *   npx tsx src/cli.ts --mode single --player scripted --port 8080
 */

import { createSession } from './bootstrap.js';
import { USAGE, loadConfig } from './config.js';
import { InvalidConfigError, errorMessage } from './errors.js';

async function main(): Promise<void> {
  const { config, help } = loadConfig(process.argv.slice(2));
  if (help) {
    console.log(USAGE);
    return;
  }

  const { orchestrator, server } = createSession(config);
  await server.listen();

  if (config.autostart) {
    try {
      await orchestrator.start();
    } catch (e) {
      // Keep serving; the session can be started later through the API
      console.error('[CLI] Autostart failed:', errorMessage(e));
    }
  }

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n[CLI] Shutting down...');
    if (orchestrator.status === 'running' || orchestrator.status === 'stopping') {
      await orchestrator.stop();
    }
    await server.close();
  };

  // Graceful shutdown
  process.on('SIGINT', () => {
    shutdown().catch((e: unknown) => {
      console.error('[CLI] Shutdown failed:', e);
      process.exitCode = 1;
    });
  });
}

main().catch((e: unknown) => {
  if (e instanceof InvalidConfigError) {
    console.error(`[CLI] ${e.message}\n\n${USAGE}`);
  } else {
    console.error('[CLI] Fatal error:', e);
  }
  process.exitCode = 1;
});
