#!/usr/bin/env node
import dotenv from 'dotenv';
import path from 'path';
import { SidecarConfigManager, configFromEnv } from './config/SidecarConfig.js';
import { StemSidecarServer } from './server.js';
import { logger, errorMessage } from './utils/logger.js';

/**
 * Main entry point for the stem separation sidecar.
 * Loads environment variables, validates configuration and starts the HTTP server.
 */
async function main(): Promise<void> {
  dotenv.config({ path: path.join(process.cwd(), '.env') });

  const configManager = new SidecarConfigManager(configFromEnv(process.env));
  const validation = configManager.validateConfig();
  if (!validation.valid) {
    throw new Error(`Invalid configuration: ${validation.errors.join('; ')}`);
  }

  const server = new StemSidecarServer(configManager.getConfig());
  await server.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}`);
    server
      .close()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(error => {
  logger.error(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
});
