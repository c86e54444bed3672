#!/usr/bin/env node

/**
 * Disk Status Exporter - Entry Point
 * Prometheus exporter for hard-disk power states
 */

import { getConfig } from './config/index.js';
import { getLogger } from './logger/index.js';
import { DiskStatusExporter } from './server.js';
import { ConfigurationError } from './errors/index.js';

async function main(): Promise<void> {
  try {
    const config = getConfig();

    const logger = getLogger(config.logging);

    logger.info('Starting disk status exporter', {
      version: config.exporter.version,
      nodeEnv: config.server.nodeEnv,
    });

    const exporter = new DiskStatusExporter(config, logger);
    await exporter.start();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
