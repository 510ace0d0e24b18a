#!/usr/bin/env tsx
import { runCli } from './cli';
import { logger } from './config/logger';

const start = async (): Promise<void> => {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (err) {
    logger.error({ err }, 'Failed to start');
    process.exit(1);
  }
};

void start();
