#!/usr/bin/env node
import { bootstrap } from './app/bootstrap.js';
import { logger } from './core/logger.js';

bootstrap()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    logger.error('Fatal error during startup', { error });
    process.exit(1);
  });
