import dotenv from 'dotenv';
import { loadConfig } from '../config/env.js';
import { logger } from '../core/logger.js';
import { ExecaProcessRunner } from '../core/process-runner.js';
import { Bootstrapper } from './bootstrapper.js';
import { createIngestLock } from './ingest-lock.js';

/**
 * Loads `.env`, validates configuration and runs the boot sequence.
 * Resolves with the exit status of the server once it stops.
 */
export async function bootstrap(): Promise<number> {
  dotenv.config();

  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const bootstrapper = new Bootstrapper({
    config,
    runner: new ExecaProcessRunner(),
    lock: createIngestLock(config, logger),
    signals: process,
    logger,
  });

  const { exitCode } = await bootstrapper.run();
  return exitCode;
}
