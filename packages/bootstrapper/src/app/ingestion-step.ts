import type { BootConfig } from '../config/env.js';
import { IngestionError } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../core/logger.js';
import { formatCommand, isSuccess, type ProcessRunner } from '../core/process-runner.js';
import { ingestionCommand } from './commands.js';

/**
 * Runs the external ingestion program to completion with inherited stdio.
 * Resolves on a zero exit and throws IngestionError otherwise.
 */
export async function runIngestion(
  runner: ProcessRunner,
  config: Pick<BootConfig, 'interpreter' | 'ingestScript'>,
  log: Logger = defaultLogger,
): Promise<void> {
  const spec = ingestionCommand(config);
  log.debug('Launching ingestion', { command: formatCommand(spec) });

  const outcome = await runner.run(spec);
  if (!isSuccess(outcome)) {
    throw new IngestionError(outcome);
  }

  log.info('Ingestion finished');
}
