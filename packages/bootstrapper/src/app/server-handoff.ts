import { constants } from 'node:os';
import type { BootConfig } from '../config/env.js';
import { HandoffError } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../core/logger.js';
import { describeOutcome, formatCommand, type ProcessOutcome, type ProcessRunner } from '../core/process-runner.js';
import { serverCommand } from './commands.js';

export type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface ServeOutcome {
  /** Exit status the bootstrapper should mirror. */
  exitCode: number;
  outcome: ProcessOutcome;
}

export interface HandoffOptions {
  signals?: SignalSource;
  log?: Logger;
}

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function exitCodeFor(outcome: ProcessOutcome): number {
  switch (outcome.kind) {
    case 'exited':
      return outcome.exitCode;
    case 'signaled': {
      const signalNumber = Object.entries(constants.signals).find(([name]) => name === outcome.signal)?.[1];
      return signalNumber === undefined ? 1 : 128 + signalNumber;
    }
    case 'spawn-failed':
      return 1;
  }
}

/**
 * Launches the application server and stays attached to it until it exits.
 *
 * The returned promise does not settle while the server runs. SIGINT and
 * SIGTERM received meanwhile are relayed to the server. A server that cannot
 * be spawned at all raises HandoffError.
 */
export async function handoff(
  runner: ProcessRunner,
  config: Pick<BootConfig, 'interpreter' | 'serverModule' | 'appTarget' | 'host' | 'port' | 'serverLogLevel'>,
  options: HandoffOptions = {},
): Promise<ServeOutcome> {
  const log = options.log ?? defaultLogger;
  const signals = options.signals ?? process;
  const spec = serverCommand(config);

  log.info(`Starting server on ${config.host}:${config.port}`, {
    host: config.host,
    port: config.port,
    command: formatCommand(spec),
  });

  const server = runner.launch(spec);
  const forward: SignalListener = (signal) => {
    log.info(`Received ${signal}, forwarding to server`, { pid: server.pid });
    server.kill(signal);
  };
  for (const signal of FORWARDED_SIGNALS) {
    signals.on(signal, forward);
  }

  try {
    const outcome = await server.exited;
    if (outcome.kind === 'spawn-failed') {
      throw new HandoffError(`Server failed to start: ${outcome.message}`);
    }
    const exitCode = exitCodeFor(outcome);
    log.info('Server exited', { outcome: describeOutcome(outcome), exitCode });
    return { exitCode, outcome };
  } finally {
    for (const signal of FORWARDED_SIGNALS) {
      signals.off(signal, forward);
    }
  }
}
