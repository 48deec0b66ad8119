import type { BootConfig } from '../config/env.js';
import { logger as defaultLogger, type Logger } from '../core/logger.js';
import { Metrics } from '../core/metrics.js';
import type { ProcessRunner } from '../core/process-runner.js';
import { cachesReady, fileExists, missingSentinels, type ExistsCheck } from '../core/sentinels.js';
import { runStep, StepPolicy } from '../core/step-policy.js';
import { collectDiagnostics } from './diagnostics.js';
import { NoopIngestLock, type IngestLock, type LockHandle } from './ingest-lock.js';
import { runIngestion } from './ingestion-step.js';
import { handoff, type ServeOutcome, type SignalSource } from './server-handoff.js';

export type BootPhase = 'START' | 'DIAGNOSE' | 'CHECK_CACHE' | 'SKIP_INGEST' | 'RUN_INGEST' | 'SERVE';

const TRANSITIONS: Record<BootPhase, readonly BootPhase[]> = {
  START: ['DIAGNOSE'],
  DIAGNOSE: ['CHECK_CACHE'],
  CHECK_CACHE: ['SKIP_INGEST', 'RUN_INGEST'],
  SKIP_INGEST: ['SERVE'],
  RUN_INGEST: ['SERVE'],
  SERVE: [],
};

interface CacheState {
  ready: boolean;
  missing: string[];
}

export interface BootstrapperDeps {
  config: BootConfig;
  runner: ProcessRunner;
  exists?: ExistsCheck;
  lock?: IngestLock;
  signals?: SignalSource;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Drives one process start through
 * START → DIAGNOSE → CHECK_CACHE → {SKIP_INGEST | RUN_INGEST} → SERVE.
 *
 * Everything before SERVE is fail-open. SERVE is fail-closed and terminal:
 * `run()` settles only once the server has exited or could not be launched.
 */
export class Bootstrapper {
  private readonly config: BootConfig;
  private readonly runner: ProcessRunner;
  private readonly exists: ExistsCheck;
  private readonly lock: IngestLock;
  private readonly signals: SignalSource | undefined;
  private readonly log: Logger;
  private readonly metrics: Metrics;

  private current: BootPhase = 'START';
  private readonly visited: BootPhase[] = ['START'];

  constructor(deps: BootstrapperDeps) {
    this.config = deps.config;
    this.runner = deps.runner;
    this.exists = deps.exists ?? fileExists;
    this.lock = deps.lock ?? new NoopIngestLock();
    this.signals = deps.signals;
    this.log = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? new Metrics();
  }

  get phase(): BootPhase {
    return this.current;
  }

  get history(): readonly BootPhase[] {
    return [...this.visited];
  }

  async run(): Promise<ServeOutcome> {
    this.transition('DIAGNOSE');
    await this.metrics.time('phase_diagnose_ms', () => this.diagnose());

    this.transition('CHECK_CACHE');
    const cache = await this.metrics.time('phase_check_cache_ms', () => this.checkCache());

    if (cache.ready) {
      this.transition('SKIP_INGEST');
      this.log.info('Cache detected. Skipping ingestion.', { sentinels: this.config.sentinels });
    } else {
      this.transition('RUN_INGEST');
      this.log.info('No cache detected. Running ingestion...', { missing: cache.missing });
      await this.metrics.time('phase_ingest_ms', () => this.ingest());
    }

    this.transition('SERVE');
    this.log.info('Boot summary', this.metrics.getSnapshot());
    return this.serve();
  }

  private transition(next: BootPhase) {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal boot transition ${this.current} -> ${next}`);
    }
    this.log.debug('Boot phase', { from: this.current, to: next });
    this.current = next;
    this.visited.push(next);
  }

  private async diagnose() {
    const result = await runStep(
      { step: 'diagnose', policy: StepPolicy.Continue, failureMessage: 'Diagnostics failed (continue anyway)' },
      () => collectDiagnostics(this.runner, this.config, this.log),
      this.log,
    );
    if (!result.ok) {
      this.metrics.increment('diagnostic_failures');
      return;
    }
    this.metrics.increment('diagnostic_warnings', result.value.warnings.length);
  }

  private async checkCache(): Promise<CacheState> {
    const result = await runStep(
      { step: 'check-cache', policy: StepPolicy.Continue, failureMessage: 'Cache check failed, treating cache as absent' },
      async (): Promise<CacheState> => {
        const ready = cachesReady(this.config.sentinels, this.exists);
        return { ready, missing: ready ? [] : missingSentinels(this.config.sentinels, this.exists) };
      },
      this.log,
    );
    return result.ok ? result.value : { ready: false, missing: this.config.sentinels };
  }

  private async ingest() {
    const acquired = await runStep(
      {
        step: 'ingest-lock',
        policy: StepPolicy.Continue,
        failureMessage: 'Ingestion lock unavailable, running ingestion without it',
      },
      () => this.lock.acquire(),
      this.log,
    );
    const handle: LockHandle | null = acquired.ok ? acquired.value : null;

    try {
      if (handle?.exclusive && (await this.checkCache()).ready) {
        this.log.info('Cache appeared while waiting for the ingestion lock. Skipping ingestion.');
        return;
      }

      this.metrics.increment('ingestion_runs');
      const result = await runStep(
        { step: 'ingest', policy: StepPolicy.Continue, failureMessage: 'Ingestion failed (continue anyway)' },
        () => runIngestion(this.runner, this.config, this.log),
        this.log,
      );
      if (!result.ok) {
        this.metrics.increment('ingestion_failures');
      }
    } finally {
      if (handle) {
        await runStep(
          { step: 'ingest-lock', policy: StepPolicy.Continue, failureMessage: 'Failed to release ingestion lock' },
          () => handle.release(),
          this.log,
        );
      }
    }
  }

  private async serve(): Promise<ServeOutcome> {
    const { value } = await runStep(
      { step: 'serve', policy: StepPolicy.Abort, failureMessage: 'Server handoff failed' },
      () => handoff(this.runner, this.config, { signals: this.signals, log: this.log }),
      this.log,
    );
    return value;
  }
}
