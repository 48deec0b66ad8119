import type { BootConfig } from '../../src/config/env.js';
import { Logger, type LogLevel } from '../../src/core/logger.js';
import type {
  CapturedOutput,
  CommandSpec,
  LaunchedProcess,
  ProcessOutcome,
  ProcessRunner,
} from '../../src/core/process-runner.js';

export interface LogEntry {
  level: string;
  message: string;
  [key: string]: unknown;
}

export function captureLogger(level: LogLevel = 'debug') {
  const entries: LogEntry[] = [];
  const log = new Logger({ level, sink: (line) => entries.push(JSON.parse(line)) });
  return {
    log,
    entries,
    messages: () => entries.map((entry) => entry.message),
  };
}

export const exited = (exitCode: number): ProcessOutcome => ({ kind: 'exited', exitCode });

export function testConfig(overrides: Partial<BootConfig> = {}): BootConfig {
  return {
    port: 8000,
    host: '0.0.0.0',
    dataDir: '/srv/app/data',
    sentinels: ['/srv/app/data/about_cache.txt', '/srv/app/data/faq_cache.json'],
    interpreter: 'python3',
    ingestScript: 'ingestion.py',
    serverModule: 'uvicorn',
    appTarget: 'webhook:app',
    serverLogLevel: 'info',
    logLevel: 'debug',
    ingestLock: { kind: 'none' },
    ...overrides,
  };
}

interface RunnerCall {
  mode: 'capture' | 'run' | 'launch';
  spec: CommandSpec;
}

export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RunnerCall[] = [];
  readonly killed: NodeJS.Signals[] = [];
  readonly captured = new Map<string, CapturedOutput>();
  runOutcome: ProcessOutcome = exited(0);
  serverExit: Promise<ProcessOutcome> = Promise.resolve(exited(0));

  async capture(spec: CommandSpec): Promise<CapturedOutput> {
    this.calls.push({ mode: 'capture', spec });
    return this.captured.get(spec.label) ?? { outcome: exited(0), stdout: '', stderr: '' };
  }

  async run(spec: CommandSpec): Promise<ProcessOutcome> {
    this.calls.push({ mode: 'run', spec });
    return this.runOutcome;
  }

  launch(spec: CommandSpec): LaunchedProcess {
    this.calls.push({ mode: 'launch', spec });
    return {
      pid: 4242,
      kill: (signal) => {
        this.killed.push(signal);
      },
      exited: this.serverExit,
    };
  }

  callsFor(mode: RunnerCall['mode']): CommandSpec[] {
    return this.calls.filter((call) => call.mode === mode).map((call) => call.spec);
  }
}
