import type { BootConfig } from '../config/env.js';
import { DiagnosticError } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../core/logger.js';
import { describeOutcome, isSuccess, type CommandSpec, type ProcessRunner } from '../core/process-runner.js';
import { frameworkVersionCommand, interpreterExecutableCommand, interpreterVersionCommand } from './commands.js';

export interface RuntimeInfo {
  node: string;
  execPath: string;
  pid: number;
  cwd: string;
}

export interface DiagnosticReport {
  runtime: RuntimeInfo;
  interpreter: string | null;
  executable: string | null;
  framework: { module: string; version: string } | null;
  warnings: string[];
}

export class Diagnostics {
  private readonly warnings: string[] = [];

  constructor(
    private readonly runner: ProcessRunner,
    private readonly config: Pick<BootConfig, 'interpreter' | 'serverModule'>,
    private readonly log: Logger = defaultLogger,
  ) {}

  async collect(): Promise<DiagnosticReport> {
    const runtime: RuntimeInfo = {
      node: process.version,
      execPath: process.execPath,
      pid: process.pid,
      cwd: process.cwd(),
    };
    this.log.info('Bootstrapper runtime', { ...runtime });

    const interpreter = await this.inspect(interpreterVersionCommand(this.config));
    if (interpreter) {
      this.log.info('Interpreter', { interpreter });
    }

    const executable = await this.inspect(interpreterExecutableCommand(this.config));
    if (executable) {
      this.log.info('Executable', { executable });
    }

    const version = await this.inspect(frameworkVersionCommand(this.config));
    const framework = version ? { module: this.config.serverModule, version } : null;
    if (framework) {
      this.log.info('Server framework', framework);
    }

    return { runtime, interpreter, executable, framework, warnings: [...this.warnings] };
  }

  private async inspect(spec: CommandSpec): Promise<string | null> {
    const { outcome, stdout, stderr } = await this.runner.capture(spec);
    if (!isSuccess(outcome)) {
      const error = new DiagnosticError(`${spec.label} check failed: ${describeOutcome(outcome)}`);
      this.warnings.push(error.message);
      this.log.warn('Diagnostic check failed', { check: spec.label, error, stderr: stderr.trim() || undefined });
      return null;
    }
    // Older interpreters print their version on stderr
    const output = stdout.trim() || stderr.trim();
    return output || null;
  }
}

export function collectDiagnostics(
  runner: ProcessRunner,
  config: Pick<BootConfig, 'interpreter' | 'serverModule'>,
  log: Logger = defaultLogger,
): Promise<DiagnosticReport> {
  return new Diagnostics(runner, config, log).collect();
}
