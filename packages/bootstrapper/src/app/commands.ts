import type { BootConfig } from '../config/env.js';
import type { CommandSpec } from '../core/process-runner.js';

type InterpreterConfig = Pick<BootConfig, 'interpreter'>;

export function interpreterVersionCommand(config: InterpreterConfig): CommandSpec {
  return { label: 'interpreter-version', command: config.interpreter, args: ['-V'] };
}

export function interpreterExecutableCommand(config: InterpreterConfig): CommandSpec {
  return {
    label: 'interpreter-executable',
    command: config.interpreter,
    args: ['-c', 'import sys; print(sys.executable)'],
  };
}

export function frameworkVersionCommand(config: Pick<BootConfig, 'interpreter' | 'serverModule'>): CommandSpec {
  const module = config.serverModule;
  return {
    label: 'framework-version',
    command: config.interpreter,
    args: ['-c', `import ${module}; print(${module}.__version__)`],
  };
}

export function ingestionCommand(config: Pick<BootConfig, 'interpreter' | 'ingestScript'>): CommandSpec {
  return { label: 'ingestion', command: config.interpreter, args: [config.ingestScript] };
}

export function serverCommand(
  config: Pick<BootConfig, 'interpreter' | 'serverModule' | 'appTarget' | 'host' | 'port' | 'serverLogLevel'>,
): CommandSpec {
  return {
    label: 'server',
    command: config.interpreter,
    args: [
      '-m',
      config.serverModule,
      config.appTarget,
      '--host',
      config.host,
      '--port',
      String(config.port),
      '--log-level',
      config.serverLogLevel,
      '--access-log',
    ],
  };
}
