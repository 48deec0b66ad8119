import { execa, type ExecaReturnValue } from 'execa';

export interface CommandSpec {
  label: string;
  command: string;
  args: string[];
}

export type ProcessOutcome =
  | { kind: 'exited'; exitCode: number }
  | { kind: 'signaled'; signal: string }
  | { kind: 'spawn-failed'; message: string };

export interface CapturedOutput {
  outcome: ProcessOutcome;
  stdout: string;
  stderr: string;
}

export interface LaunchedProcess {
  readonly pid: number | undefined;
  kill(signal: NodeJS.Signals): void;
  readonly exited: Promise<ProcessOutcome>;
}

/**
 * Seam between the boot sequence and the operating system.
 *
 * `capture` collects output for diagnostics, `run` inherits stdio and resolves on
 * exit, `launch` starts a long-running child and hands back control of it.
 */
export interface ProcessRunner {
  capture(spec: CommandSpec): Promise<CapturedOutput>;
  run(spec: CommandSpec): Promise<ProcessOutcome>;
  launch(spec: CommandSpec): LaunchedProcess;
}

// Collaborators flush every line so their output interleaves with ours
const CHILD_ENV = { PYTHONUNBUFFERED: '1' };

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

export function describeOutcome(outcome: ProcessOutcome): string {
  switch (outcome.kind) {
    case 'exited':
      return `exit code ${outcome.exitCode}`;
    case 'signaled':
      return `killed by ${outcome.signal}`;
    case 'spawn-failed':
      return `spawn failed: ${outcome.message}`;
  }
}

export function isSuccess(outcome: ProcessOutcome): boolean {
  return outcome.kind === 'exited' && outcome.exitCode === 0;
}

function toOutcome(result: ExecaReturnValue): ProcessOutcome {
  if (typeof result.signal === 'string') {
    return { kind: 'signaled', signal: result.signal };
  }
  if (typeof result.exitCode === 'number') {
    return { kind: 'exited', exitCode: result.exitCode };
  }
  // With reject: false a spawn error (ENOENT, EACCES) resolves without an exit code
  const message = 'shortMessage' in result && typeof result.shortMessage === 'string' ? result.shortMessage : result.command;
  return { kind: 'spawn-failed', message };
}

export class ExecaProcessRunner implements ProcessRunner {
  async capture(spec: CommandSpec): Promise<CapturedOutput> {
    const result = await execa(spec.command, spec.args, { env: CHILD_ENV, reject: false });
    return {
      outcome: toOutcome(result),
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    };
  }

  async run(spec: CommandSpec): Promise<ProcessOutcome> {
    const result = await execa(spec.command, spec.args, { env: CHILD_ENV, stdio: 'inherit', reject: false });
    return toOutcome(result);
  }

  launch(spec: CommandSpec): LaunchedProcess {
    const child = execa(spec.command, spec.args, { env: CHILD_ENV, stdio: 'inherit', reject: false });
    return {
      pid: child.pid,
      kill: (signal) => {
        child.kill(signal);
      },
      exited: child.then(toOutcome),
    };
  }
}
