import { BootError, getErrorMessage, type BootStep } from './errors.js';
import type { Logger } from './logger.js';

export const StepPolicy = {
  Continue: 'continue',
  Abort: 'abort',
} as const;

export type StepPolicy = (typeof StepPolicy)[keyof typeof StepPolicy];

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface StepOptions {
  step: BootStep;
  policy: StepPolicy;
  /** Log message used when the step fails; defaults to one naming the step. */
  failureMessage?: string;
}

/**
 * Runs one boot phase under its declared error policy.
 *
 * Continue logs a warning and reports the failure as a value. Abort logs an
 * error and rethrows, wrapping anything that is not already a BootError.
 */
export function runStep<T>(
  options: StepOptions & { policy: typeof StepPolicy.Abort },
  fn: () => Promise<T>,
  log: Logger,
): Promise<{ ok: true; value: T }>;
export function runStep<T>(options: StepOptions, fn: () => Promise<T>, log: Logger): Promise<StepResult<T>>;
export async function runStep<T>(options: StepOptions, fn: () => Promise<T>, log: Logger): Promise<StepResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    if (options.policy === StepPolicy.Abort) {
      log.error(options.failureMessage ?? `Step ${options.step} failed, aborting startup`, {
        step: options.step,
        error,
      });
      throw error instanceof BootError ? error : new BootError(options.step, getErrorMessage(error), { cause: error });
    }
    log.warn(options.failureMessage ?? `Step ${options.step} failed (continue anyway)`, {
      step: options.step,
      error,
    });
    return { ok: false, error };
  }
}
