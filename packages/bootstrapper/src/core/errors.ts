import type { ProcessOutcome } from './process-runner.js';
import { describeOutcome } from './process-runner.js';

export type BootStep = 'config' | 'diagnose' | 'check-cache' | 'ingest-lock' | 'ingest' | 'serve';

export class BootError extends Error {
  readonly step: BootStep;

  constructor(step: BootStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BootError';
    this.step = step;
  }
}

export class ConfigError extends BootError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class DiagnosticError extends BootError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('diagnose', message, options);
    this.name = 'DiagnosticError';
  }
}

export class IngestionError extends BootError {
  readonly outcome: ProcessOutcome;

  constructor(outcome: ProcessOutcome) {
    super('ingest', `Ingestion did not succeed (${describeOutcome(outcome)})`);
    this.name = 'IngestionError';
    this.outcome = outcome;
  }
}

export class HandoffError extends BootError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('serve', message, options);
    this.name = 'HandoffError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
