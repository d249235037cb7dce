import type { DecisionRecord } from './types/index.js';

export abstract class GateError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Malformed or unserializable threat data
export class InputError extends GateError {
  readonly code = 'INPUT_ERROR';
  readonly statusCode = 422;
}

export class GenerationError extends GateError {
  readonly code: string = 'GENERATION_ERROR';
  readonly statusCode: number = 502;
}

export class GenerationTimeout extends GenerationError {
  override readonly code = 'GENERATION_TIMEOUT';
  override readonly statusCode = 504;

  constructor(readonly timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`);
  }
}

// Destructive recommendation without prior confirmation. The denial has
// already been written to the audit log when this is thrown.
export class ConfirmationRequired extends GateError {
  readonly code = 'CONFIRMATION_REQUIRED';
  readonly statusCode = 400;

  constructor(readonly decision: DecisionRecord) {
    super('Destructive recommendation requires explicit confirmation.');
  }
}

export class AuditWriteError extends GateError {
  readonly code = 'AUDIT_WRITE_ERROR';
  readonly statusCode = 500;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
