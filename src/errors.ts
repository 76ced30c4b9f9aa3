import type { ErrorContext, StepResult } from './types.js';

export type ErrorKind =
  | 'syntax'
  | 'evaluation'
  | 'config'
  | 'process_exit'
  | 'process_spawn'
  | 'io'
  | 'timeout'
  | 'cancelled'
  | 'recovery';

/**
 * Base class for every failure the engine raises. `kind` is the
 * machine-readable discriminator that ends up in `_meta.error.type`.
 */
export class EngineError extends Error {
  readonly kind: ErrorKind;
  stepId?: string;

  constructor(kind: ErrorKind, message: string, options: { stepId?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'EngineError';
    this.kind = kind;
    this.stepId = options.stepId;
  }

  toContext(): ErrorContext {
    return { step_id: this.stepId ?? '', type: this.kind, message: this.message };
  }
}

/** Raised by the expression evaluator and the template renderer. */
export abstract class ExpressionError extends EngineError {}

export class ExpressionSyntaxError extends ExpressionError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('syntax', message, options);
    this.name = 'ExpressionSyntaxError';
  }
}

/** Unresolved name, type mismatch or forbidden construct. */
export class EvaluationError extends ExpressionError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('evaluation', message, options);
    this.name = 'EvaluationError';
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, options: { stepId?: string; cause?: unknown } = {}) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

export class ProcessExitError extends EngineError {
  constructor(stepId: string, readonly exitCode: number) {
    super('process_exit', `Step ${stepId} failed with exit code ${exitCode}`, { stepId });
    this.name = 'ProcessExitError';
  }
}

export class ProcessSpawnError extends EngineError {
  constructor(stepId: string, program: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('process_spawn', `Step ${stepId} could not start ${program}: ${reason}`, { stepId, cause });
    this.name = 'ProcessSpawnError';
  }
}

export class IoError extends EngineError {
  constructor(message: string, options: { stepId?: string; cause?: unknown } = {}) {
    super('io', message, options);
    this.name = 'IoError';
  }
}

export class StepTimeoutError extends EngineError {
  constructor(stepId: string, readonly timeoutMs: number, readonly partial?: StepResult) {
    super('timeout', `Step ${stepId} timed out after ${timeoutMs} ms`, { stepId });
    this.name = 'StepTimeoutError';
  }
}

export class CancelledError extends EngineError {
  readonly partial?: StepResult;

  constructor(options: { stepId?: string; partial?: StepResult } = {}) {
    super('cancelled', 'Action was stopped by user', { stepId: options.stepId });
    this.name = 'CancelledError';
    this.partial = options.partial;
  }
}

/** The primary pipeline failed and so did its `on_error` pipeline. */
export class RecoveryError extends EngineError {
  constructor(readonly primary: ErrorContext, readonly recovery: ErrorContext, options: { cause?: unknown } = {}) {
    super(
      'recovery',
      `Step ${primary.step_id} failed (${primary.type}: ${primary.message}); ` +
        `recovery step ${recovery.step_id} failed (${recovery.type}: ${recovery.message})`,
      { stepId: primary.step_id, cause: options.cause }
    );
    this.name = 'RecoveryError';
  }
}

/** Step results an error carries when the process ran before it failed. */
export function partialResultOf(error: EngineError): StepResult | undefined {
  if (error instanceof StepTimeoutError || error instanceof CancelledError) return error.partial;
  return undefined;
}

/**
 * Normalize anything thrown inside a step into an EngineError stamped with
 * the step it escaped from.
 */
export function asEngineError(error: unknown, stepId: string): EngineError {
  const engineError =
    error instanceof EngineError
      ? error
      : new IoError(error instanceof Error ? error.message : String(error), { cause: error });
  if (!engineError.stepId && stepId) engineError.stepId = stepId;
  return engineError;
}
