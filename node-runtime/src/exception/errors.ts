import type { ErrorInfo, ErrorKind } from '../types/step-result.js';

export abstract class WorkflowError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message };
  }
}

export class ValidationError extends WorkflowError {
  readonly kind = 'ValidationError';

  constructor(readonly issues: string[]) {
    super(`Invalid workflow document:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
  }
}

/** A template referenced a variable or property that is not bound. */
export class UnresolvedReferenceError extends WorkflowError {
  readonly kind = 'ReferenceError';

  constructor(readonly reference: string) {
    super(`Unresolved reference "${reference}"`);
  }
}

export class TypeMismatchError extends WorkflowError {
  readonly kind = 'TypeMismatchError';
}

export class TemplateSyntaxError extends WorkflowError {
  readonly kind = 'TemplateSyntaxError';

  constructor(
    readonly template: string,
    detail: string,
  ) {
    super(`Invalid template "${template}": ${detail}`);
  }
}

export class StepExecutionError extends WorkflowError {
  readonly kind = 'StepExecutionError';
}

export class StepTimeoutError extends WorkflowError {
  readonly kind = 'TimeoutError';
}

export class RetryExhaustedError extends WorkflowError {
  readonly kind = 'RetryExhaustedError';

  constructor(
    readonly stepName: string,
    readonly attempts: number,
    lastError: WorkflowError,
  ) {
    super(`Step "${stepName}" failed after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
  }
}

export class CancelledError extends WorkflowError {
  readonly kind = 'Cancelled';

  constructor(reason?: unknown) {
    super(reason instanceof Error ? reason.message : 'Workflow run was cancelled', { cause: reason });
  }
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof WorkflowError) return error.toInfo();
  return {
    kind: 'StepExecutionError',
    message: error instanceof Error ? error.message : String(error),
  };
}
