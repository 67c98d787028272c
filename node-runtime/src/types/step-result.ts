import type { ActionKind } from './workflow.js';
import type { ValueMap } from './value.js';

export type ErrorKind =
  | 'ValidationError'
  | 'ReferenceError'
  | 'TypeMismatchError'
  | 'TemplateSyntaxError'
  | 'StepExecutionError'
  | 'TimeoutError'
  | 'RetryExhaustedError'
  | 'Cancelled';

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
}

export type StepStatus = 'success' | 'retried' | 'skipped' | 'failed';

export interface StepOutcome {
  step: string;
  action: ActionKind;
  /** Position in the document, e.g. `steps[2].steps[0]`. */
  path: string;
  status: StepStatus;
  attempts: number;
  durationMs: number;
  resultKey?: string;
  error?: ErrorInfo;
}

export type RunStatus = 'completed' | 'failed' | 'cancelled';

export interface ExecutionResult {
  runId: string;
  workflow: string;
  version: string;
  status: RunStatus;
  variables: ValueMap;
  outcomes: StepOutcome[];
  error?: ErrorInfo;
  startedAt: string;
  durationMs: number;
}
