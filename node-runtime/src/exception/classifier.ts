import { StepExecutionError, StepTimeoutError, WorkflowError } from './errors.js';

interface ClassifyContext {
  step?: string;
  selector?: string;
}

/**
 * Turn anything a driver or storage call throws into a WorkflowError.
 * Engine errors pass through untouched.
 */
export function classifyError(error: unknown, context: ClassifyContext = {}): WorkflowError {
  if (error instanceof WorkflowError) return error;

  const message = extractMessage(error);
  const detail = describeContext(context);

  if (isTimeout(error, message.toLowerCase())) {
    return new StepTimeoutError(`${detail}${message}`, { cause: error });
  }

  return new StepExecutionError(`${detail}${message}`, { cause: error });
}

function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function describeContext(context: ClassifyContext): string {
  if (context.step && context.selector) return `[${context.step} @ ${context.selector}] `;
  if (context.step) return `[${context.step}] `;
  return '';
}

function isTimeout(error: unknown, text: string): boolean {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return true;
  }
  const patterns = ['timeout', 'timed out', 'exceeded while waiting'];
  return patterns.some((p) => text.includes(p));
}
