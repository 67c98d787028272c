import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  RetryExhaustedError,
  StepExecutionError,
  TemplateSyntaxError,
  UnresolvedReferenceError,
  ValidationError,
  toErrorInfo,
} from '../../src/exception/errors.js';

describe('workflow errors', () => {
  it('name themselves after their class', () => {
    expect(new UnresolvedReferenceError('user.name').name).toBe('UnresolvedReferenceError');
    expect(new StepExecutionError('x').name).toBe('StepExecutionError');
  });

  it('list every validation issue in the message', () => {
    const error = new ValidationError(['name: Required', 'steps: Required']);
    expect(error.message).toBe('Invalid workflow document:\n  - name: Required\n  - steps: Required');
    expect(error.toInfo()).toEqual({ kind: 'ValidationError', message: error.message });
  });

  it('describe template syntax errors with the template', () => {
    expect(new TemplateSyntaxError('{{a', 'unterminated placeholder at 0').message).toBe(
      'Invalid template "{{a": unterminated placeholder at 0',
    );
  });

  it('chain the last failure into RetryExhaustedError', () => {
    const last = new StepExecutionError('[Submit] detached');
    const error = new RetryExhaustedError('Submit', 3, last);
    expect(error.message).toBe('Step "Submit" failed after 3 attempts: [Submit] detached');
    expect(error.cause).toBe(last);
    expect(error.attempts).toBe(3);
  });

  it('take the cancellation reason when it is an Error', () => {
    expect(new CancelledError(new Error('Interrupted')).message).toBe('Interrupted');
    expect(new CancelledError('timeout').message).toBe('Workflow run was cancelled');
    expect(new CancelledError().kind).toBe('Cancelled');
  });
});

describe('toErrorInfo', () => {
  it('uses the kind of workflow errors', () => {
    expect(toErrorInfo(new UnresolvedReferenceError('x'))).toEqual({
      kind: 'ReferenceError',
      message: 'Unresolved reference "x"',
    });
  });

  it('treats anything else as a step failure', () => {
    expect(toErrorInfo(new Error('boom'))).toEqual({ kind: 'StepExecutionError', message: 'boom' });
    expect(toErrorInfo('boom')).toEqual({ kind: 'StepExecutionError', message: 'boom' });
  });
});
