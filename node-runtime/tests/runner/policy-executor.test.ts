import { describe, it, expect, vi } from 'vitest';
import { PolicyExecutor } from '../../src/runner/policy-executor.js';
import { UnresolvedReferenceError } from '../../src/exception/errors.js';
import { createLogger } from '../../src/logging/logger.js';
import type { ClickStep } from '../../src/types/index.js';

function clickStep(overrides: Partial<ClickStep> = {}): ClickStep {
  return { name: 'Click submit', action: 'click', selector: '#submit', ...overrides };
}

function prepare(): string {
  return '#submit';
}

describe('PolicyExecutor', () => {
  it('reports success on the first attempt', async () => {
    const executor = new PolicyExecutor();
    const invoke = vi.fn().mockResolvedValue(true);

    const result = await executor.execute(clickStep(), prepare, invoke);

    expect(result).toEqual({ status: 'success', attempts: 1, value: true, abort: false });
    expect(invoke).toHaveBeenCalledWith('#submit');
  });

  it('makes one attempt and aborts under fail', async () => {
    const executor = new PolicyExecutor();
    const invoke = vi.fn().mockRejectedValue(new Error('boom'));

    const result = await executor.execute(clickStep(), prepare, invoke);

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(result.status).toBe('failed');
    expect(result.abort).toBe(true);
    expect(result.status === 'failed' && result.error.kind).toBe('StepExecutionError');
  });

  it('records the failure and carries on under continue', async () => {
    const lines: string[] = [];
    const executor = new PolicyExecutor({ logger: createLogger({ sink: (line) => lines.push(line) }) });
    const invoke = vi.fn().mockRejectedValue(new Error('boom'));

    const result = await executor.execute(clickStep({ on_error: 'continue' }), prepare, invoke);

    expect(result).toMatchObject({ status: 'failed', attempts: 1, value: null, abort: false });
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'warn', message: 'Step failed, continuing', step: 'Click submit' });
  });

  it('retries up to max_attempts, sleeping between attempts only', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const executor = new PolicyExecutor({ sleep });
    const invoke = vi.fn().mockRejectedValue(new Error('boom'));

    const result = await executor.execute(
      clickStep({ on_error: 'retry', retry: { max_attempts: 3, delay_seconds: 2 } }),
      prepare,
      invoke,
    );

    expect(invoke).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(result.status).toBe('failed');
    expect(result.attempts).toBe(3);
    expect(result.abort).toBe(true);
    if (result.status !== 'failed') throw new Error('expected a failure');
    expect(result.error.kind).toBe('RetryExhaustedError');
    expect(result.error.message).toBe('Step "Click submit" failed after 3 attempts: [Click submit] boom');
    expect(result.error.cause).toMatchObject({ kind: 'StepExecutionError' });
  });

  it('reports retried when a later attempt succeeds', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const executor = new PolicyExecutor({ sleep });
    const invoke = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('ok');

    const result = await executor.execute(clickStep({ on_error: 'retry' }), prepare, invoke);

    expect(result).toEqual({ status: 'retried', attempts: 2, value: 'ok', abort: false });
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('uses the configured default retry settings', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const executor = new PolicyExecutor({ sleep, defaultRetry: { max_attempts: 2, delay_seconds: 0 } });
    const invoke = vi.fn().mockRejectedValue(new Error('boom'));

    const result = await executor.execute(clickStep({ on_error: 'retry' }), prepare, invoke);

    expect(invoke).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(0);
    expect(result.attempts).toBe(2);
  });

  it('never retries resolution errors', async () => {
    const executor = new PolicyExecutor({ sleep: vi.fn().mockResolvedValue(undefined) });
    const invoke = vi.fn();
    const failingPrepare = (): string => {
      throw new UnresolvedReferenceError('target');
    };

    const result = await executor.execute(clickStep({ on_error: 'retry' }), failingPrepare, invoke);

    expect(invoke).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: 'failed', attempts: 0, abort: true });
    expect(result.status === 'failed' && result.error.kind).toBe('ReferenceError');
  });

  it('records resolution errors without aborting under continue', async () => {
    const executor = new PolicyExecutor();
    const failingPrepare = (): string => {
      throw new UnresolvedReferenceError('target');
    };

    const result = await executor.execute(clickStep({ on_error: 'continue' }), failingPrepare, vi.fn());

    expect(result).toMatchObject({ status: 'failed', attempts: 0, value: null, abort: false });
  });

  it('stops retrying once the run is cancelled', async () => {
    const controller = new AbortController();
    const sleep = vi.fn().mockResolvedValue(undefined);
    const executor = new PolicyExecutor({ sleep });
    const invoke = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error('boom');
    });

    const result = await executor.execute(clickStep({ on_error: 'retry' }), prepare, invoke, controller.signal);

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: 'failed', attempts: 1, abort: true });
    expect(result.status === 'failed' && result.error.kind).toBe('StepExecutionError');
  });
});
