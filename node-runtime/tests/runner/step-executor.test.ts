import { describe, it, expect, vi } from 'vitest';
import { StepExecutor, withTimeout } from '../../src/runner/step-executor.js';
import { Environment } from '../../src/runner/environment.js';
import { MemoryStorage } from '../../src/storage/memory-storage.js';
import type { BrowserDriver } from '../../src/engines/browser-driver.js';
import type { LeafStep, StepOutcome } from '../../src/types/index.js';
import {
  StepExecutionError,
  StepTimeoutError,
  TypeMismatchError,
  UnresolvedReferenceError,
} from '../../src/exception/errors.js';

function mockDriver(overrides: Partial<BrowserDriver> = {}): BrowserDriver {
  return {
    navigate: vi.fn().mockResolvedValue(undefined),
    click: vi.fn().mockResolvedValue(undefined),
    hover: vi.fn().mockResolvedValue(undefined),
    type: vi.fn().mockResolvedValue(undefined),
    wait: vi.fn().mockResolvedValue(undefined),
    waitFor: vi.fn().mockResolvedValue(undefined),
    extract: vi.fn().mockResolvedValue([]),
    getText: vi.fn().mockResolvedValue('text'),
    getAttribute: vi.fn().mockResolvedValue(null),
    evaluate: vi.fn().mockResolvedValue(null),
    executeScript: vi.fn().mockResolvedValue(null),
    setInputFiles: vi.fn().mockResolvedValue(undefined),
    screenshot: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

async function run(
  executor: StepExecutor,
  step: LeafStep,
  env: Environment,
  outcomes: StepOutcome[] = [],
): Promise<unknown> {
  const prepared = executor.prepare(step, env, outcomes);
  return executor.invoke(step, prepared, env);
}

describe('StepExecutor', () => {
  describe('browser actions', () => {
    it('navigates to the resolved URL and returns it', async () => {
      const driver = mockDriver();
      const executor = new StepExecutor(driver, new MemoryStorage());
      const env = new Environment({ page: 2 });

      const value = await run(executor, { name: 'Open', action: 'navigate', value: 'https://example.com/?p={{page}}' }, env);

      expect(driver.navigate).toHaveBeenCalledWith('https://example.com/?p=2');
      expect(value).toBe('https://example.com/?p=2');
    });

    it('clicks and hovers, returning true', async () => {
      const driver = mockDriver();
      const executor = new StepExecutor(driver, new MemoryStorage());
      const env = new Environment({ id: 'go' });

      expect(await run(executor, { name: 'Click', action: 'click', selector: '#{{id}}' }, env)).toBe(true);
      expect(await run(executor, { name: 'Hover', action: 'hover', selector: '.menu' }, env)).toBe(true);
      expect(driver.click).toHaveBeenCalledWith('#go');
      expect(driver.hover).toHaveBeenCalledWith('.menu');
    });

    it('types text and returns it', async () => {
      const driver = mockDriver();
      const executor = new StepExecutor(driver, new MemoryStorage());
      const env = new Environment({ user: 'ada' });

      expect(await run(executor, { name: 'User', action: 'type', selector: '#user', value: '{{user}}@example.com' }, env)).toBe(
        'ada@example.com',
      );
      expect(await run(executor, { name: 'Age', action: 'type', selector: '#age', value: 42 }, env)).toBe('42');
      expect(driver.type).toHaveBeenNthCalledWith(1, '#user', 'ada@example.com');
      expect(driver.type).toHaveBeenNthCalledWith(2, '#age', '42');
    });

    it('waits one second by default and returns the seconds waited', async () => {
      const driver = mockDriver();
      const executor = new StepExecutor(driver, new MemoryStorage());
      const env = new Environment({ delay: '2.5' });

      expect(await run(executor, { name: 'Pause', action: 'wait' }, env)).toBe(1);
      expect(await run(executor, { name: 'Pause more', action: 'wait', value: '{{delay}}' }, env)).toBe(2.5);
      expect(driver.wait).toHaveBeenLastCalledWith(2.5);
    });

    it('rejects a negative resolved wait before calling the driver', () => {
      const executor = new StepExecutor(mockDriver(), new MemoryStorage());
      const env = new Environment({ delay: -1 });
      expect(() => executor.prepare({ name: 'Pause', action: 'wait', value: '{{delay}}' }, env, [])).toThrow(
        TypeMismatchError,
      );
    });

    it('passes the wait_for timeout from the step or the default', async () => {
      const driver = mockDriver();
      const executor = new StepExecutor(driver, new MemoryStorage(), { waitForTimeout: 12 });
      const env = new Environment();

      await run(executor, { name: 'Ready', action: 'wait_for', selector: '#ready' }, env);
      await run(executor, { name: 'Ready soon', action: 'wait_for', selector: '#ready', timeout: 5 }, env);

      expect(driver.waitFor).toHaveBeenNthCalledWith(1, '#ready', 12);
      expect(driver.waitFor).toHaveBeenNthCalledWith(2, '#ready', 5);
    });

    it('extracts records with a resolved field map', async () => {
      const driver = mockDriver({
        extract: vi.fn().mockResolvedValue([{ title: 'First', link: '/a' }]),
      });
      const executor = new StepExecutor(driver, new MemoryStorage());
      const env = new Environment({ attr: 'href' });

      const value = await run(
        executor,
        { name: 'Rows', action: 'extract', selector: '.row', value: { title: 'h2', link: 'a@{{attr}}' } },
        env,
      );

      expect(driver.extract).toHaveBeenCalledWith('.row', { title: 'h2', link: 'a@href' });
      expect(value).toEqual([{ title: 'First', link: '/a' }]);
    });

    it('reads text and attributes', async () => {
      const driver = mockDriver({
        getText: vi.fn().mockResolvedValue('Welcome'),
        getAttribute: vi.fn().mockResolvedValue('/next'),
      });
      const executor = new StepExecutor(driver, new MemoryStorage());
      const env = new Environment();

      expect(await run(executor, { name: 'Heading', action: 'get_text', selector: 'h1' }, env)).toBe('Welcome');
      expect(await run(executor, { name: 'Next', action: 'get_attribute', selector: 'a.next', value: 'href' }, env)).toBe(
        '/next',
      );
      expect(driver.getAttribute).toHaveBeenCalledWith('a.next', 'href');
    });

    it('normalises script results to values', async () => {
      const driver = mockDriver({
        evaluate: vi.fn().mockResolvedValue({ count: 2, missing: undefined }),
        executeScript: vi.fn().mockResolvedValue(Number.NaN),
      });
      const executor = new StepExecutor(driver, new MemoryStorage());
      const env = new Environment();

      expect(await run(executor, { name: 'Count', action: 'evaluate', value: 'document.links.length' }, env)).toEqual({
        count: 2,
      });
      expect(await run(executor, { name: 'Script', action: 'execute_script', value: 'return 0 / 0;' }, env)).toBeNull();
    });

    it('takes a screenshot at the default path', async () => {
      const driver = mockDriver();
      const executor = new StepExecutor(driver, new MemoryStorage());

      expect(await run(executor, { name: 'Snap', action: 'screenshot' }, new Environment())).toBe('screenshot.png');
      expect(driver.screenshot).toHaveBeenCalledWith('screenshot.png');
    });

    it('sets input files from a single path or a list', async () => {
      const driver = mockDriver();
      const executor = new StepExecutor(driver, new MemoryStorage());
      const env = new Environment({ dir: '/tmp/in' });

      await run(executor, { name: 'One', action: 'set_input_files', selector: 'input', value: '{{dir}}/a.txt' }, env);
      await run(executor, { name: 'Two', action: 'set_input_files', selector: 'input', value: ['a.txt', 'b.txt'] }, env);

      expect(driver.setInputFiles).toHaveBeenNthCalledWith(1, 'input', ['/tmp/in/a.txt']);
      expect(driver.setInputFiles).toHaveBeenNthCalledWith(2, 'input', ['a.txt', 'b.txt']);
    });
  });

  describe('storage actions', () => {
    it('saves resolved data and returns the path', async () => {
      const storage = new MemoryStorage();
      const executor = new StepExecutor(mockDriver(), storage);
      const env = new Environment({ rows: [1, 2] });

      const value = await run(executor, { name: 'Save', action: 'save', value: 'out/rows.json', data: '{{rows}}' }, env);

      expect(value).toBe('out/rows.json');
      expect(await storage.load('out/rows.json')).toEqual([1, 2]);
    });

    it('saves the outcomes so far when no data is given', async () => {
      const storage = new MemoryStorage();
      const executor = new StepExecutor(mockDriver(), storage);
      const outcomes: StepOutcome[] = [
        { step: 'Open', action: 'navigate', path: 'steps[0]', status: 'success', attempts: 1, durationMs: 3 },
      ];

      await run(executor, { name: 'Save', action: 'save', value: 'log.json' }, new Environment(), outcomes);

      expect(await storage.load('log.json')).toEqual([
        { step: 'Open', action: 'navigate', path: 'steps[0]', status: 'success', attempts: 1, durationMs: 3 },
      ]);
    });

    it('loads a stored value', async () => {
      const storage = new MemoryStorage();
      await storage.save('seed.json', { ids: [7] });
      const executor = new StepExecutor(mockDriver(), storage);

      expect(await run(executor, { name: 'Load', action: 'load', value: 'seed.json' }, new Environment())).toEqual({
        ids: [7],
      });
    });
  });

  describe('stop', () => {
    it('returns the resolved reason, or null without one', async () => {
      const executor = new StepExecutor(mockDriver(), new MemoryStorage());
      const env = new Environment({ page: 4 });

      expect(await run(executor, { name: 'Done', action: 'stop', value: 'last page {{page}}' }, env)).toBe(
        'last page 4',
      );
      expect(await run(executor, { name: 'Done', action: 'stop' }, env)).toBeNull();
    });
  });

  describe('set_variable', () => {
    it('assigns the resolved value', async () => {
      const executor = new StepExecutor(mockDriver(), new MemoryStorage());
      const env = new Environment({ page: 1 });

      const value = await run(executor, { name: 'Next', action: 'set_variable', selector: 'page', value: '{{page + 1}}' }, env);

      expect(value).toBe(2);
      expect(env.get('page')).toBe(2);
    });

    it('appends and returns the whole sequence', async () => {
      const executor = new StepExecutor(mockDriver(), new MemoryStorage());
      const env = new Environment({ page: 3, pages: [1, 2] });

      const value = await run(
        executor,
        { name: 'Collect', action: 'set_variable', selector: 'pages', value: '{{page}}', append: true },
        env,
      );

      expect(value).toEqual([1, 2, 3]);
      expect(env.get('pages')).toEqual([1, 2, 3]);
    });

    it('rejects a resolved name that is not an identifier', () => {
      const executor = new StepExecutor(mockDriver(), new MemoryStorage());
      const env = new Environment({ target: 'bad-name' });
      expect(() =>
        executor.prepare({ name: 'Set', action: 'set_variable', selector: '{{target}}', value: 1 }, env, []),
      ).toThrow('"bad-name" is not a valid variable name');
    });
  });

  describe('errors', () => {
    it('leaves resolution errors to prepare', () => {
      const driver = mockDriver();
      const executor = new StepExecutor(driver, new MemoryStorage());
      expect(() =>
        executor.prepare({ name: 'Open', action: 'navigate', value: '{{base}}/home' }, new Environment(), []),
      ).toThrow(UnresolvedReferenceError);
      expect(driver.navigate).not.toHaveBeenCalled();
    });

    it('classifies driver errors with the step and selector', async () => {
      const driver = mockDriver({ click: vi.fn().mockRejectedValue(new Error('element is detached')) });
      const executor = new StepExecutor(driver, new MemoryStorage());

      const attempt = run(executor, { name: 'Click', action: 'click', selector: '#go' }, new Environment());

      await expect(attempt).rejects.toBeInstanceOf(StepExecutionError);
      await expect(attempt).rejects.toThrow('[Click @ #go] element is detached');
    });

    it('classifies driver timeouts', async () => {
      const timeout = new Error('Timeout 30000ms exceeded.');
      timeout.name = 'TimeoutError';
      const driver = mockDriver({ waitFor: vi.fn().mockRejectedValue(timeout) });
      const executor = new StepExecutor(driver, new MemoryStorage());

      await expect(
        run(executor, { name: 'Ready', action: 'wait_for', selector: '#ready' }, new Environment()),
      ).rejects.toBeInstanceOf(StepTimeoutError);
    });

    it('bounds the call by the step timeout', async () => {
      const driver = mockDriver({ click: vi.fn().mockReturnValue(new Promise(() => undefined)) });
      const executor = new StepExecutor(driver, new MemoryStorage());

      await expect(
        run(executor, { name: 'Slow', action: 'click', selector: '#slow', timeout: 0.02 }, new Environment()),
      ).rejects.toThrow('Step "Slow" timed out after 0.02s');
    });
  });
});

describe('withTimeout', () => {
  it('resolves with the work when it finishes first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1, 'Fast')).resolves.toBe('done');
  });
});
