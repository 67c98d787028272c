import { resolve } from 'node:path';
import type { ValueMap } from '../types/value.js';
import type { BrowserDriver, FieldMap } from './browser-driver.js';

/** The slice of a playwright-core Page the driver uses. */
export interface PlaywrightPage {
  goto(url: string, options?: { waitUntil?: 'domcontentloaded'; timeout?: number }): Promise<unknown>;
  locator(selector: string): PlaywrightLocator;
  getByTestId(testId: string): PlaywrightLocator;
  getByRole(role: string, options?: { name?: string }): PlaywrightLocator;
  evaluate(script: string): Promise<unknown>;
  screenshot(options: { path: string; fullPage?: boolean }): Promise<Buffer>;
  waitForTimeout(timeout: number): Promise<void>;
}

export interface PlaywrightLocator {
  first(): PlaywrightLocator;
  locator(selector: string): PlaywrightLocator;
  all(): Promise<PlaywrightLocator[]>;
  count(): Promise<number>;
  click(): Promise<void>;
  hover(): Promise<void>;
  fill(value: string): Promise<void>;
  waitFor(options: { state: 'visible'; timeout: number }): Promise<void>;
  textContent(): Promise<string | null>;
  getAttribute(name: string): Promise<string | null>;
  setInputFiles(files: string[]): Promise<void>;
}

export interface PlaywrightDriverOptions {
  /** Seconds allowed for `navigate`. */
  navigationTimeout?: number;
  /** Directory relative screenshot paths are written under. */
  outputDir?: string;
}

function extractTestId(selector: string): string | null {
  const match = selector.match(/\[data-testid=["']([^"']+)["']\]/);
  return match ? match[1] : null;
}

function extractRole(selector: string): { role: string; name?: string } | null {
  const match = selector.match(/^role=(\w+)\[name=["']([^"']+)["']\]$/);
  if (match) return { role: match[1], name: match[2] };
  const simpleMatch = selector.match(/^role=(\w+)$/);
  if (simpleMatch) return { role: simpleMatch[1] };
  return null;
}

export function getLocator(page: PlaywrightPage, selector: string): PlaywrightLocator {
  const testId = extractTestId(selector);
  if (testId) return page.getByTestId(testId);

  const role = extractRole(selector);
  if (role) return page.getByRole(role.role, role.name ? { name: role.name } : undefined);

  return page.locator(selector);
}

/** Split a field spec into its sub-selector and attribute parts. */
export function parseFieldSpec(spec: string): { selector: string; attribute?: string } {
  const at = spec.lastIndexOf('@');
  if (at === -1) return { selector: spec.trim() };
  return { selector: spec.slice(0, at).trim(), attribute: spec.slice(at + 1).trim() };
}

async function readText(locator: PlaywrightLocator): Promise<string> {
  return ((await locator.textContent()) ?? '').trim();
}

async function readField(element: PlaywrightLocator, spec: string): Promise<string | null> {
  const { selector, attribute } = parseFieldSpec(spec);
  let target = element;
  if (selector !== '') {
    const matches = element.locator(selector);
    if ((await matches.count()) === 0) return null;
    target = matches.first();
  }
  return attribute === undefined ? readText(target) : target.getAttribute(attribute);
}

export class PlaywrightDriver implements BrowserDriver {
  private navigationTimeout: number;
  private outputDir: string;

  constructor(
    private page: PlaywrightPage,
    options: PlaywrightDriverOptions = {},
  ) {
    this.navigationTimeout = options.navigationTimeout ?? 30;
    this.outputDir = options.outputDir ?? '.';
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeout * 1000 });
  }

  async click(selector: string): Promise<void> {
    await getLocator(this.page, selector).click();
  }

  async hover(selector: string): Promise<void> {
    await getLocator(this.page, selector).hover();
  }

  async type(selector: string, text: string): Promise<void> {
    await getLocator(this.page, selector).fill(text);
  }

  async wait(seconds: number): Promise<void> {
    await this.page.waitForTimeout(seconds * 1000);
  }

  async waitFor(selector: string, timeoutSeconds: number): Promise<void> {
    await getLocator(this.page, selector).first().waitFor({ state: 'visible', timeout: timeoutSeconds * 1000 });
  }

  async extract(selector: string, fields?: FieldMap): Promise<ValueMap[]> {
    const elements = await getLocator(this.page, selector).all();
    const records: ValueMap[] = [];

    for (const element of elements) {
      if (!fields) {
        records.push({ text: await readText(element) });
        continue;
      }
      const record: ValueMap = {};
      for (const [name, spec] of Object.entries(fields)) {
        record[name] = await readField(element, spec);
      }
      records.push(record);
    }

    return records;
  }

  async getText(selector: string): Promise<string> {
    return readText(getLocator(this.page, selector).first());
  }

  async getAttribute(selector: string, name: string): Promise<string | null> {
    return getLocator(this.page, selector).first().getAttribute(name);
  }

  async evaluate(script: string): Promise<unknown> {
    return this.page.evaluate(script);
  }

  /** Runs `script` as the body of an async function; its `return` value is the result. */
  async executeScript(script: string): Promise<unknown> {
    return this.page.evaluate(`(async () => {\n${script}\n})()`);
  }

  async setInputFiles(selector: string, paths: string[]): Promise<void> {
    await getLocator(this.page, selector).setInputFiles(paths);
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path: resolve(this.outputDir, path), fullPage: true });
  }
}
