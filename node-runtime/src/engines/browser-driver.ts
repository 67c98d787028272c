import type { ValueMap } from '../types/value.js';

/** Field name to sub-selector spec: `"css"`, `"css@attr"`, `"@attr"` or `""`. */
export type FieldMap = Record<string, string>;

export interface BrowserDriver {
  navigate(url: string): Promise<void>;
  click(selector: string): Promise<void>;
  hover(selector: string): Promise<void>;
  type(selector: string, text: string): Promise<void>;
  wait(seconds: number): Promise<void>;
  waitFor(selector: string, timeoutSeconds: number): Promise<void>;
  extract(selector: string, fields?: FieldMap): Promise<ValueMap[]>;
  getText(selector: string): Promise<string>;
  getAttribute(selector: string, name: string): Promise<string | null>;
  evaluate(script: string): Promise<unknown>;
  executeScript(script: string): Promise<unknown>;
  setInputFiles(selector: string, paths: string[]): Promise<void>;
  screenshot(path: string): Promise<void>;
}
