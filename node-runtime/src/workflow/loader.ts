import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as yaml from 'js-yaml';
import { ValidationError } from '../exception/errors.js';
import { validateWorkflow, type ValidatedWorkflow } from './validator.js';

export type DocumentFormat = 'json' | 'yaml';

export function formatFromPath(path: string): DocumentFormat {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

/** Parse document text without validating it. Syntax errors become a ValidationError. */
export function parseDocument(text: string, format: DocumentFormat, source = 'workflow'): unknown {
  try {
    if (format === 'yaml') {
      return yaml.load(text, { filename: source });
    }
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError([`${source}: cannot parse ${format.toUpperCase()}: ${message}`]);
  }
}

export function parseWorkflow(text: string, format: DocumentFormat, source?: string): ValidatedWorkflow {
  return validateWorkflow(parseDocument(text, format, source));
}

export async function loadWorkflow(path: string): Promise<ValidatedWorkflow> {
  const text = await readFile(path, 'utf-8');
  return parseWorkflow(text, formatFromPath(path), path);
}
