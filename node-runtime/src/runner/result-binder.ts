import type { Value } from '../types/value.js';
import type { BindingStep, Step } from '../types/workflow.js';
import type { Environment } from './environment.js';

export function normalizeIdentifier(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Name under which a step's result is bound.
 *
 * The step name wins. When it normalises to nothing (e.g. "!!!"), the action
 * and selector are used instead, then the bare action. Keys that would start
 * with a digit get a `step_` prefix so templates can reference them.
 *
 *   "Get Title"              -> get_title
 *   "2nd page"               -> step_2nd_page
 *   "--" + click "#submit"   -> click_submit
 */
export function deriveResultKey(step: Pick<Step, 'name' | 'action'> & { selector?: string }): string {
  const key =
    normalizeIdentifier(step.name) ||
    normalizeIdentifier(`${step.action} ${step.selector ?? ''}`) ||
    step.action;
  return /^[0-9]/.test(key) ? `step_${key}` : key;
}

export class ResultBinder {
  constructor(private env: Environment) {}

  bind(step: BindingStep, value: Value): string {
    const key = deriveResultKey(step);
    this.env.set(key, value);
    return key;
  }
}
