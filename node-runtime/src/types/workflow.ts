import type { Value, ValueMap } from './value.js';

export type ErrorPolicy = 'fail' | 'retry' | 'continue';

export interface RetryConfig {
  max_attempts: number;
  delay_seconds: number;
}

export type ComparisonOperator =
  | 'equals'
  | 'not_equals'
  | 'less_than'
  | 'less_than_or_equals'
  | 'greater_than'
  | 'greater_than_or_equals'
  | 'contains'
  | 'not_contains'
  | 'starts_with'
  | 'ends_with'
  | 'matches'
  | 'exists'
  | 'not_exists';

export interface Comparison {
  operator: ComparisonOperator;
  left: Value;
  right?: Value;
}

export type Condition =
  | Comparison
  | { all: Condition[] }
  | { any: Condition[] }
  | { not: Condition };

export interface WhileLoop {
  type: 'while';
  condition: Condition;
  max_iterations?: number;
}

export interface ForLoop {
  type: 'for';
  variable: string;
  start: number | string;
  end: number | string;
  step?: number | string;
}

export interface ForEachLoop {
  type: 'for_each';
  variable: string;
  items: string | Value[];
}

export interface RepeatLoop {
  type: 'repeat';
  times: number | string;
  variable?: string;
}

export type LoopSpec = WhileLoop | ForLoop | ForEachLoop | RepeatLoop;

interface StepBase {
  name: string;
  description?: string;
  on_error?: ErrorPolicy;
  retry?: RetryConfig;
  /** Upper bound for the collaborator call, in seconds. */
  timeout?: number;
  /** Guard; the step is skipped when it evaluates false. */
  condition?: Condition;
}

export interface NavigateStep extends StepBase {
  action: 'navigate';
  value: string;
}

export interface ClickStep extends StepBase {
  action: 'click';
  selector: string;
}

export interface HoverStep extends StepBase {
  action: 'hover';
  selector: string;
}

export interface TypeStep extends StepBase {
  action: 'type';
  selector: string;
  value: string | number | boolean;
}

export interface WaitStep extends StepBase {
  action: 'wait';
  value?: number | string;
}

export interface WaitForStep extends StepBase {
  action: 'wait_for';
  selector: string;
}

export interface ExtractStep extends StepBase {
  action: 'extract';
  selector: string;
  /** Field name to sub-selector; see BrowserDriver.extract. */
  value?: Record<string, string>;
}

export interface GetTextStep extends StepBase {
  action: 'get_text';
  selector: string;
}

export interface GetAttributeStep extends StepBase {
  action: 'get_attribute';
  selector: string;
  value: string;
}

export interface EvaluateStep extends StepBase {
  action: 'evaluate';
  value: string;
}

export interface ExecuteScriptStep extends StepBase {
  action: 'execute_script';
  value: string;
}

export interface ScreenshotStep extends StepBase {
  action: 'screenshot';
  value?: string;
}

export interface SaveStep extends StepBase {
  action: 'save';
  value: string;
  data?: Value;
}

export interface LoadStep extends StepBase {
  action: 'load';
  value: string;
}

export interface SetVariableStep extends StepBase {
  action: 'set_variable';
  selector: string;
  value: Value;
  append?: boolean;
}

export interface SetInputFilesStep extends StepBase {
  action: 'set_input_files';
  selector: string;
  value: string | string[];
}

/** Ends the run early with status `completed`. */
export interface StopStep extends StepBase {
  action: 'stop';
  /** Reason, logged and recorded as the step's value. */
  value?: string;
}

export interface IfStep extends StepBase {
  action: 'if';
  value: Condition;
  steps: Step[];
  else_steps?: Step[];
}

export interface LoopStep extends StepBase {
  action: 'loop';
  value: LoopSpec;
  steps: Step[];
}

export type LeafStep =
  | NavigateStep
  | ClickStep
  | HoverStep
  | TypeStep
  | WaitStep
  | WaitForStep
  | ExtractStep
  | GetTextStep
  | GetAttributeStep
  | EvaluateStep
  | ExecuteScriptStep
  | ScreenshotStep
  | SaveStep
  | LoadStep
  | SetVariableStep
  | SetInputFilesStep
  | StopStep;

export type ControlStep = IfStep | LoopStep;

/** Leaf steps whose value is bound under a result key. */
export type BindingStep = Exclude<LeafStep, StopStep>;

export type Step = LeafStep | ControlStep;

export type ActionKind = Step['action'];

export interface Workflow {
  name: string;
  version: string;
  description?: string;
  variables?: ValueMap;
  steps: Step[];
}

export function isControlStep(step: Step): step is ControlStep {
  return step.action === 'if' || step.action === 'loop';
}

export function bindsResult(step: Step): step is BindingStep {
  return !isControlStep(step) && step.action !== 'stop';
}

export function isComparison(condition: Condition): condition is Comparison {
  return 'operator' in condition;
}
