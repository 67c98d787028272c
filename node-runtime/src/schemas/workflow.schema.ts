import { z } from 'zod';
import type { Value } from '../types/value.js';
import type { ComparisonOperator, Condition, LoopSpec, Step, Workflow } from '../types/workflow.js';

export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(ValueSchema), z.record(ValueSchema)]),
);

const OPERATOR_ALIASES: Record<string, ComparisonOperator> = {
  '==': 'equals',
  '!=': 'not_equals',
  '<': 'less_than',
  '<=': 'less_than_or_equals',
  '>': 'greater_than',
  '>=': 'greater_than_or_equals',
};

const OPERATORS = [
  'equals',
  'not_equals',
  'less_than',
  'less_than_or_equals',
  'greater_than',
  'greater_than_or_equals',
  'contains',
  'not_contains',
  'starts_with',
  'ends_with',
  'matches',
  'exists',
  'not_exists',
] as const satisfies readonly ComparisonOperator[];

const UNARY_OPERATORS: ReadonlySet<ComparisonOperator> = new Set(['exists', 'not_exists']);

export const OperatorSchema = z.preprocess(
  (raw) => (typeof raw === 'string' ? (OPERATOR_ALIASES[raw] ?? raw) : raw),
  z.enum(OPERATORS),
);

export const ComparisonSchema = z
  .object({
    operator: OperatorSchema,
    left: ValueSchema,
    right: ValueSchema.optional(),
  })
  .strict()
  .superRefine((comparison, ctx) => {
    if (!UNARY_OPERATORS.has(comparison.operator) && comparison.right === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['right'],
        message: `Operator "${comparison.operator}" requires a right operand`,
      });
    }
  });

export const ConditionSchema: z.ZodType<Condition, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    ComparisonSchema,
    z.object({ all: z.array(ConditionSchema).min(1) }).strict(),
    z.object({ any: z.array(ConditionSchema).min(1) }).strict(),
    z.object({ not: ConditionSchema }).strict(),
  ]),
);

const NumberOrTemplate = z.union([z.number(), z.string().min(1)]);
const VariableName = z.string().min(1);

export const LoopSpecSchema: z.ZodType<LoopSpec, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('while'),
      condition: ConditionSchema,
      max_iterations: z.number().int().positive().optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('for'),
      variable: VariableName,
      start: NumberOrTemplate,
      end: NumberOrTemplate,
      step: NumberOrTemplate.optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('for_each'),
      variable: VariableName,
      items: z.union([z.string().min(1), z.array(ValueSchema)]),
    })
    .strict(),
  z
    .object({
      type: z.literal('repeat'),
      times: NumberOrTemplate,
      variable: VariableName.optional(),
    })
    .strict(),
]);

// Longest delay a Node timer honours, in whole seconds.
const MAX_TIMER_SECONDS = 2_147_483;

export const RetryConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1),
    delay_seconds: z.number().min(0).max(MAX_TIMER_SECONDS),
  })
  .strict();

const stepBase = {
  name: z.string().trim().min(1),
  description: z.string().optional(),
  on_error: z.enum(['fail', 'retry', 'continue']).optional(),
  retry: RetryConfigSchema.optional(),
  timeout: z.number().positive().max(MAX_TIMER_SECONDS).optional(),
  condition: ConditionSchema.optional(),
};

const Selector = z.string().min(1);
const Text = z.string().min(1);
const StepListSchema = z.array(z.lazy(() => StepSchema));

export const StepSchema: z.ZodType<Step, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('action', [
    z.object({ ...stepBase, action: z.literal('navigate'), value: Text }).strict(),
    z.object({ ...stepBase, action: z.literal('click'), selector: Selector }).strict(),
    z.object({ ...stepBase, action: z.literal('hover'), selector: Selector }).strict(),
    z
      .object({
        ...stepBase,
        action: z.literal('type'),
        selector: Selector,
        value: z.union([z.string(), z.number(), z.boolean()]),
      })
      .strict(),
    z.object({ ...stepBase, action: z.literal('wait'), value: NumberOrTemplate.optional() }).strict(),
    z.object({ ...stepBase, action: z.literal('wait_for'), selector: Selector }).strict(),
    z
      .object({
        ...stepBase,
        action: z.literal('extract'),
        selector: Selector,
        value: z.record(z.string()).optional(),
      })
      .strict(),
    z.object({ ...stepBase, action: z.literal('get_text'), selector: Selector }).strict(),
    z.object({ ...stepBase, action: z.literal('get_attribute'), selector: Selector, value: Text }).strict(),
    z.object({ ...stepBase, action: z.literal('evaluate'), value: Text }).strict(),
    z.object({ ...stepBase, action: z.literal('execute_script'), value: Text }).strict(),
    z.object({ ...stepBase, action: z.literal('screenshot'), value: Text.optional() }).strict(),
    z.object({ ...stepBase, action: z.literal('save'), value: Text, data: ValueSchema.optional() }).strict(),
    z.object({ ...stepBase, action: z.literal('load'), value: Text }).strict(),
    z
      .object({
        ...stepBase,
        action: z.literal('set_variable'),
        selector: Selector,
        value: ValueSchema,
        append: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        ...stepBase,
        action: z.literal('set_input_files'),
        selector: Selector,
        value: z.union([Text, z.array(Text).min(1)]),
      })
      .strict(),
    z.object({ ...stepBase, action: z.literal('stop'), value: Text.optional() }).strict(),
    z
      .object({
        ...stepBase,
        action: z.literal('if'),
        value: ConditionSchema,
        steps: StepListSchema.min(1),
        else_steps: StepListSchema.optional(),
      })
      .strict(),
    z
      .object({
        ...stepBase,
        action: z.literal('loop'),
        value: LoopSpecSchema,
        steps: StepListSchema.min(1),
      })
      .strict(),
  ]),
);

export const WorkflowSchema: z.ZodType<Workflow, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string().trim().min(1),
    version: z.union([z.string().trim().min(1), z.number().transform((v) => String(v))]),
    description: z.string().optional(),
    variables: z.record(ValueSchema).optional(),
    steps: z.array(StepSchema).min(1),
  })
  .strict();
