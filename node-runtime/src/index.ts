export * from './types/index.js';
export * from './exception/errors.js';
export { classifyError } from './exception/classifier.js';
export { createLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from './logging/logger.js';
export { RunLogger } from './logging/run-logger.js';
export { buildSummaryMarkdown, writeSummary } from './logging/summary-writer.js';
export { loadConfig, ConfigError, type AppConfig } from './config/env.js';
export type { BrowserDriver, FieldMap } from './engines/browser-driver.js';
export { PlaywrightDriver, type PlaywrightPage, type PlaywrightLocator } from './engines/playwright-driver.js';
export { openBrowserSession, type BrowserSession, type SessionOptions } from './engines/browser-session.js';
export { WorkflowSchema, StepSchema, ConditionSchema, LoopSpecSchema } from './schemas/index.js';
export type { WorkflowStorage } from './storage/workflow-storage.js';
export { JsonFileStorage } from './storage/json-file-storage.js';
export { MemoryStorage } from './storage/memory-storage.js';
export { Environment } from './runner/environment.js';
export { deriveResultKey, normalizeIdentifier } from './runner/result-binder.js';
export { WorkflowRunner, type RunOptions, type WorkflowRunnerOptions } from './runner/workflow-runner.js';
export { resolveTemplate, resolveValue, interpolate } from './workflow/template.js';
export { evaluateCondition } from './workflow/condition.js';
export { validateWorkflow, type ValidatedWorkflow } from './workflow/validator.js';
export { loadWorkflow, parseWorkflow, parseDocument, type DocumentFormat } from './workflow/loader.js';
