export * from './value.js';
export * from './workflow.js';
export type * from './step-result.js';
