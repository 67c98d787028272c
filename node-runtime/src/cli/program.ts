import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { Command } from 'commander';
import { loadConfig } from '../config/env.js';
import { openBrowserSession, type BrowserSession, type SessionOptions } from '../engines/browser-session.js';
import { ValidationError } from '../exception/errors.js';
import { createLogger } from '../logging/logger.js';
import { RunLogger } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { WorkflowRunner } from '../runner/workflow-runner.js';
import { JsonFileStorage } from '../storage/json-file-storage.js';
import type { WorkflowStorage } from '../storage/workflow-storage.js';
import type { ValueMap } from '../types/value.js';
import type { Workflow } from '../types/workflow.js';
import { loadWorkflow } from '../workflow/loader.js';
import { collectVar, parseNameList } from './vars.js';

export const VERSION = '0.1.0';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  openSession?: (options: SessionOptions) => Promise<BrowserSession>;
  createStorage?: (dir: string) => WorkflowStorage;
  setExitCode?: (code: number) => void;
  /** Register an interrupt handler; returns its unregister function. */
  onInterrupt?: (handler: () => void) => () => void;
}

interface RunFlags {
  var?: ValueMap;
  export?: string[];
  storageDir?: string;
  runDir?: string;
  headed?: boolean;
}

const processInterrupt = (handler: () => void): (() => void) => {
  process.once('SIGINT', handler);
  return () => {
    process.off('SIGINT', handler);
  };
};

export function buildProgram(deps: CliDeps = {}): Command {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(line + '\n'));
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(line + '\n'));
  const openSession = deps.openSession ?? openBrowserSession;
  const createStorage = deps.createStorage ?? ((dir: string) => new JsonFileStorage(dir));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const onInterrupt = deps.onInterrupt ?? processInterrupt;

  const emit = (event: string, payload: Record<string, unknown>): void => {
    stdout(JSON.stringify({ event, timestamp: new Date().toISOString(), ...payload }));
  };

  const reportInvalid = (file: string, error: ValidationError): void => {
    stderr(`${file} is invalid:`);
    for (const issue of error.issues) stderr(`  - ${issue}`);
    setExitCode(1);
  };

  const program = new Command();

  program
    .name('stepwise')
    .description('Run declarative browser workflows')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout(text.trimEnd()),
      writeErr: (text) => stderr(text.trimEnd()),
    });

  program
    .command('validate')
    .description('Check a workflow document without running it')
    .argument('<file>', 'workflow document (.json, .yaml or .yml)')
    .action(async (file: string) => {
      try {
        const { warnings } = await loadWorkflow(file);
        stdout('valid');
        for (const warning of warnings) stdout(`warning: ${warning}`);
        setExitCode(0);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        reportInvalid(file, error);
      }
    });

  program
    .command('run')
    .description('Execute a workflow and stream step events as JSON lines')
    .argument('<file>', 'workflow document (.json, .yaml or .yml)')
    .option('--var <name=value>', 'override a workflow variable (repeatable; JSON values are parsed)', collectVar)
    .option('--export <names>', 'comma-separated variables to include in the result', parseNameList)
    .option('--storage-dir <dir>', 'directory for save/load and screenshots')
    .option('--run-dir <dir>', 'write outcomes.jsonl, result.json and summary.md under this directory')
    .option('--headed', 'show the browser window')
    .action(async (file: string, flags: RunFlags) => {
      const config = loadConfig(env);
      const logger = createLogger({ level: config.logLevel, sink: stderr });

      let document: Workflow;
      try {
        document = (await loadWorkflow(file)).workflow;
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        reportInvalid(file, error);
        return;
      }

      const storageDir = flags.storageDir ?? config.storageDir;
      const runDir = flags.runDir ?? config.runDir;
      const runId = randomUUID();
      const runLogger = runDir ? new RunLogger(join(runDir, runId)) : undefined;

      const session = await openSession({
        headless: flags.headed ? false : config.browser.headless,
        navigationTimeout: config.browser.navigationTimeout,
        outputDir: storageDir,
      });

      const controller = new AbortController();
      const unregister = onInterrupt(() => {
        logger.warn('Interrupt received, stopping after the current step');
        controller.abort(new Error('Interrupted'));
      });

      try {
        const runner = new WorkflowRunner(session.driver, createStorage(storageDir), {
          logger,
          defaultRetry: config.retry,
          waitForTimeout: config.waitForTimeout,
        });

        emit('run_start', { runId, workflow: document.name, version: document.version });

        const result = await runner.run(document, {
          runId,
          variables: flags.var,
          exportVariables: flags.export,
          signal: controller.signal,
          onOutcome: (outcome) => emit('step_end', { ...outcome }),
        });

        emit('run_complete', {
          runId,
          status: result.status,
          durationMs: result.durationMs,
          error: result.error,
          variables: result.variables,
        });

        if (runLogger) {
          for (const outcome of result.outcomes) await runLogger.logOutcome(outcome);
          await runLogger.saveResult(result);
          await writeSummary(runLogger.getRunDir(), result);
        }

        setExitCode(result.status === 'completed' ? 0 : 1);
      } finally {
        unregister();
        await session.close();
      }
    });

  return program;
}
