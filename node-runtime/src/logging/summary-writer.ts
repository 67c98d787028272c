import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionResult, RunStatus } from '../types/step-result.js';

const RESULT_LABELS: Record<RunStatus, string> = {
  completed: 'Completed',
  failed: 'Failed',
  cancelled: 'Cancelled',
};

/**
 * Write a human-readable `summary.md` for a finished run.
 */
export async function writeSummary(runDir: string, result: ExecutionResult): Promise<void> {
  await writeFile(join(runDir, 'summary.md'), buildSummaryMarkdown(result), 'utf-8');
}

export function buildSummaryMarkdown(result: ExecutionResult): string {
  const executed = result.outcomes.filter((o) => o.status !== 'skipped');
  const passed = executed.filter((o) => o.status === 'success' || o.status === 'retried').length;
  const skipped = result.outcomes.length - executed.length;
  const failures = result.outcomes.filter((o) => o.status === 'failed');

  const lines: string[] = [
    '# Run Summary',
    `- Workflow: ${result.workflow} (version ${result.version})`,
    `- Result: ${RESULT_LABELS[result.status]}`,
    `- Duration: ${formatDuration(result.durationMs)}`,
    `- Steps: ${passed}/${executed.length} passed, ${skipped} skipped`,
  ];

  if (result.error) {
    lines.push(`- Error: ${result.error.kind} - ${result.error.message}`);
  }

  lines.push('');
  lines.push('## Failed Steps');
  if (failures.length === 0) {
    lines.push('- None');
  }
  failures.forEach((outcome, index) => {
    const detail = outcome.error ? `${outcome.error.kind} - ${outcome.error.message}` : 'no details';
    lines.push(`${index + 1}. ${outcome.path} "${outcome.step}": ${detail}`);
  });

  const names = Object.keys(result.variables);
  lines.push('');
  lines.push('## Variables');
  if (names.length === 0) {
    lines.push('- None');
  }
  for (const name of names) {
    lines.push(`- ${name}: ${JSON.stringify(result.variables[name])}`);
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${result.runId}`);
  lines.push(`- Started at: ${result.startedAt}`);

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
