/**
 * ABOUTME: Audit trail persistence.
 * Appends iteration records to .loopbench/iterations.jsonl, writes the
 * human-readable iteration logs, the commit-record log and the run summary,
 * and reads all of them back for status, logs and replay.
 */

import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { LoopbenchError, errorMessage } from '../errors.js';
import { writeJsonAtomic } from '../utils/atomic-write.js';
import { formatDuration } from '../utils/logger.js';
import {
  COMMITS_FILE,
  ITERATIONS_DIR,
  RECORDS_FILE,
  SUMMARY_FILE,
  getControlPath,
} from '../workspace/paths.js';
import type { ExitClassification } from '../utils/process.js';
import type { IterationRecord, RunSummary } from '../engine/types.js';
import type { IterationLogHeader, CommitRecord } from './types.js';

/**
 * Divider between metadata header and raw output in log files.
 */
const LOG_DIVIDER = '\n--- RAW OUTPUT ---\n';

/**
 * Divider between stdout and stderr in raw output section.
 */
const STDERR_DIVIDER = '\n--- STDERR ---\n';

/**
 * Divider before the instruction the agent received.
 */
const INSTRUCTION_DIVIDER = '\n--- INSTRUCTION ---\n';

function isExitClassification(value: unknown): value is ExitClassification {
  return (
    value === 'completed' ||
    value === 'timeout' ||
    value === 'nonzero_exit' ||
    value === 'not_found' ||
    (typeof value === 'string' && value.startsWith('error:'))
  );
}

const CheckpointSchema = z.object({
  name: z.string(),
  passed: z.boolean(),
  message: z.string().optional(),
  details: z.unknown().optional(),
});

const VerificationResultSchema = z.object({
  success: z.boolean(),
  score: z.number(),
  message: z.string(),
  checkpoints: z.array(CheckpointSchema),
  source: z.enum(['payload', 'exit-code', 'timeout', 'error']),
  exitCode: z.number().nullable(),
  durationMs: z.number(),
  stdout: z.string(),
  stderr: z.string(),
});

const IterationRecordSchema = z.object({
  iteration: z.number().int().positive(),
  instruction: z.string(),
  stdout: z.string(),
  stderr: z.string(),
  durationMs: z.number(),
  classification: z.custom<ExitClassification>(isExitClassification, 'invalid classification'),
  exitCode: z.number().nullable(),
  fingerprint: z.string(),
  progress: z.enum(['progressing', 'stagnant']),
  verification: VerificationResultSchema.optional(),
  agentSignaledCompletion: z.boolean(),
  usage: z.number().optional(),
  files: z
    .object({
      created: z.array(z.string()),
      modified: z.array(z.string()),
      deleted: z.array(z.string()),
    })
    .optional(),
  startedAt: z.string(),
  endedAt: z.string(),
});

const CommitRecordSchema = z.object({
  at: z.string(),
  message: z.string(),
  sha: z.string().optional(),
});

export function getRecordsPath(workspace: string): string {
  return getControlPath(workspace, RECORDS_FILE);
}

export function getIterationsDir(workspace: string): string {
  return getControlPath(workspace, ITERATIONS_DIR);
}

/**
 * iteration-001.log, iteration-002.log, ...
 */
export function generateLogFilename(iteration: number): string {
  return `iteration-${String(iteration).padStart(3, '0')}.log`;
}

export function getIterationLogPath(workspace: string, iteration: number): string {
  return join(getIterationsDir(workspace), generateLogFilename(iteration));
}

/**
 * Append one record as a JSON line.
 */
export async function appendIterationRecord(workspace: string, record: IterationRecord): Promise<void> {
  const path = getRecordsPath(workspace);
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, `${JSON.stringify(record)}\n`, 'utf-8');
}

async function readLines(path: string): Promise<string[] | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return null;
  }
  return content.split('\n').filter((line) => line.trim().length > 0);
}

function parseJsonLine<T>(line: string, lineNumber: number, path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new LoopbenchError(`${path}:${lineNumber}: not valid JSON (${errorMessage(error)})`, { cause: error });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new LoopbenchError(
      `${path}:${lineNumber}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid record'}`,
    );
  }
  return parsed.data;
}

/**
 * Read every iteration record of a workspace, in file order.
 * Returns an empty list when the run has not recorded anything yet.
 */
export async function loadIterationRecords(workspace: string): Promise<IterationRecord[]> {
  const path = getRecordsPath(workspace);
  const lines = await readLines(path);
  if (!lines) return [];
  return lines.map((line, index) => Object.freeze(parseJsonLine(line, index + 1, path, IterationRecordSchema)));
}

/**
 * Build the metadata header of an iteration log.
 */
function formatMetadataHeader(header: IterationLogHeader, record: IterationRecord): string {
  const lines: string[] = [];

  lines.push(`# Iteration ${record.iteration} Log`);
  lines.push('');
  lines.push('## Metadata');
  lines.push('');
  lines.push(`- **Run ID**: ${header.runId}`);
  lines.push(`- **Task ID**: ${header.taskId}`);
  lines.push(`- **Agent**: ${header.agentId}`);
  lines.push(`- **Classification**: ${record.classification}`);
  lines.push(`- **Exit Code**: ${record.exitCode ?? 'none'}`);
  lines.push(`- **Progress**: ${record.progress}`);
  lines.push(`- **Fingerprint**: ${record.fingerprint}`);
  lines.push(`- **Agent Signaled Completion**: ${record.agentSignaledCompletion ? 'Yes' : 'No'}`);
  lines.push(`- **Started At**: ${record.startedAt}`);
  lines.push(`- **Ended At**: ${record.endedAt}`);
  lines.push(`- **Duration**: ${formatDuration(record.durationMs)}`);
  if (record.usage !== undefined) {
    lines.push(`- **Usage**: ${record.usage}`);
  }

  if (record.verification) {
    const { verification } = record;
    lines.push('');
    lines.push('## Verification');
    lines.push('');
    lines.push(`- **Result**: ${verification.success ? 'PASSED' : 'FAILED'}`);
    lines.push(`- **Score**: ${verification.score.toFixed(2)}`);
    lines.push(`- **Source**: ${verification.source}`);
    lines.push(`- **Message**: ${verification.message}`);
    for (const checkpoint of verification.checkpoints) {
      lines.push(`  - [${checkpoint.passed ? 'x' : ' '}] ${checkpoint.name}`);
    }
  }

  if (record.files) {
    const changed = [
      ...record.files.created.map((path) => `+ ${path}`),
      ...record.files.modified.map((path) => `~ ${path}`),
      ...record.files.deleted.map((path) => `- ${path}`),
    ];
    if (changed.length > 0) {
      lines.push('');
      lines.push('## Files Changed Since Start');
      lines.push('');
      for (const entry of changed.slice(0, 20)) {
        lines.push(`    ${entry}`);
      }
      if (changed.length > 20) {
        lines.push(`    ... and ${changed.length - 20} more`);
      }
    }
  }

  return lines.join('\n');
}

/**
 * Write the human-readable log for one iteration.
 * @returns Path of the written file
 */
export async function saveIterationLog(
  workspace: string,
  header: IterationLogHeader,
  record: IterationRecord,
): Promise<string> {
  const filePath = getIterationLogPath(workspace, record.iteration);
  await mkdir(dirname(filePath), { recursive: true });

  let content = formatMetadataHeader(header, record);
  content += INSTRUCTION_DIVIDER;
  content += record.instruction;
  content += LOG_DIVIDER;
  content += record.stdout;
  if (record.stderr.trim().length > 0) {
    content += STDERR_DIVIDER;
    content += record.stderr;
  }

  await writeFile(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Read back the raw stdout/stderr sections of an iteration log.
 */
export async function loadIterationLogOutput(
  workspace: string,
  iteration: number,
): Promise<{ stdout: string; stderr: string } | null> {
  let content: string;
  try {
    content = await readFile(getIterationLogPath(workspace, iteration), 'utf-8');
  } catch {
    return null;
  }
  const output = content.split(LOG_DIVIDER)[1] ?? '';
  const [stdout = '', stderr = ''] = output.split(STDERR_DIVIDER);
  return { stdout, stderr };
}

export function getCommitsPath(workspace: string): string {
  return getControlPath(workspace, COMMITS_FILE);
}

/**
 * Append one protocol commit message to the commit-record log.
 */
export async function appendCommitRecord(workspace: string, record: CommitRecord): Promise<void> {
  const path = getCommitsPath(workspace);
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, `${JSON.stringify(record)}\n`, 'utf-8');
}

export async function loadCommitRecords(workspace: string): Promise<CommitRecord[]> {
  const path = getCommitsPath(workspace);
  const lines = await readLines(path);
  if (!lines) return [];
  return lines.map((line, index) => parseJsonLine(line, index + 1, path, CommitRecordSchema));
}

export function getSummaryPath(workspace: string): string {
  return getControlPath(workspace, SUMMARY_FILE);
}

export async function saveRunSummary(workspace: string, summary: RunSummary): Promise<void> {
  await writeJsonAtomic(getSummaryPath(workspace), summary);
}

const RunSummarySchema = z
  .object({
    taskId: z.string(),
    agentId: z.string(),
    runId: z.string(),
    status: z.enum(['pending', 'in_progress', 'completed', 'failed', 'timeout']),
    reason: z.string().nullable(),
    success: z.boolean(),
    startedAt: z.string().nullable(),
    completedAt: z.string().nullable(),
    elapsedMs: z.number(),
    iterations: z.number(),
    usage: z.number(),
    score: z.number().nullable(),
  })
  .passthrough();

export type RunSummaryHead = z.infer<typeof RunSummarySchema>;

/**
 * Load the head fields of summary.json, or null when the run has none.
 */
export async function loadRunSummary(workspace: string): Promise<RunSummaryHead | null> {
  const path = getSummaryPath(workspace);
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch {
    return null;
  }
  return parseJsonLine(text, 1, path, RunSummarySchema);
}
