/**
 * ABOUTME: Progress file management for cross-iteration context.
 * Maintains .loopbench/progress.md, which accumulates a note per iteration
 * and feeds the most recent ones back into the next instruction.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { getControlPath, PROGRESS_FILE } from '../workspace/paths.js';
import { truncate } from '../utils/logger.js';
import type { IterationRecord } from '../engine/types.js';

/**
 * Entries kept in the progress file; older ones are dropped.
 */
export const MAX_PROGRESS_ENTRIES = 30;

const COMPLETION_NOTES_PATTERN = /<promise>\s*COMPLETE\s*<\/promise>/i;
const ENTRY_HEADER = /^## [✓✗] Iteration \d+/m;

const PROGRESS_HEADER = `# Loopbench Progress Log

Notes from earlier iterations of this run, updated after each iteration.

---

`;

/**
 * Entry for a single iteration in the progress file.
 */
export interface ProgressEntry {
  iteration: number;
  taskId: string;
  succeeded: boolean;
  timestamp: string;
  durationMs: number;
  classification: string;
  progress: string;
  verification?: string;
  notes?: string;
  filesChanged?: string[];
}

/**
 * Text immediately before <promise>COMPLETE</promise>.
 * Agents often summarize what was done right before the completion marker.
 */
function extractCompletionNotes(output: string): string | undefined {
  const match = output.match(COMPLETION_NOTES_PATTERN);
  if (!match) return undefined;

  const beforeComplete = output.slice(0, match.index).slice(-500).trim();
  const lines = beforeComplete.split('\n').filter((l) => l.trim());
  const relevantLines = lines.slice(-5);
  return relevantLines.length > 0 ? relevantLines.join('\n') : undefined;
}

function formatProgressEntry(entry: ProgressEntry): string {
  const lines: string[] = [];
  const status = entry.succeeded ? '✓' : '✗';
  const duration = Math.round(entry.durationMs / 1000);

  lines.push(`## ${status} Iteration ${entry.iteration} - ${entry.taskId}`);
  lines.push(`*${entry.timestamp} (${duration}s)*`);
  lines.push('');
  lines.push(`**Status:** ${entry.classification}, workspace ${entry.progress}`);

  if (entry.verification) {
    lines.push('');
    lines.push('**Verification:**');
    lines.push(entry.verification);
  }

  if (entry.filesChanged && entry.filesChanged.length > 0) {
    lines.push('');
    lines.push('**Files Changed:**');
    for (const file of entry.filesChanged.slice(0, 10)) {
      lines.push(`- ${file}`);
    }
    if (entry.filesChanged.length > 10) {
      lines.push(`- ... and ${entry.filesChanged.length - 10} more`);
    }
  }

  if (entry.notes) {
    lines.push('');
    lines.push('**Notes:**');
    lines.push(entry.notes);
  }

  lines.push('');
  lines.push('---');
  lines.push('');

  return lines.join('\n');
}

/**
 * Create a progress entry from an iteration record.
 */
export function createProgressEntry(taskId: string, record: IterationRecord): ProgressEntry {
  const { verification } = record;
  const notes = extractCompletionNotes(record.stdout);
  const files = record.files
    ? [...record.files.created, ...record.files.modified, ...record.files.deleted.map((path) => `${path} (deleted)`)]
    : [];

  return {
    iteration: record.iteration,
    taskId,
    succeeded: verification ? verification.success : record.classification === 'completed',
    timestamp: record.endedAt,
    durationMs: record.durationMs,
    classification: record.classification,
    progress: record.progress,
    ...(verification
      ? {
          verification: `${verification.success ? 'PASSED' : 'FAILED'} (score ${verification.score.toFixed(2)}): ${truncate(verification.message, 300)}`,
        }
      : {}),
    ...(notes ? { notes } : {}),
    ...(files.length > 0 ? { filesChanged: files } : {}),
  };
}

/**
 * Split progress content into its entries (each starting with "## ✓|✗ Iteration").
 */
function splitEntries(content: string): string[] {
  const first = content.search(ENTRY_HEADER);
  if (first < 0) return [];
  return content
    .slice(first)
    .split(/\n(?=## [✓✗] Iteration \d+)/)
    .map((entry) => (entry.endsWith('\n') ? entry : `${entry}\n`));
}

/**
 * Append a progress entry, keeping only the newest MAX_PROGRESS_ENTRIES.
 */
export async function appendProgress(
  workspace: string,
  entry: ProgressEntry,
  maxEntries = MAX_PROGRESS_ENTRIES,
): Promise<void> {
  const filePath = getControlPath(workspace, PROGRESS_FILE);
  await mkdir(dirname(filePath), { recursive: true });

  const existing = await readProgress(workspace);
  const entries = [...splitEntries(existing), formatProgressEntry(entry)].slice(-maxEntries);

  await writeFile(filePath, PROGRESS_HEADER + entries.join(''), 'utf-8');
}

/**
 * Read the progress file. Empty string if it doesn't exist.
 */
export async function readProgress(workspace: string): Promise<string> {
  try {
    return await readFile(getControlPath(workspace, PROGRESS_FILE), 'utf-8');
  } catch {
    return '';
  }
}

export async function countProgressEntries(workspace: string): Promise<number> {
  return splitEntries(await readProgress(workspace)).length;
}

/**
 * Summary of the last N entries for the instruction template.
 */
export async function getRecentProgressSummary(workspace: string, maxEntries = 5): Promise<string> {
  const entries = splitEntries(await readProgress(workspace));
  if (entries.length === 0) return '';

  const recent = entries.slice(-maxEntries);
  return `## Recent Progress (last ${recent.length} iterations)\n\n${recent.join('')}`;
}
