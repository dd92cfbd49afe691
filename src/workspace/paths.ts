/**
 * ABOUTME: Locations of the control directory and the audit files inside a workspace.
 */

import { join } from 'node:path';

/** Control directory inside every workspace; never fingerprinted. */
export const CONTROL_DIR = '.loopbench';

export const MANIFEST_FILE = 'manifest.json';
export const RECORDS_FILE = 'iterations.jsonl';
export const ITERATIONS_DIR = 'iterations';
export const COMMITS_FILE = 'commits.log';
export const SUMMARY_FILE = 'summary.json';
export const RUN_LOG_FILE = 'run.log';
export const PROGRESS_FILE = 'progress.md';
export const INSTRUCTIONS_DIR = 'instructions';
export const CONFIG_FILE = 'config.toml';

/** Task description the instruction builder picks up when present. */
export const TASK_FILE = 'TASK.md';

export function getControlDir(workspace: string): string {
  return join(workspace, CONTROL_DIR);
}

export function getControlPath(workspace: string, ...segments: string[]): string {
  return join(workspace, CONTROL_DIR, ...segments);
}
