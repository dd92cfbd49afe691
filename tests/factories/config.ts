/**
 * ABOUTME: Config files for command tests.
 * The agent is the current Node binary running a one-line script, so runs
 * finish without any agent CLI installed.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { executeRunCommand } from '../../src/commands/run.js';
import { captureConsole } from './console.js';

export const FINISHING_SCRIPT = "console.log('<promise>COMPLETE</promise>')";

/**
 * TOML lines defining the `finisher` agent and selecting it.
 */
export function finisherAgentToml(script: string = FINISHING_SCRIPT): string[] {
  return [
    'agent = "finisher"',
    '',
    '[[agents]]',
    'name = "finisher"',
    'plugin = "command"',
    `command = ${JSON.stringify(process.execPath)}`,
    `args = ["-e", ${JSON.stringify(script)}]`,
  ];
}

export async function writeFinisherConfig(path: string, extra: readonly string[] = []): Promise<void> {
  await writeFile(path, [...extra, ...finisherAgentToml(), ''].join('\n'));
}

/**
 * Write the finisher config to `dir/global.toml`, create `dir/<name>` and run
 * one task there to completion.
 * @returns the workspace path
 */
export async function runFinisherTask(dir: string, name = 'ws', taskId = 't1'): Promise<string> {
  const globalConfigPath = join(dir, 'global.toml');
  await writeFinisherConfig(globalConfigPath);
  const workspace = join(dir, name);
  await mkdir(workspace, { recursive: true });

  const captured = captureConsole();
  try {
    const code = await executeRunCommand(
      ['-w', name, '--task', taskId, '--prompt', 'Say you are done', '--json', '--quiet'],
      { cwd: dir, globalConfigPath },
    );
    if (code !== 0) {
      throw new Error(`run exited ${code}: ${captured.err.join('\n')}`);
    }
  } finally {
    captured.restore();
  }
  return workspace;
}
