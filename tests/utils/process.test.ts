/**
 * ABOUTME: Tests for process utility functions.
 * Child processes are the current Node binary running inline scripts, so the
 * tests do not depend on Unix-specific commands.
 */

import { describe, test, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { realpathSync } from 'node:fs';
import {
  runProcess,
  parseCommand,
  isProcessRunning,
  INTERRUPTED_CLASSIFICATION,
} from '../../src/utils/process.js';

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const STUBBORN_PARENT = `
const { spawn } = require('node:child_process');
process.on('SIGTERM', () => {});
const child = spawn(process.execPath, ['-e', "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)"], { stdio: 'ignore' });
console.log('GRANDCHILD ' + child.pid);
setInterval(() => {}, 1000);
`;

describe('process utility', () => {
  describe('runProcess', () => {
    test('runs a command and captures stdout', async () => {
      const result = await runProcess(process.execPath, ['-e', 'console.log("hello")']);
      expect(result.classification).toBe('completed');
      expect(result.success).toBe(true);
      expect(result.exitCode).toBe(0);
      expect(result.stdout.trim()).toBe('hello');
    });

    test('classifies a non-zero exit', async () => {
      const result = await runProcess(process.execPath, ['-e', 'console.error("broken"); process.exit(3)']);
      expect(result.classification).toBe('nonzero_exit');
      expect(result.exitCode).toBe(3);
      expect(result.success).toBe(false);
      expect(result.stderr.trim()).toBe('broken');
    });

    test('classifies a missing executable as not_found', async () => {
      const result = await runProcess('loopbench-test-missing-executable', []);
      expect(result.classification).toBe('not_found');
      expect(result.exitCode).toBeNull();
    });

    test('reports a missing working directory', async () => {
      const cwd = join(tmpdir(), 'loopbench-missing-cwd-0f3a');
      const result = await runProcess(process.execPath, ['-e', '1'], { cwd });
      expect(result.classification).toBe(`error:working directory not found: ${cwd}`);
    });

    test('writes input to stdin', async () => {
      const result = await runProcess(
        process.execPath,
        ['-e', 'let s = ""; process.stdin.on("data", (d) => (s += d)); process.stdin.on("end", () => process.stdout.write(s.toUpperCase()))'],
        { input: 'abc' },
      );
      expect(result.classification).toBe('completed');
      expect(result.stdout).toBe('ABC');
    });

    test('merges env over the parent environment', async () => {
      const result = await runProcess(
        process.execPath,
        ['-e', 'console.log(process.env.LOOPBENCH_TEST_VALUE + ":" + typeof process.env.PATH)'],
        { env: { LOOPBENCH_TEST_VALUE: 'set' } },
      );
      expect(result.stdout.trim()).toBe('set:string');
    });

    test('uses the working directory', async () => {
      const cwd = realpathSync(tmpdir());
      const result = await runProcess(process.execPath, ['-e', 'console.log(process.cwd())'], { cwd });
      expect(result.stdout.trim()).toBe(cwd);
    });

    test('streams output through callbacks', async () => {
      const chunks: string[] = [];
      const result = await runProcess(process.execPath, ['-e', 'console.log("streamed")'], {
        onStdout: (data) => chunks.push(data),
      });
      expect(result.classification).toBe('completed');
      expect(chunks.join('').trim()).toBe('streamed');
    });

    test('times out and kills a SIGTERM-ignoring process with its descendants', async () => {
      const result = await runProcess(process.execPath, ['-e', STUBBORN_PARENT], {
        timeout: 1000,
        graceMs: 200,
      });

      expect(result.classification).toBe('timeout');
      expect(result.timedOut).toBe(true);
      expect(result.success).toBe(false);
      expect(result.signal).toBe('SIGKILL');

      const match = /GRANDCHILD (\d+)/.exec(result.stdout);
      expect(match).not.toBeNull();
      const pid = Number(match?.[1]);
      await sleep(100);
      expect(isProcessRunning(pid)).toBe(false);
    });

    test('aborts through the signal', async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 200);
      const result = await runProcess(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], {
        signal: controller.signal,
        graceMs: 200,
      });
      expect(result.classification).toBe(INTERRUPTED_CLASSIFICATION);
      expect(result.interrupted).toBe(true);
      expect(result.timedOut).toBe(false);
    });

    test('does not start when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const result = await runProcess(process.execPath, ['-e', 'console.log("never")'], {
        signal: controller.signal,
      });
      expect(result.classification).toBe(INTERRUPTED_CLASSIFICATION);
      expect(result.stdout).toBe('');
      expect(result.exitCode).toBeNull();
    });
  });

  describe('isProcessRunning', () => {
    test('is true for the current process', () => {
      expect(isProcessRunning(process.pid)).toBe(true);
    });
  });

  describe('parseCommand', () => {
    test('splits on whitespace', () => {
      expect(parseCommand('git commit -m msg')).toEqual({ command: 'git', args: ['commit', '-m', 'msg'] });
    });

    test('keeps quoted arguments together', () => {
      expect(parseCommand('echo "hello world" \'a b\'')).toEqual({
        command: 'echo',
        args: ['hello world', 'a b'],
      });
    });

    test('handles an empty string', () => {
      expect(parseCommand('')).toEqual({ command: '', args: [] });
    });
  });
});
