/**
 * Thin layer over child_process used by the encoder and its helper commands
 */

import { spawn } from 'child_process';
import type { Readable } from 'stream';

/**
 * The subset of ChildProcess the engine relies on
 */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(
    event: 'close',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Launches an external program with an argument vector (never a shell)
 */
export type ProcessLauncher = (
  command: string,
  args: readonly string[],
) => SpawnedProcess;

export const spawnProcess: ProcessLauncher = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Split a byte stream into lines. FFmpeg rewrites its status line with
 * carriage returns, so \r, \n and \r\n all terminate a line.
 */
export class LineSplitter {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const parts = this.buffer.split(/\r\n|\r|\n/);
    // A trailing \r may be the first half of \r\n; keep it buffered
    if (this.buffer.endsWith('\r')) {
      parts.pop();
      this.buffer = '\r';
      return parts.filter((line) => line.length > 0);
    }
    this.buffer = parts.pop() ?? '';
    return parts.filter((line) => line.length > 0);
  }

  flush(): string[] {
    const rest = this.buffer.replace(/\r$/, '');
    this.buffer = '';
    return rest.length > 0 ? [rest] : [];
  }
}

export interface CapturedOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** The run was stopped through the abort signal */
  aborted: boolean;
}

export interface CaptureOptions {
  launcher?: ProcessLauncher;
  /** Aborting kills the process with SIGKILL */
  signal?: AbortSignal;
}

/**
 * Run a command to completion and collect its output. Rejects only when
 * the command cannot be launched.
 */
export function captureOutput(
  command: string,
  args: readonly string[],
  options: CaptureOptions = {},
): Promise<CapturedOutput> {
  const { launcher = spawnProcess, signal } = options;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      resolve({ exitCode: null, stdout: '', stderr: '', aborted: true });
      return;
    }

    let proc: SpawnedProcess;
    try {
      proc = launcher(command, args);
    } catch (error) {
      reject(error);
      return;
    }
    let stdout = '';
    let stderr = '';
    let aborted = false;

    const onAbort = () => {
      aborted = true;
      proc.kill('SIGKILL');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    proc.stdout?.on('data', (data: Buffer | string) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer | string) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      signal?.removeEventListener('abort', onAbort);
      resolve({ exitCode: code, stdout, stderr, aborted });
    });

    proc.on('error', (error) => {
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}

/**
 * Run a command to completion and return stdout + stderr as one string.
 * FFmpeg exits non-zero for several informational commands, so the exit
 * code is ignored; only a launch failure rejects.
 */
export async function runCommand(
  command: string,
  args: readonly string[],
  launcher: ProcessLauncher = spawnProcess,
): Promise<string> {
  const { stdout, stderr } = await captureOutput(command, args, { launcher });
  return stdout + stderr;
}
