/**
 * Process Runner
 *
 * Runs an external command to completion and collects its output.
 * The compiler depends on the ProcessRunner interface so tests can
 * substitute an in-process fake.
 */

import { spawn } from 'child_process';

export interface ProcessRunOptions {
  cwd: string;
  timeoutMs: number;
}

export type ProcessRunResult =
  | {
      kind: 'exited';
      /** null when the process was killed by a signal */
      exitCode: number | null;
      stdout: string;
      stderr: string;
      timedOut: boolean;
    }
  | {
      kind: 'spawn-failed';
      /** errno code such as ENOENT or EACCES */
      code: string;
      message: string;
    };

export interface ProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessRunResult>;
}

function errnoCode(error: Error): string {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'UNKNOWN';
}

/**
 * ProcessRunner backed by child_process.spawn. Never rejects.
 */
export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessRunResult> {
    return new Promise(resolve => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, options.timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', error => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ kind: 'spawn-failed', code: errnoCode(error), message: error.message });
      });

      child.on('close', exitCode => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          kind: 'exited',
          exitCode,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
          timedOut
        });
      });
    });
  }
}
