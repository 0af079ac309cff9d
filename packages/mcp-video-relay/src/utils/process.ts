/**
 * Child process helper for the external media tools.
 */

import { spawn } from 'node:child_process';

export interface ProcessResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/** Keep at most this much of each stream. */
const MAX_CAPTURE = 256 * 1024;

function appendCapped(buffer: string, chunk: Buffer): string {
  const next = buffer + chunk.toString();
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
}

/**
 * Runs a command to completion without a shell. Rejects only when the process cannot be
 * spawned; a non-zero exit is reported through `code`.
 */
export function runProcess(command: string, args: string[]): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout = appendCapped(stdout, data);
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr = appendCapped(stderr, data);
    });

    child.on('error', (error) => {
      reject(new Error(`Failed to start ${command}: ${error.message}`));
    });

    child.on('close', (code, signal) => {
      resolve({ code, signal, stdout, stderr });
    });
  });
}

/** Last non-empty line of a tool's stderr, for error messages. */
export function lastLine(output: string): string {
  const lines = output.split('\n').map((l) => l.trim()).filter((l) => l.length > 0);
  return lines[lines.length - 1] ?? '';
}
