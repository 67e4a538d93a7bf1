/**
 * Child process helper for the external tools (dcraw, ffmpeg, ffprobe, exiftool)
 */

import { spawn } from 'child_process';

import { ExternalToolError } from '../../utils/errors.js';

export interface CommandResult {
  stdout: Buffer;
  stderr: string;
  exitCode: number;
}

export interface RunCommandOptions {
  /** Tool name used in errors (defaults to the command) */
  tool?: string;
  /** Kill the process after this many ms */
  timeoutMs?: number;
}

/** Diagnostics are trimmed to the tail, where tools print the actual error */
const MAX_DIAGNOSTIC_LENGTH = 2000;

export function tailDiagnostic(stderr: string): string {
  const trimmed = stderr.trim();
  return trimmed.length > MAX_DIAGNOSTIC_LENGTH ? trimmed.slice(-MAX_DIAGNOSTIC_LENGTH) : trimmed;
}

/**
 * Run a command and collect its output.
 * Resolves with the exit code whatever it is; rejects only when the
 * process cannot be started, is killed by a signal, or times out.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  const tool = options.tool ?? command;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdoutChunks: Buffer[] = [];
    let stderr = '';
    let timedOut = false;

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, options.timeoutMs)
      : null;

    child.stdout?.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (timer) clearTimeout(timer);

      if (timedOut) {
        reject(new ExternalToolError(tool, `timed out after ${options.timeoutMs}ms`, null, tailDiagnostic(stderr)));
        return;
      }
      if (code === null) {
        reject(new ExternalToolError(tool, `killed by ${signal ?? 'signal'}`, null, tailDiagnostic(stderr)));
        return;
      }

      resolve({ stdout: Buffer.concat(stdoutChunks), stderr, exitCode: code });
    });

    child.on('error', (err: Error) => {
      if (timer) clearTimeout(timer);
      reject(new ExternalToolError(tool, `could not be started. Is it installed? ${err.message}`));
    });
  });
}

/**
 * Run a command and throw ExternalToolError on a non-zero exit
 */
export async function runCommandOrThrow(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  const result = await runCommand(command, args, options);
  if (result.exitCode !== 0) {
    throw new ExternalToolError(
      options.tool ?? command,
      `exited with code ${result.exitCode}`,
      result.exitCode,
      tailDiagnostic(result.stderr)
    );
  }
  return result;
}
