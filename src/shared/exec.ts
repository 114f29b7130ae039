import execa from 'execa';
import { GuestrunError, GuestrunErrorCode } from './errors.js';

// Exit code reported for a command killed because it ran out of time,
// the same value coreutils timeout(1) uses.
export const PROCESS_TIMEOUT = 124;

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  signal?: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export async function runShell(command: string, options?: ExecOptions): Promise<ExecResult> {
  let result: execa.ExecaReturnValue;
  try {
    result = await execa(command, {
      shell: '/bin/bash',
      cwd: options?.cwd,
      env: options?.env,
      timeout: options?.timeoutMs,
      reject: false,
    });
  } catch (err) {
    throw new GuestrunError(GuestrunErrorCode.GUEST_ERROR, `Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (result.timedOut) {
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: PROCESS_TIMEOUT,
      timedOut: true,
      signal: result.signal ?? undefined,
    };
  }
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: result.exitCode ?? (result.killed ? 128 : 0),
    timedOut: false,
    signal: result.signal ?? undefined,
  };
}
