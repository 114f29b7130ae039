import fs from 'fs/promises';
import path from 'path';
import { runShell } from '../shared/exec.js';
import { GuestrunError, GuestrunErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Guest, GuestRunResult, PushOptions, RunOptions } from './types.js';

export interface LocalGuestOptions {
  name?: string;
  role?: string;
  // Directory standing in for the guest filesystem root. Without it the
  // guest is the host itself and pushes are skipped.
  root?: string;
}

/** Guest running commands directly on the local host. */
export class LocalGuest implements Guest {
  readonly name: string;
  readonly role?: string;
  readonly root?: string;
  private readonly log = logger.child({ guest: 'local' });
  // Directories which received pushed files, searched first for commands
  private readonly binDirs = new Set<string>();

  constructor(options: LocalGuestOptions = {}) {
    this.name = options.name ?? 'default-0';
    this.role = options.role;
    this.root = options.root;
  }

  isReady(): boolean {
    return true;
  }

  async push(source: string, destination: string, options?: PushOptions): Promise<void> {
    if (this.root === undefined) {
      this.log.debug({ source, destination }, 'no guest root, push skipped');
      return;
    }
    const target = path.join(this.root, destination);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(source, target);
      if (options?.mode !== undefined) await fs.chmod(target, options.mode);
    } catch (err) {
      throw new GuestrunError(GuestrunErrorCode.GUEST_ERROR, `Failed to push '${source}' to '${target}'.`, {
        guest: this.name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    this.binDirs.add(path.dirname(target));
    this.log.debug({ source, target }, 'pushed file');
  }

  async run(command: string, options?: RunOptions): Promise<GuestRunResult> {
    this.log.debug({ command, cwd: options?.cwd }, 'running command');
    const result = await runShell(command, {
      cwd: options?.cwd,
      env: this.environment(options?.env),
      timeoutMs: options?.timeoutMs,
    });
    return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
  }

  private environment(env?: Record<string, string>): Record<string, string> | undefined {
    if (this.binDirs.size === 0) return env;
    const search = env?.['PATH'] ?? process.env['PATH'] ?? '';
    return { ...env, PATH: [...this.binDirs, search].join(path.delimiter) };
  }
}
