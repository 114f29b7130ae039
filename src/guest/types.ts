export interface PushOptions {
  // Permission bits applied to the destination, e.g. 0o755
  mode?: number;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface GuestRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** A provisioned environment that can receive files and run commands. */
export interface Guest {
  readonly name: string;
  readonly role?: string;
  push(source: string, destination: string, options?: PushOptions): Promise<void>;
  run(command: string, options?: RunOptions): Promise<GuestRunResult>;
  isReady(): boolean;
}
