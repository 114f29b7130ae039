import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { GuestrunError, GuestrunErrorCode, isErrnoException } from '../shared/errors.js';
import { logger, type Logger } from '../shared/logger.js';
import type { Plugin, StepContext } from './plugin.js';
import type { PlanContext, RawStepData, StepData, StepName, StepStatus } from './types.js';

const STEP_FILE = 'step.yaml';

const stepStateSchema = z
  .object({
    status: z.enum(['todo', 'done']).nullable().optional(),
    data: z.array(z.object({ how: z.string(), name: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

export type StepState = z.infer<typeof stepStateSchema>;

/** Fill in the default `how` and phase names of raw configuration records. */
export function normalizeStepData(raw: RawStepData[], defaultHow: string): StepData[] {
  const records = raw.length > 0 ? raw : [{}];
  return records.map((record, index) => ({
    ...record,
    how: record.how ?? defaultHow,
    name: record.name ?? `default-${index}`,
  }));
}

/**
 * Common pipeline stage: status tracking, persisted state under
 * `<plan workdir>/<step>/` and the phases built from the configuration.
 */
export abstract class Step<C extends StepContext, P extends Plugin<C>> implements StepContext {
  readonly name: StepName;
  readonly workdir: string;
  readonly logger: Logger;
  protected readonly plan: PlanContext;
  protected data: StepData[];
  protected readonly _phases: P[] = [];
  private _status: StepStatus = null;

  constructor(plan: PlanContext, name: StepName, data: RawStepData[], defaultHow: string) {
    this.plan = plan;
    this.name = name;
    this.workdir = path.join(plan.workdir, name);
    this.logger = logger.child({ step: name });
    this.data = normalizeStepData(data, defaultHow);
  }

  /** Resolve the plugin implementing one configuration record. */
  protected abstract delegate(data: StepData): P;

  /** Human readable outcome of the step. */
  abstract summary(): string;

  status(): StepStatus {
    return this._status;
  }

  protected setStatus(status: StepStatus): void {
    this.logger.debug({ from: this._status, to: status }, 'status change');
    this._status = status;
  }

  /** Phases of the step, optionally only those of the given plugin class. */
  phases<K extends P>(kind?: abstract new (...args: never[]) => K): K[] {
    return this._phases.filter((phase): phase is K => kind === undefined || phase instanceof kind);
  }

  configuration(): StepData[] {
    return this.data.map(d => ({ ...d }));
  }

  /** Restore persisted state; a step without saved state stays fresh. */
  async wake(): Promise<void> {
    await this.load();
  }

  /** Run the step and return its summary. */
  abstract go(): Promise<string>;

  protected announce(): void {
    this.logger.info({ workdir: this.workdir }, `${this.name} step`);
  }

  show(): string[] {
    return this.data.flatMap(d => this.delegate(d).show());
  }

  /** Step-specific values saved next to status and data. */
  protected stateExtras(): Record<string, unknown> {
    return {};
  }

  protected restoreExtras(_state: StepState): void {
    // nothing by default
  }

  async load(): Promise<void> {
    const raw = await this.readOptional(STEP_FILE);
    if (raw === null) {
      this.logger.debug('no saved step state');
      return;
    }
    const parsed = stepStateSchema.safeParse(this.parseYamlFile(STEP_FILE, raw));
    if (!parsed.success) {
      throw new GuestrunError(GuestrunErrorCode.FILE_ERROR, `Invalid step state in '${this.filePath(STEP_FILE)}'.`, {
        issues: parsed.error.issues,
      });
    }
    this._status = parsed.data.status ?? null;
    if (parsed.data.data && parsed.data.data.length > 0) this.data = parsed.data.data;
    this.restoreExtras(parsed.data);
  }

  async save(): Promise<void> {
    const state = { status: this._status, data: this.data, ...this.stateExtras() };
    await this.write(STEP_FILE, stringifyYaml(state));
  }

  /** Parse YAML read from a workdir file; malformed content is a file error. */
  protected parseYamlFile(name: string, raw: string): unknown {
    try {
      return parseYaml(raw);
    } catch (err) {
      throw new GuestrunError(GuestrunErrorCode.FILE_ERROR, `Malformed YAML in '${this.filePath(name)}'.`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  filePath(name: string): string {
    return path.isAbsolute(name) ? name : path.join(this.workdir, name);
  }

  async read(name: string): Promise<string> {
    const filePath = this.filePath(name);
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new GuestrunError(GuestrunErrorCode.FILE_ERROR, `Failed to read '${filePath}'.`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /** Like `read()`, but a missing file yields null. */
  async readOptional(name: string): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath(name), 'utf-8');
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) return null;
      throw new GuestrunError(GuestrunErrorCode.FILE_ERROR, `Failed to read '${this.filePath(name)}'.`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async write(name: string, content: string, options?: { append?: boolean }): Promise<void> {
    const filePath = this.filePath(name);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      if (options?.append) {
        await fs.appendFile(filePath, content, 'utf-8');
      } else {
        await fs.writeFile(filePath, content, 'utf-8');
      }
    } catch (err) {
      throw new GuestrunError(GuestrunErrorCode.FILE_ERROR, `Failed to write '${filePath}'.`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
