import fs from 'fs/promises';
import path from 'path';
import { StaticDiscover, type Discover } from './discover/index.js';
import type { Guest } from './guest/types.js';
import type { Result } from './result.js';
import { loadPlanConfig, workdirRoot } from './config/loader.js';
import { logger } from './shared/logger.js';
import { Execute, type ExecuteMethods } from './steps/execute/index.js';
import { Report, type ReportMethods } from './steps/report/index.js';
import type { PlanContext, RawStepData } from './steps/types.js';

export interface PlanOptions {
  workdir: string;
  discover: Discover;
  guests: Guest[];
  execute?: RawStepData[];
  report?: RawStepData[];
  methods?: { execute?: ExecuteMethods; report?: ReportMethods };
  // Detected from the workdir by Plan.create() when omitted
  resuming?: boolean;
}

/** Execute and report stages of one plan, sharing a workdir. */
export class Plan implements PlanContext {
  readonly workdir: string;
  readonly discover: Discover;
  readonly resuming: boolean;
  readonly execute: Execute;
  readonly report: Report;
  private readonly provisioned: Guest[];

  constructor(options: PlanOptions) {
    this.workdir = options.workdir;
    this.discover = options.discover;
    this.provisioned = [...options.guests];
    this.resuming = options.resuming ?? false;
    this.execute = new Execute(this, options.execute ?? [], options.methods?.execute);
    this.report = new Report(this, options.report ?? [], options.methods?.report);
  }

  /** Build a plan, resuming when the workdir already holds step state. */
  static async create(options: PlanOptions): Promise<Plan> {
    const resuming = options.resuming ?? (await hasStepState(options.workdir));
    return new Plan({ ...options, resuming });
  }

  guests(): Guest[] {
    return [...this.provisioned];
  }

  results(): Result[] {
    return this.execute.results();
  }

  /** Packages required on guests by execute and report phases. */
  requires(): string[] {
    return Array.from(new Set([...this.execute.requires(), ...this.report.requires()]));
  }

  async go(): Promise<Result[]> {
    logger.info({ workdir: this.workdir, resuming: this.resuming }, 'running plan');
    await this.execute.wake();
    await this.execute.go();
    await this.report.wake();
    await this.report.go();
    return this.results();
  }
}

async function hasStepState(workdir: string): Promise<boolean> {
  for (const step of ['execute', 'report']) {
    const saved = await fs.access(path.join(workdir, step, 'step.yaml')).then(
      () => true,
      () => false
    );
    if (saved) return true;
  }
  return false;
}

export interface LoadPlanOptions {
  guests: Guest[];
  workdir?: string;
  methods?: PlanOptions['methods'];
}

/** Build a plan from a YAML plan file with tests listed inline. */
export async function loadPlan(filePath: string, options: LoadPlanOptions): Promise<Plan> {
  const config = await loadPlanConfig(filePath);
  const workdir = options.workdir ?? path.join(workdirRoot(), path.basename(filePath, path.extname(filePath)));
  return Plan.create({
    workdir,
    discover: new StaticDiscover(config.tests),
    guests: options.guests,
    execute: config.execute,
    report: config.report,
    methods: options.methods,
  });
}
