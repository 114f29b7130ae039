import { Result } from '../../result.js';
import { MethodRegistry } from '../plugin.js';
import { Step } from '../step.js';
import type { PlanContext, RawStepData, StepData } from '../types.js';
import { ReportDisplay } from './display.js';
import { ReportPlugin, type ReportContext } from './plugin.js';
import { ReportYaml } from './yaml.js';

// Default implementation for report is display
export const DEFAULT_REPORT_METHOD = 'display';

export type ReportMethods = MethodRegistry<ReportContext, ReportPlugin>;

export function builtinReportMethods(): ReportMethods {
  return new MethodRegistry<ReportContext, ReportPlugin>('report')
    .register(DEFAULT_REPORT_METHOD, 'Show test results on the terminal.', (step, data) => new ReportDisplay(step, data))
    .register('yaml', 'Save test results into a YAML file.', (step, data) => new ReportYaml(step, data));
}

/** Provide test results overview and send reports. */
export class Report extends Step<ReportContext, ReportPlugin> implements ReportContext {
  private readonly methods: ReportMethods;

  constructor(plan: PlanContext, data: RawStepData[], methods: ReportMethods = builtinReportMethods()) {
    super(plan, 'report', data, DEFAULT_REPORT_METHOD);
    this.methods = methods;
  }

  protected delegate(data: StepData): ReportPlugin {
    return this.methods.delegate(this, data);
  }

  results(): Result[] {
    return this.plan.results();
  }

  async wake(): Promise<void> {
    await super.wake();

    for (const data of this.data) {
      const plugin = this.delegate(data);
      await plugin.wake();
      this._phases.push(plugin);
    }

    if (this.status() === 'done') {
      this.logger.debug('Report wake up complete (already done before).');
    } else {
      this.setStatus('todo');
      await this.save();
    }
  }

  summary(): string {
    const summary = Result.summary(this.results());
    this.logger.info({ summary }, summary);
    return summary;
  }

  async go(): Promise<string> {
    this.announce();

    if (this.status() === 'done') {
      this.logger.info('status done');
      return this.summary();
    }

    for (const phase of this.phases()) {
      await phase.go();
    }

    const summary = this.summary();
    this.setStatus('done');
    await this.save();
    return summary;
  }

  /** Packages the report phases need on the guests, used by prepare. */
  requires(): string[] {
    const requires = new Set<string>();
    for (const phase of this.phases()) {
      for (const pkg of phase.requires()) requires.add(pkg);
    }
    return Array.from(requires);
  }
}

export { ReportPlugin } from './plugin.js';
export type { ReportContext } from './plugin.js';
export { ReportDisplay } from './display.js';
export { ReportYaml } from './yaml.js';
