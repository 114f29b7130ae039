import { stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { Result } from '../../result.js';
import { GuestrunError, GuestrunErrorCode } from '../../shared/errors.js';
import { listed } from '../../shared/format.js';
import type { Discover, TestFramework } from '../../discover/index.js';
import { MethodRegistry } from '../plugin.js';
import { Step, type StepState } from '../step.js';
import type { PlanContext, RawStepData, StepData } from '../types.js';
import { ExecuteInternal } from './internal.js';
import { ExecutePlugin, type ExecuteContext } from './plugin.js';

// Internal executor is the default implementation
export const DEFAULT_EXECUTE_METHOD = 'tmt';

export const DEFAULT_FRAMEWORK: TestFramework = 'shell';

const RESULTS_FILE = 'results.yaml';

export type ExecuteMethods = MethodRegistry<ExecuteContext, ExecutePlugin>;

export function builtinExecuteMethods(): ExecuteMethods {
  return new MethodRegistry<ExecuteContext, ExecutePlugin>('execute').register(
    DEFAULT_EXECUTE_METHOD,
    'Run tests one by one on each guest using the internal executor.',
    (step, data) => new ExecuteInternal(step, data)
  );
}

export interface NormalizedExecuteData {
  data: RawStepData[];
  framework: TestFramework;
  warnings: string[];
}

/**
 * Map the deprecated `shell`, `beakerlib`, `shell.tmt` and `beakerlib.tmt`
 * methods onto `how: tmt` plus a default test framework.
 */
export function normalizeExecuteData(raw: RawStepData[], framework: TestFramework = DEFAULT_FRAMEWORK): NormalizedExecuteData {
  const first = raw[0];
  const how = first?.how;
  const matched = how === undefined ? null : /^(shell|beakerlib)(\.tmt)?$/.exec(how);
  if (!first || !matched) return { data: raw, framework, warnings: [] };

  const mappedFramework: TestFramework = matched[1] === 'beakerlib' ? 'beakerlib' : 'shell';
  return {
    data: [{ ...first, how: DEFAULT_EXECUTE_METHOD }, ...raw.slice(1)],
    framework: mappedFramework,
    warnings: [
      `The '${how}' execute method has been deprecated.`,
      `Use 'how: ${DEFAULT_EXECUTE_METHOD}' in the execute step instead.`,
      `Set 'framework: ${mappedFramework}' in test metadata.`,
    ],
  };
}

const resultsFileSchema = z.record(z.string(), z.unknown());

/** Run tests using the configured executor on every provisioned guest. */
export class Execute extends Step<ExecuteContext, ExecutePlugin> implements ExecuteContext {
  private _results: Result[] = [];
  private _framework: TestFramework = DEFAULT_FRAMEWORK;
  private readonly methods: ExecuteMethods;

  constructor(plan: PlanContext, data: RawStepData[], methods: ExecuteMethods = builtinExecuteMethods()) {
    let records = data;
    let framework = DEFAULT_FRAMEWORK;
    const warnings: string[] = [];
    // A resumed run keeps the mapping it resolved the first time
    if (!plan.resuming) {
      const normalized = normalizeExecuteData(data);
      records = normalized.data;
      framework = normalized.framework;
      warnings.push(...normalized.warnings);
    }
    super(plan, 'execute', records, DEFAULT_EXECUTE_METHOD);
    this._framework = framework;
    this.methods = methods;
    for (const warning of warnings) this.logger.warn(warning);
  }

  get discover(): Discover {
    return this.plan.discover;
  }

  get framework(): TestFramework {
    return this._framework;
  }

  protected delegate(data: StepData): ExecutePlugin {
    return this.methods.delegate(this, data);
  }

  async wake(): Promise<void> {
    await super.wake();

    // There should be just a single definition
    if (this.data.length > 1) {
      throw new GuestrunError(GuestrunErrorCode.SPECIFICATION_ERROR, 'Multiple execute steps defined in the plan.', {
        records: this.data.length,
      });
    }

    const executor = this.delegate(this.data[0]);
    await executor.wake();
    this._phases.push(executor);

    if (this.status() === 'done') {
      this.logger.debug('Execute wake up complete (already done before).');
    } else {
      this.setStatus('todo');
      await this.save();
    }
  }

  summary(): string {
    const summary = `${listed(this._results.length, 'test')} executed`;
    this.logger.info({ summary }, summary);
    return summary;
  }

  async go(): Promise<string> {
    this.announce();

    if (this.status() === 'done') {
      this.logger.info('status done');
      return this.summary();
    }

    const guests = this.plan.guests().filter(g => g.isReady());
    if (guests.length === 0) {
      throw new GuestrunError(GuestrunErrorCode.EXECUTE_ERROR, 'No guests available for execution.');
    }

    for (const guest of guests) {
      for (const phase of this.phases()) {
        if (!phase.enabledOnGuest(guest)) continue;
        await phase.go(guest);
        this._results.push(...phase.results());
      }
    }

    const summary = this.summary();
    this.setStatus('done');
    await this.save();
    return summary;
  }

  /** Packages the execute phases need on the guests, used by prepare. */
  requires(): string[] {
    const requires = new Set<string>();
    for (const phase of this.phases()) {
      for (const pkg of phase.requires()) requires.add(pkg);
    }
    return Array.from(requires);
  }

  /**
   * Results of every guest in execution order. `results.yaml` is keyed by
   * test name, so after a resume only the last result per test name is
   * restored: N results instead of N for each of several guests.
   */
  results(): Result[] {
    return [...this._results];
  }

  protected stateExtras(): Record<string, unknown> {
    return { framework: this._framework };
  }

  protected restoreExtras(state: StepState): void {
    const framework = state['framework'];
    if (framework === 'shell' || framework === 'beakerlib') this._framework = framework;
  }

  async load(): Promise<void> {
    await super.load();
    const raw = await this.readOptional(RESULTS_FILE);
    if (raw === null) {
      this.logger.debug('Test results not found.');
      return;
    }
    const parsed = resultsFileSchema.safeParse(this.parseYamlFile(RESULTS_FILE, raw) ?? {});
    if (!parsed.success) {
      throw new GuestrunError(GuestrunErrorCode.FILE_ERROR, `Invalid results in '${this.filePath(RESULTS_FILE)}'.`, {
        issues: parsed.error.issues,
      });
    }
    this._results = Object.entries(parsed.data).map(([name, record]) => Result.fromRecord(name, record));
  }

  async save(): Promise<void> {
    await super.save();
    const results: Record<string, unknown> = {};
    for (const result of this._results) results[result.name] = result.export();
    await this.write(RESULTS_FILE, stringifyYaml(results));
  }
}

export { ExecutePlugin } from './plugin.js';
export type { ExecuteContext, DataPathOptions } from './plugin.js';
export { ExecuteInternal } from './internal.js';
export type { Script } from './script.js';
