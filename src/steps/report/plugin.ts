import type { Result } from '../../result.js';
import { Plugin, type StepContext } from '../plugin.js';

export interface ReportContext extends StepContext {
  // Results aggregated by the execute step
  results(): Result[];
  write(name: string, content: string, options?: { append?: boolean }): Promise<void>;
}

/** Common parent of report plugins. Reports work on results, not guests. */
export abstract class ReportPlugin extends Plugin<ReportContext> {
  abstract go(): Promise<void>;
}
