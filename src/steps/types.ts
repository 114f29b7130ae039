import type { Discover } from '../discover/index.js';
import type { Guest } from '../guest/types.js';
import type { Result } from '../result.js';

export type StepName = 'execute' | 'report';

export type StepStatus = 'todo' | 'done' | null;

/** One configuration record of a step, selecting a plugin through `how`. */
export interface StepData {
  how: string;
  name?: string;
  [key: string]: unknown;
}

/** What steps may see of the plan that owns them. */
export interface PlanContext {
  readonly workdir: string;
  readonly resuming: boolean;
  readonly discover: Discover;
  guests(): Guest[];
  results(): Result[];
}

/** A configuration record as written in the plan, before defaults apply. */
export interface RawStepData {
  how?: string;
  name?: string;
  [key: string]: unknown;
}
