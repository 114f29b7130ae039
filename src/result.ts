import { z } from 'zod';
import { joinListed, listed } from './shared/format.js';

export const RESULT_OUTCOMES = ['pass', 'fail', 'info', 'warn', 'error'] as const;
export type ResultOutcome = (typeof RESULT_OUTCOMES)[number];

// How the raw outcome of a test should be interpreted, set by the test's
// `result` attribute.
export const RESULT_INTERPRETATIONS = ['respect', 'xfail', ...RESULT_OUTCOMES] as const;
export type ResultInterpretation = (typeof RESULT_INTERPRETATIONS)[number];

export const resultRecordSchema = z.object({
  result: z.enum(RESULT_OUTCOMES),
  log: z.union([z.string(), z.array(z.string())]).default([]),
  duration: z.string().nullable().optional(),
  note: z.string().nullable().optional(),
});

export type ResultRecord = z.input<typeof resultRecordSchema>;

export interface ResultData {
  result: ResultOutcome;
  log: string | string[];
  duration?: string | null;
  note?: string | null;
}

export function isResultOutcome(value: string): value is ResultOutcome {
  return (RESULT_OUTCOMES as readonly string[]).includes(value);
}

/** Outcome of a single test execution. */
export class Result {
  readonly name: string;
  readonly result: ResultOutcome;
  readonly log: string[];
  readonly duration: string | null;
  readonly note: string | null;

  constructor(name: string, data: ResultData, interpret: ResultInterpretation = 'respect') {
    this.name = name;
    this.log = typeof data.log === 'string' ? [data.log] : [...data.log];
    this.duration = data.duration ?? null;

    let outcome = data.result;
    let note = data.note ?? null;
    if (interpret !== 'respect') {
      note = note ? `${note}, original result: ${outcome}` : `original result: ${outcome}`;
      if (interpret === 'xfail') {
        // Swap just pass and fail, keep info, warn and error as they are
        outcome = outcome === 'pass' ? 'fail' : outcome === 'fail' ? 'pass' : outcome;
      } else {
        outcome = interpret;
      }
    }
    this.result = outcome;
    this.note = note;
  }

  /** Rebuild a result from a persisted record, without re-interpreting it. */
  static fromRecord(name: string, record: unknown): Result {
    const parsed = resultRecordSchema.parse(record);
    return new Result(name, parsed);
  }

  export(): ResultRecord {
    const record: ResultRecord = { result: this.result, log: [...this.log], duration: this.duration };
    if (this.note !== null) record.note = this.note;
    return record;
  }

  static total(results: Result[]): Record<ResultOutcome, number> {
    const stats: Record<ResultOutcome, number> = { pass: 0, fail: 0, info: 0, warn: 0, error: 0 };
    for (const result of results) stats[result.result]++;
    return stats;
  }

  /** Human readable count breakdown, e.g. `2 tests passed and 1 error`. */
  static summary(results: Result[]): string {
    const stats = Result.total(results);
    const comments: string[] = [];
    if (stats.pass) comments.push(`${listed(stats.pass, 'test')} passed`);
    if (stats.fail) comments.push(`${listed(stats.fail, 'test')} failed`);
    if (stats.info) comments.push(listed(stats.info, 'info'));
    if (stats.warn) comments.push(listed(stats.warn, 'warn'));
    if (stats.error) comments.push(listed(stats.error, 'error'));
    return joinListed(comments.length > 0 ? comments : ['no results found']);
  }
}
