import type { ResultInterpretation } from '../result.js';

export type TestFramework = 'shell' | 'beakerlib';

export const DEFAULT_TEST_DURATION = '5m';

export interface TestMetadata {
  name: string;
  test: string;
  framework?: TestFramework;
  duration?: string;
  result?: ResultInterpretation;
  environment?: Record<string, string>;
  path?: string;
  summary?: string;
  tags?: string[];
  require?: string[];
}

/**
 * A discovered test. Metadata is fixed at discovery time; `returncode` and
 * `realDuration` are filled in by the executor after each run.
 */
export class Test {
  readonly name: string;
  readonly command: string;
  readonly framework?: TestFramework;
  readonly duration: string;
  readonly result: ResultInterpretation;
  readonly environment: Record<string, string>;
  readonly path?: string;
  private readonly raw: TestMetadata;

  returncode: number | null = null;
  realDuration: string | null = null;

  constructor(metadata: TestMetadata) {
    this.raw = metadata;
    this.name = metadata.name;
    this.command = metadata.test;
    this.framework = metadata.framework;
    this.duration = metadata.duration ?? DEFAULT_TEST_DURATION;
    this.result = metadata.result ?? 'respect';
    this.environment = { ...(metadata.environment ?? {}) };
    this.path = metadata.path;
  }

  /** Full flat metadata record, defaults applied. */
  metadata(): Record<string, unknown> {
    return {
      ...this.raw,
      duration: this.duration,
      result: this.result,
      environment: this.environment,
    };
  }
}
