import { Test, type TestMetadata } from './test.js';

export interface Discover {
  tests(): Test[];
}

/** Discover backed by test metadata already present in the plan. */
export class StaticDiscover implements Discover {
  private readonly discovered: Test[];

  constructor(metadata: TestMetadata[]) {
    this.discovered = metadata.map(m => new Test(m));
  }

  tests(): Test[] {
    return this.discovered;
  }
}

export { Test, DEFAULT_TEST_DURATION } from './test.js';
export type { TestMetadata, TestFramework } from './test.js';
