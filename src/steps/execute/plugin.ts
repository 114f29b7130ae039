import fs from 'fs/promises';
import path from 'path';
import { stringify as stringifyYaml } from 'yaml';
import { Result, isResultOutcome, type ResultData } from '../../result.js';
import { GuestrunError, GuestrunErrorCode } from '../../shared/errors.js';
import { PROCESS_TIMEOUT } from '../../shared/exec.js';
import { formatDuration } from '../../shared/format.js';
import type { Discover, Test, TestFramework } from '../../discover/index.js';
import type { Guest } from '../../guest/types.js';
import { Plugin, type StepContext } from '../plugin.js';
import type { Script } from './script.js';

// Test data directory name
export const TEST_DATA = 'data';

// The main test output filename
export const TEST_OUTPUT_FILENAME = 'output.txt';

export const TEST_JOURNAL_FILENAME = 'journal.txt';
export const BEAKERLIB_RESULTS_FILENAME = 'TestResults';
export const TEST_METADATA_FILENAME = 'metadata.yaml';

// Shipped helper scripts, copied to guests by prepareScripts()
export const SCRIPTS_SRC_DIR = path.join(__dirname, 'scripts');

export interface ExecuteContext extends StepContext {
  readonly discover: Discover;
  // Framework used for tests which do not set one
  readonly framework: TestFramework;
  write(name: string, content: string, options?: { append?: boolean }): Promise<void>;
}

export interface DataPathOptions {
  filename?: string;
  // Absolute path instead of one relative to the step workdir
  full?: boolean;
  create?: boolean;
}

/** Common parent of execute plugins. */
export abstract class ExecutePlugin extends Plugin<ExecuteContext> {
  readonly scripts: readonly Script[] = [];

  /** Results of the tests run by the last `go()` call. */
  abstract results(): Result[];

  async go(guest: Guest): Promise<void> {
    this.log.info({ guest: guest.name, exitFirst: this.exitFirst }, `exit-first ${this.exitFirst}`);
  }

  get exitFirst(): boolean {
    return this.flag('exit-first');
  }

  /**
   * Test data directory of the test, or a file inside it. Directories are
   * always absolute, files relative to the step workdir unless `full`.
   */
  async dataPath(test: Test, options: DataPathOptions = {}): Promise<string> {
    const directory = path.join(this.step.workdir, TEST_DATA, test.name.replace(/^\/+/, ''));
    if (options.create) {
      // recursive mkdir is a no-op for existing directories
      await fs.mkdir(path.join(directory, TEST_DATA), { recursive: true });
    }
    if (!options.filename) return directory;
    const filePath = path.join(directory, options.filename);
    return options.full ? filePath : path.relative(this.step.workdir, filePath);
  }

  /** Write `metadata.yaml` for every discovered test and return the tests. */
  async prepareTests(): Promise<Test[]> {
    const tests = this.step.discover.tests();
    for (const test of tests) {
      const metadataPath = await this.dataPath(test, { filename: TEST_METADATA_FILENAME, full: true, create: true });
      await this.step.write(metadataPath, stringifyYaml(test.metadata()));
    }
    return tests;
  }

  /** Install the helper scripts, and all their aliases, on the guest. */
  async prepareScripts(guest: Guest): Promise<void> {
    if (this.scripts.length === 0) {
      throw new GuestrunError(GuestrunErrorCode.EXECUTE_ERROR, `No scripts to install for the '${this.how}' method.`);
    }
    for (const script of this.scripts) {
      const source = path.join(SCRIPTS_SRC_DIR, path.basename(script.path));
      for (const destination of [script.path, ...script.aliases]) {
        await guest.push(source, destination, { mode: 0o755 });
      }
    }
  }

  /** Classify a shell test by its exit code. */
  async checkShell(test: Test): Promise<Result> {
    const data: ResultData = {
      result: 'error',
      log: await this.dataPath(test, { filename: TEST_OUTPUT_FILENAME }),
      duration: test.realDuration,
    };
    if (test.returncode === 0) {
      data.result = 'pass';
    } else if (test.returncode === 1) {
      data.result = 'fail';
    } else if (test.returncode === PROCESS_TIMEOUT) {
      data.note = 'timeout';
      await this.timeoutHint(test);
    }
    this.log.info({ test: test.name, returncode: test.returncode, result: data.result }, `${data.result} ${test.name}`);
    return new Result(test.name, data, test.result);
  }

  /** Classify a beakerlib test from the `TestResults` file it left behind. */
  async checkBeakerlib(test: Test): Promise<Result> {
    const logs: string[] = [];
    for (const filename of [TEST_OUTPUT_FILENAME, TEST_JOURNAL_FILENAME]) {
      if (await isFile(await this.dataPath(test, { filename, full: true }))) {
        logs.push(await this.dataPath(test, { filename }));
      }
    }
    const data: ResultData = { result: 'error', log: logs, duration: test.realDuration };
    const finish = (): Result => {
      this.log.info({ test: test.name, result: data.result, note: data.note }, `${data.result} ${test.name}`);
      return new Result(test.name, data, test.result);
    };

    const resultsFile = await this.dataPath(test, { filename: BEAKERLIB_RESULTS_FILENAME, full: true });
    let content: string;
    try {
      content = await fs.readFile(resultsFile, 'utf-8');
    } catch (err) {
      this.log.debug({ resultsFile, cause: err instanceof Error ? err.message : String(err) }, 'unable to read beakerlib results');
      data.note = 'beakerlib: TestResults FileError';
      return finish();
    }

    const resultMatch = /TESTRESULT_RESULT_STRING=(.*)/.exec(content);
    // States are started, incomplete and complete; the value may be quoted
    const stateMatch = /TESTRESULT_STATE="?(\w+)"?/.exec(content);
    if (!resultMatch || !stateMatch) {
      this.log.debug({ resultsFile }, 'no result or state found');
      data.note = 'beakerlib: Result/State missing';
      return finish();
    }
    const rawResult = resultMatch[1].trim().replace(/^"(.*)"$/, '$1');
    const state = stateMatch[1];

    if (test.returncode === PROCESS_TIMEOUT) {
      data.note = 'timeout';
      await this.timeoutHint(test);
    } else if (state !== 'complete') {
      data.note = `beakerlib: State '${state}'`;
    } else {
      const outcome = rawResult.toLowerCase();
      if (isResultOutcome(outcome)) {
        data.result = outcome;
      } else {
        data.note = `beakerlib: Result '${rawResult}'`;
      }
    }
    return finish();
  }

  /** Classify according to the test framework. */
  async check(test: Test): Promise<Result> {
    const framework = test.framework ?? this.step.framework;
    return framework === 'beakerlib' ? this.checkBeakerlib(test) : this.checkShell(test);
  }

  /** Append a hint about raising the test duration to the test output. */
  async timeoutHint(test: Test): Promise<void> {
    const output = await this.dataPath(test, { filename: TEST_OUTPUT_FILENAME, full: true });
    const hint =
      `\nMaximum test time '${test.duration}' exceeded.\n` +
      `Adjust the test 'duration' attribute if necessary.\n`;
    this.log.info({ test: test.name, duration: test.duration }, 'maximum test time exceeded');
    await this.step.write(output, hint, { append: true });
  }

  static testDuration(startMs: number, endMs: number): string {
    return formatDuration(endMs - startMs);
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
