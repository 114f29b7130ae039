import path from 'path';
import type { Result } from '../../result.js';
import type { Test } from '../../discover/index.js';
import type { Guest } from '../../guest/types.js';
import { durationToSeconds } from '../../shared/format.js';
import { ExecutePlugin, TEST_DATA, TEST_OUTPUT_FILENAME } from './plugin.js';
import { FILE_SUBMIT_SCRIPT, REPORT_RESULT_SCRIPT } from './script.js';

export const REPORTED_RESULTS_FILENAME = 'reported-results.txt';

/**
 * Default executor: runs the discovered tests one by one on each guest
 * and classifies them by framework.
 */
export class ExecuteInternal extends ExecutePlugin {
  readonly scripts = [REPORT_RESULT_SCRIPT, FILE_SUBMIT_SCRIPT];
  private _results: Result[] = [];

  async go(guest: Guest): Promise<void> {
    await super.go(guest);
    this._results = [];

    await this.prepareScripts(guest);
    const tests = await this.prepareTests();
    for (const [index, test] of tests.entries()) {
      this.log.info({ guest: guest.name, test: test.name }, `test ${index + 1}/${tests.length}: ${test.name}`);
      const result = await this.executeTest(test, guest);
      this._results.push(result);
      if (this.exitFirst && (result.result === 'fail' || result.result === 'error')) {
        this.log.info({ test: test.name, result: result.result }, 'stopping after the first failure (exit-first)');
        break;
      }
    }
  }

  results(): Result[] {
    return [...this._results];
  }

  requires(): string[] {
    const frameworks = new Set(this.step.discover.tests().map(t => t.framework ?? this.step.framework));
    return frameworks.has('beakerlib') ? ['beakerlib'] : [];
  }

  private async executeTest(test: Test, guest: Guest): Promise<Result> {
    const directory = await this.dataPath(test, { create: true });
    const environment: Record<string, string> = {
      GUESTRUN_TEST_NAME: test.name,
      GUESTRUN_TEST_DATA: path.join(directory, TEST_DATA),
      GUESTRUN_REPORT_RESULT_FILE: path.join(directory, TEST_DATA, REPORTED_RESULTS_FILENAME),
      BEAKERLIB_DIR: directory,
      ...test.environment,
    };

    const start = Date.now();
    const outcome = await guest.run(test.command, {
      cwd: test.path,
      env: environment,
      timeoutMs: durationToSeconds(test.duration) * 1000,
    });
    test.realDuration = ExecutePlugin.testDuration(start, Date.now());
    test.returncode = outcome.exitCode;

    const output = [outcome.stdout, outcome.stderr].filter(s => s.length > 0).join('\n');
    await this.step.write(
      await this.dataPath(test, { filename: TEST_OUTPUT_FILENAME, full: true }),
      output.length > 0 ? `${output}\n` : ''
    );
    return this.check(test);
  }
}
