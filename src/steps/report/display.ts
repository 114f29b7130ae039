import { ReportPlugin } from './plugin.js';

/** Show results on the console, one line per test when verbose. */
export class ReportDisplay extends ReportPlugin {
  private lines: string[] = [];

  get verbose(): number {
    const verbose = this.data['verbose'];
    if (typeof verbose === 'number') return verbose;
    return verbose === true ? 1 : 0;
  }

  async go(): Promise<void> {
    this.lines = [];
    if (this.verbose < 1) return;
    for (const result of this.step.results()) {
      const line = result.note ? `${result.result} ${result.name} (${result.note})` : `${result.result} ${result.name}`;
      this.lines.push(line);
      this.log.info({ test: result.name, result: result.result }, line);
      if (this.verbose > 1) {
        for (const log of result.log) this.log.info({ test: result.name }, `    log ${log}`);
      }
    }
  }

  /** Lines shown by the last `go()` call. */
  displayed(): string[] {
    return [...this.lines];
  }
}
