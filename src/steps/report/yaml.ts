import { stringify as stringifyYaml } from 'yaml';
import { Result } from '../../result.js';
import { ReportPlugin } from './plugin.js';

export const DEFAULT_REPORT_FILE = 'report.yaml';

/** Write the results with per-outcome totals into a YAML file. */
export class ReportYaml extends ReportPlugin {
  get file(): string {
    const file = this.data['file'];
    return typeof file === 'string' && file.length > 0 ? file : DEFAULT_REPORT_FILE;
  }

  async go(): Promise<void> {
    const results = this.step.results();
    const report = {
      summary: Result.total(results),
      results: Object.fromEntries(results.map(r => [r.name, r.export()])),
    };
    await this.step.write(this.file, stringifyYaml(report));
    this.log.info({ file: this.file }, `report written to ${this.file}`);
  }
}
