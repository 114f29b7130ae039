import path from 'path';
import { loadPlanConfig, parsePlanConfig, workdirRoot } from '../../../src/config/loader.js';
import { GuestrunError, GuestrunErrorCode } from '../../../src/shared/errors.js';

const FIXTURE = path.join(__dirname, '../../fixtures/smoke-plan.yaml');

describe('parsePlanConfig', () => {
  it('accepts a single execute record and a list of report records', () => {
    const config = parsePlanConfig(`
execute:
  how: tmt
report:
  - how: display
  - how: yaml
    file: out.yaml
tests:
  - name: /a
    test: ./a.sh
    environment:
      RETRIES: 3
      DEBUG: true
`);
    expect(config.execute).toEqual([{ how: 'tmt' }]);
    expect(config.report).toEqual([{ how: 'display' }, { how: 'yaml', file: 'out.yaml' }]);
    expect(config.tests).toEqual([{ name: '/a', test: './a.sh', environment: { RETRIES: '3', DEBUG: 'true' } }]);
  });

  it('defaults missing sections to empty lists', () => {
    expect(parsePlanConfig('summary: nothing here')).toEqual({
      summary: 'nothing here',
      execute: [],
      report: [],
      tests: [],
    });
    expect(parsePlanConfig('')).toEqual({ summary: undefined, execute: [], report: [], tests: [] });
  });

  it('rejects a test without a command', () => {
    let caught: unknown;
    try {
      parsePlanConfig('tests:\n  - name: /a\n');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GuestrunError);
    expect(caught).toMatchObject({
      code: GuestrunErrorCode.SPECIFICATION_ERROR,
      message: 'Invalid plan in <inline>.',
      context: { issues: ['tests.0.test: Required'] },
    });
  });

  it('rejects an unknown framework', () => {
    expect(() => parsePlanConfig('tests:\n  - name: /a\n    test: x\n    framework: pytest\n')).toThrow(GuestrunError);
  });

  it('rejects duplicate test names', () => {
    expect(() =>
      parsePlanConfig('tests:\n  - name: /a\n    test: x\n  - name: /a\n    test: y\n')
    ).toThrow("Duplicate test name '/a' in <inline>.");
  });

  it('rejects invalid YAML', () => {
    expect(() => parsePlanConfig('execute: [unclosed')).toThrow(GuestrunError);
  });
});

describe('loadPlanConfig', () => {
  it('loads a plan file', async () => {
    const config = await loadPlanConfig(FIXTURE);
    expect(config.summary).toBe('Smoke tests run on the local host');
    expect(config.execute).toEqual([{ how: 'shell.tmt', 'exit-first': true }]);
    expect(config.tests.map(t => t.name)).toEqual(['/smoke/true', '/smoke/false', '/smoke/never']);
  });

  it('reports a missing plan file as a specification error', async () => {
    await expect(loadPlanConfig('/nonexistent/guestrun/plan.yaml')).rejects.toMatchObject({
      code: GuestrunErrorCode.SPECIFICATION_ERROR,
    });
  });
});

describe('workdirRoot', () => {
  const saved = process.env['GUESTRUN_WORKDIR_ROOT'];

  afterEach(() => {
    if (saved === undefined) delete process.env['GUESTRUN_WORKDIR_ROOT'];
    else process.env['GUESTRUN_WORKDIR_ROOT'] = saved;
  });

  it('honours GUESTRUN_WORKDIR_ROOT', () => {
    process.env['GUESTRUN_WORKDIR_ROOT'] = '/var/tmp/guestrun-runs';
    expect(workdirRoot()).toBe('/var/tmp/guestrun-runs');
  });
});
