import fs from 'fs/promises';
import path from 'path';
import { Plan, loadPlan } from '../../src/plan.js';
import { StaticDiscover } from '../../src/discover/index.js';
import { LocalGuest } from '../../src/guest/local.js';
import { FakeGuest, exitCodeHandler } from '../helpers/fake-guest.js';
import { makeWorkdir, removeWorkdir } from '../helpers/plan.js';

const FIXTURE = path.join(__dirname, '../fixtures/smoke-plan.yaml');

describe('Plan', () => {
  let workdir: string;

  beforeEach(async () => {
    workdir = await makeWorkdir();
  });

  afterEach(async () => {
    await removeWorkdir(workdir);
  });

  const discover = () =>
    new StaticDiscover([
      { name: '/one', test: 'exit 0' },
      { name: '/two', test: 'exit 1' },
    ]);

  it('executes and reports on every guest', async () => {
    const guests = [new FakeGuest({ name: 'a', handler: exitCodeHandler }), new FakeGuest({ name: 'b', handler: exitCodeHandler })];
    const plan = await Plan.create({ workdir, discover: discover(), guests });
    expect(plan.resuming).toBe(false);

    const results = await plan.go();
    expect(results.map(r => r.result)).toEqual(['pass', 'fail', 'pass', 'fail']);
    expect(plan.execute.status()).toBe('done');
    expect(plan.report.status()).toBe('done');
    expect(await plan.report.go()).toBe('2 tests passed and 2 tests failed');
  });

  it('resumes from the workdir without running tests again', async () => {
    const guest = new FakeGuest({ handler: exitCodeHandler });
    await (await Plan.create({ workdir, discover: discover(), guests: [guest] })).go();
    expect(guest.commands).toHaveLength(2);

    const resumed = await Plan.create({ workdir, discover: discover(), guests: [guest] });
    expect(resumed.resuming).toBe(true);
    const results = await resumed.go();
    expect(guest.commands).toHaveLength(2);
    expect(results.map(r => [r.name, r.result])).toEqual([
      ['/one', 'pass'],
      ['/two', 'fail'],
    ]);
  });

  it('restores one result per test name when resuming a run on several guests', async () => {
    const guests = () => [
      new FakeGuest({ name: 'a', handler: exitCodeHandler }),
      new FakeGuest({ name: 'b', handler: exitCodeHandler }),
    ];
    await (await Plan.create({ workdir, discover: discover(), guests: guests() })).go();

    const resumed = await Plan.create({ workdir, discover: discover(), guests: guests() });
    const results = await resumed.go();
    expect(results.map(r => r.name)).toEqual(['/one', '/two']);
    expect(await resumed.report.go()).toBe('1 test passed and 1 test failed');
  });

  it('collects requirements from both steps', async () => {
    const plan = await Plan.create({
      workdir,
      discover: new StaticDiscover([{ name: '/b', test: './runtest.sh', framework: 'beakerlib' }]),
      guests: [],
    });
    await plan.execute.wake();
    await plan.report.wake();
    expect(plan.requires()).toEqual(['beakerlib']);
  });

  it('runs a plan file with deprecated method and exit-first', async () => {
    const guest = new FakeGuest({ handler: command => ({ exitCode: command === 'false' ? 1 : 0, stdout: '', stderr: '' }) });
    const plan = await loadPlan(FIXTURE, { guests: [guest], workdir });
    expect(plan.execute.framework).toBe('shell');
    expect(plan.execute.configuration()).toEqual([{ how: 'tmt', name: 'default-0', 'exit-first': true }]);

    const results = await plan.go();
    expect(results.map(r => [r.name, r.result])).toEqual([
      ['/smoke/true', 'pass'],
      ['/smoke/false', 'fail'],
    ]);
    await expect(fs.stat(path.join(workdir, 'report', 'report.yaml'))).resolves.toBeTruthy();
  });

  describe('on the local host', () => {
    it('installs helper scripts under the guest root and runs the tests', async () => {
      const root = path.join(workdir, 'guest');
      const plan = await Plan.create({
        workdir,
        discover: new StaticDiscover([
          { name: '/installed', test: 'command -v rstrnt-report-result' },
          { name: '/failing', test: 'exit 1' },
        ]),
        guests: [new LocalGuest({ root })],
      });

      const results = await plan.go();
      expect(results.map(r => [r.name, r.result])).toEqual([
        ['/installed', 'pass'],
        ['/failing', 'fail'],
      ]);
      const installed = path.join(root, 'usr', 'local', 'bin', 'guestrun-report-result');
      expect((await fs.stat(installed)).mode & 0o777).toBe(0o755);
    });

    it('runs without touching the host filesystem when no root is given', async () => {
      const plan = await Plan.create({
        workdir,
        discover: new StaticDiscover([{ name: '/true', test: 'true' }]),
        guests: [new LocalGuest()],
      });

      const results = await plan.go();
      expect(results.map(r => [r.name, r.result])).toEqual([['/true', 'pass']]);
    });
  });
});
