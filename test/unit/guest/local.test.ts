import fs from 'fs/promises';
import path from 'path';
import { LocalGuest } from '../../../src/guest/local.js';
import { PROCESS_TIMEOUT } from '../../../src/shared/exec.js';
import { GuestrunErrorCode } from '../../../src/shared/errors.js';
import { makeWorkdir, removeWorkdir } from '../../helpers/plan.js';

describe('LocalGuest', () => {
  let workdir: string;
  const guest = new LocalGuest({ name: 'localhost', role: 'client' });

  beforeEach(async () => {
    workdir = await makeWorkdir();
  });

  afterEach(async () => {
    await removeWorkdir(workdir);
  });

  it('is always ready', () => {
    expect(guest.isReady()).toBe(true);
    expect(guest.name).toBe('localhost');
    expect(guest.role).toBe('client');
    expect(new LocalGuest().name).toBe('default-0');
  });

  it('returns the exit code and output of a command', async () => {
    const result = await guest.run('echo out; echo err >&2; exit 3');
    expect(result).toEqual({ exitCode: 3, stdout: 'out', stderr: 'err' });
  });

  it('runs in the given directory with extra environment', async () => {
    const result = await guest.run('echo "$PWD $GREETING"', { cwd: workdir, env: { GREETING: 'hi' } });
    expect(result.stdout).toBe(`${await fs.realpath(workdir)} hi`);
  });

  it('reports the timeout exit code when the command runs too long', async () => {
    const result = await guest.run('sleep 5', { timeoutMs: 200 });
    expect(result.exitCode).toBe(PROCESS_TIMEOUT);
  });

  it('copies files under its root with the requested mode', async () => {
    const rooted = new LocalGuest({ root: path.join(workdir, 'guest') });
    const source = path.join(workdir, 'script.sh');
    await fs.writeFile(source, '#!/bin/bash\necho ok\n');
    await rooted.push(source, '/usr/local/bin/hello', { mode: 0o755 });

    const installed = path.join(workdir, 'guest', 'usr', 'local', 'bin', 'hello');
    expect(await fs.readFile(installed, 'utf-8')).toBe('#!/bin/bash\necho ok\n');
    expect((await fs.stat(installed)).mode & 0o777).toBe(0o755);
  });

  it('finds pushed commands before those of the host', async () => {
    const rooted = new LocalGuest({ root: path.join(workdir, 'guest') });
    const source = path.join(workdir, 'script.sh');
    await fs.writeFile(source, '#!/bin/bash\necho ok\n');
    await rooted.push(source, '/usr/local/bin/hello', { mode: 0o755 });

    expect(await rooted.run('hello')).toEqual({ exitCode: 0, stdout: 'ok', stderr: '' });
  });

  it('skips pushes without a root', async () => {
    const source = path.join(workdir, 'script.sh');
    await fs.writeFile(source, 'echo ok\n');
    await guest.push(source, path.join(workdir, 'copy.sh'));
    await expect(fs.stat(path.join(workdir, 'copy.sh'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('raises a guest error when the source is missing', async () => {
    const rooted = new LocalGuest({ root: path.join(workdir, 'guest') });
    await expect(rooted.push(path.join(workdir, 'missing'), '/dest')).rejects.toMatchObject({
      code: GuestrunErrorCode.GUEST_ERROR,
    });
  });
});
