import { GuestrunError, GuestrunErrorCode, isErrnoException } from '../../../src/shared/errors.js';

describe('GuestrunError', () => {
  it('creates error with code and message', () => {
    const err = new GuestrunError(GuestrunErrorCode.EXECUTE_ERROR, 'No guests available for execution.');
    expect(err.code).toBe(GuestrunErrorCode.EXECUTE_ERROR);
    expect(err.message).toBe('No guests available for execution.');
    expect(err.name).toBe('GuestrunError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new GuestrunError(GuestrunErrorCode.SPECIFICATION_ERROR, 'Bad plan', { records: 2 });
    expect(err.context).toEqual({ records: 2 });
  });
});

describe('isErrnoException', () => {
  it('matches errors carrying the given code', () => {
    const err = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isErrnoException(err)).toBe(true);
    expect(isErrnoException(err, 'ENOENT')).toBe(true);
    expect(isErrnoException(err, 'EACCES')).toBe(false);
  });

  it('matches coded errors that are not Error instances of this realm', () => {
    expect(isErrnoException({ code: 'ENOENT', message: 'missing' }, 'ENOENT')).toBe(true);
  });

  it('rejects errors without a code and non-objects', () => {
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException(null)).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
  });
});
