export enum GuestrunErrorCode {
  SPECIFICATION_ERROR = 'SPECIFICATION_ERROR',
  EXECUTE_ERROR = 'EXECUTE_ERROR',
  FILE_ERROR = 'FILE_ERROR',
  GUEST_ERROR = 'GUEST_ERROR',
}

export class GuestrunError extends Error {
  readonly code: GuestrunErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GuestrunErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GuestrunError';
    this.code = code;
    this.context = context;
  }
}

export function isErrnoException(err: unknown, code?: string): err is NodeJS.ErrnoException {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return code === undefined || err.code === code;
}
