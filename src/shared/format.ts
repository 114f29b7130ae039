import { GuestrunError, GuestrunErrorCode } from './errors.js';

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** Convert a duration such as `5m`, `1h 30m` or `90` into seconds. */
export function durationToSeconds(duration: string): number {
  const parts = duration.trim().split(/\s+/).filter(p => p.length > 0);
  if (parts.length === 0) {
    throw new GuestrunError(GuestrunErrorCode.SPECIFICATION_ERROR, `Malformed duration '${duration}'.`);
  }
  let total = 0;
  for (const part of parts) {
    const matched = /^(\d+(?:\.\d+)?)([smhd]?)$/.exec(part);
    if (!matched) {
      throw new GuestrunError(GuestrunErrorCode.SPECIFICATION_ERROR, `Malformed duration '${duration}'.`);
    }
    total += Number(matched[1]) * UNIT_SECONDS[matched[2] || 's'];
  }
  return Math.round(total);
}

/** Format elapsed milliseconds as `HH:MM:SS`. */
export function formatDuration(elapsedMs: number): string {
  const seconds = Math.max(0, Math.floor(elapsedMs / 1000));
  const pad = (n: number) => String(n).padStart(2, '0');
  // Wraps at 24 hours like a time-of-day clock
  const hours = Math.floor(seconds / 3600) % 24;
  return `${pad(hours)}:${pad(Math.floor((seconds % 3600) / 60))}:${pad(seconds % 60)}`;
}

/** `listed(1, 'test')` → `1 test`, `listed(3, 'test')` → `3 tests`. */
export function listed(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/** Join items as `a, b and c`. */
export function joinListed(items: string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}
