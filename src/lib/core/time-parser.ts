/**
 * Visual Sequencer - 時間指定パーサー
 *
 * 対応形式:
 *   5            - fixed 5 seconds
 *   5-10         - uniform random between 5 and 10 seconds
 *   30s 30m 30min 2h 2std - fixed duration
 *   14:30  1430  - clock time today, tomorrow once passed
 *   +30m  +2h  +2 - relative to step entry (no unit = minutes)
 */

import type { ClockTarget, WaitSpec } from './types';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  min: 60,
  h: 3600,
  std: 3600,
};

export function parseWaitInput(input: string): ParseResult<WaitSpec> {
  const text = input.trim().toLowerCase();
  if (!text) {
    return { ok: false, error: 'empty time' };
  }

  const range = /^(\d+(?:\.\d+)?)\s*-\s*(\d+(?:\.\d+)?)$/.exec(text);
  if (range) {
    const min = parseFloat(range[1]);
    const max = parseFloat(range[2]);
    if (min > max) {
      return { ok: false, error: `range minimum above maximum: ${input}` };
    }
    return { ok: true, value: min === max ? { type: 'fixed', seconds: min } : { type: 'range', min, max } };
  }

  if (/^\d+(?:\.\d+)?$/.test(text) && !/^\d{4}$/.test(text)) {
    const seconds = parseFloat(text);
    return { ok: true, value: seconds === 0 ? { type: 'none' } : { type: 'fixed', seconds } };
  }

  const clock = parseClockInput(text);
  if (!clock.ok) return clock;
  if (clock.value.kind === 'relative' && !text.startsWith('+')) {
    return { ok: true, value: { type: 'fixed', seconds: clock.value.seconds } };
  }
  return { ok: true, value: { type: 'clock', target: clock.value } };
}

/**
 * Parses a clock time (`14:30`, `1430`) or a duration (`+30m`, `90s`).
 * Durations without a `+` must carry a unit.
 */
export function parseClockInput(input: string): ParseResult<ClockTarget> {
  let text = input.trim().toLowerCase();
  if (!text) {
    return { ok: false, error: 'empty time' };
  }

  const hasPlus = text.startsWith('+');
  if (hasPlus) text = text.slice(1);

  const hhmm = /^(\d{1,2}):(\d{2})$/.exec(text) ?? (!hasPlus ? /^(\d{2})(\d{2})$/.exec(text) : null);
  if (hhmm) {
    const hour = parseInt(hhmm[1], 10);
    const minute = parseInt(hhmm[2], 10);
    if (hour > 23 || minute > 59) {
      return { ok: false, error: `invalid clock time: ${input}` };
    }
    return { ok: true, value: { kind: 'time', hour, minute } };
  }

  const duration = /^(\d+(?:\.\d+)?)(s|min|m|std|h)?$/.exec(text);
  if (!duration) {
    return { ok: false, error: `invalid time: ${input}` };
  }

  const unit = duration[2] ?? (hasPlus ? 'm' : undefined);
  if (!unit) {
    return { ok: false, error: `missing unit: use ${text}s, ${text}m or ${text}h` };
  }

  return { ok: true, value: { kind: 'relative', seconds: parseFloat(duration[1]) * UNIT_SECONDS[unit] } };
}

/**
 * Milliseconds from `now` until the target. A clock time at or before `now`
 * rolls over to the next day.
 */
export function msUntil(target: ClockTarget, now: Date = new Date()): number {
  if (target.kind === 'relative') {
    return target.seconds * 1000;
  }

  const at = new Date(now.getTime());
  at.setHours(target.hour, target.minute, 0, 0);
  if (at.getTime() <= now.getTime()) {
    at.setDate(at.getDate() + 1);
  }
  return at.getTime() - now.getTime();
}

/** `h:mm:ss`, or `m:ss` below one hour. */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
  }
  return `${minutes}:${String(secs).padStart(2, '0')}`;
}

export function describeWait(wait: WaitSpec): string {
  switch (wait.type) {
    case 'none':
      return 'immediately';
    case 'fixed':
      return `${wait.seconds}s`;
    case 'range':
      return `${wait.min}-${wait.max}s`;
    case 'pixel':
      return `pixel ${wait.polarity} at (${wait.x}, ${wait.y})`;
    case 'clock':
      return wait.target.kind === 'time'
        ? `until ${String(wait.target.hour).padStart(2, '0')}:${String(wait.target.minute).padStart(2, '0')}`
        : `+${wait.target.seconds}s`;
    case 'delayThenPixel':
      return `${wait.seconds}s, then pixel ${wait.pixel.polarity} at (${wait.pixel.x}, ${wait.pixel.y})`;
  }
}
