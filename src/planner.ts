import { ValidationError } from "./errors.js";
import type { FetchCheckpoint, FetchWindow } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PlanOptions {
  startDate: Date;
  checkpoint?: FetchCheckpoint;
  now: Date;
  widthDays: number;
  /** ignore the checkpoint and replan from startDate */
  force?: boolean;
}

export function parseStartDate(day: string): Date {
  const d = new Date(`${day}T00:00:00.000Z`);
  if (Number.isNaN(d.getTime())) {
    throw new ValidationError(`invalid start date "${day}". expected YYYY-MM-DD`, []);
  }
  return d;
}

/**
 * Half-open [start, end) windows on a grid of `widthDays` anchored at
 * startDate, from the checkpoint (or startDate) up to now. The trailing
 * window may be partial. Lazy: nothing past the current window is computed.
 */
export function* planWindows(opts: PlanOptions): Generator<FetchWindow> {
  const width = opts.widthDays * DAY_MS;
  if (!(width > 0)) {
    throw new ValidationError(`window width must be positive, got ${opts.widthDays}`, []);
  }
  const origin = opts.startDate.getTime();
  const now = opts.now.getTime();

  let from = origin;
  const resumeAt = opts.force ? undefined : opts.checkpoint?.lastWindowEnd;
  if (resumeAt) {
    const resume = Date.parse(resumeAt);
    // clock skew: nothing is due before the checkpoint
    if (now < resume) return;
    from = Math.max(origin, origin + Math.floor((resume - origin) / width) * width);
  }

  let index = Math.round((from - origin) / width);
  while (from < now) {
    const end = from + width;
    if (end > now) {
      yield { index, start: new Date(from), end: new Date(now), complete: false };
      return;
    }
    yield { index, start: new Date(from), end: new Date(end), complete: true };
    from = end;
    index++;
  }
}

/** Only complete windows move the checkpoint, and it never moves backwards. */
export function advanceCheckpoint(checkpoint: FetchCheckpoint, window: FetchWindow): FetchCheckpoint {
  if (!window.complete) return checkpoint;
  const prev = checkpoint.lastWindowEnd;
  if (prev && Date.parse(prev) >= window.end.getTime()) return checkpoint;
  return { ...checkpoint, lastWindowEnd: window.end.toISOString() };
}
