import dayjs from "dayjs";
import timezone from "dayjs/plugin/timezone.js";
import utc from "dayjs/plugin/utc.js";

dayjs.extend(utc);
dayjs.extend(timezone);

export type Moment = dayjs.Dayjs;

export const WALL_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

export function nowIn(tz: string, now: Date): Moment {
  return dayjs(now).tz(tz);
}

/**
 * Reads a `YYYY-MM-DDTHH:MM:SS` wall time in `tz`, or an ISO timestamp that
 * carries its own offset (as stored in task requests). Returns null when the
 * text is neither.
 */
export function parseWallTime(text: string, tz: string): Moment | null {
  const trimmed = text.trim();
  if (WALL_TIME_PATTERN.test(trimmed)) {
    const parsed = dayjs.tz(trimmed, tz);
    return parsed.isValid() && formatWallTime(parsed) === trimmed ? parsed : null;
  }

  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/.test(trimmed)) {
    const parsed = dayjs(trimmed);
    return parsed.isValid() ? parsed.tz(tz) : null;
  }

  return null;
}

export function formatWallTime(moment: Moment): string {
  return moment.format("YYYY-MM-DDTHH:mm:ss");
}

export function formatDisplayTime(moment: Moment): string {
  return moment.format("YYYY-MM-DD HH:mm");
}

/** The moment on `day` (in `tz`) whose wall clock reads `clock` (a moment or "HH:mm:ss"). */
export function atClock(day: Moment, clock: Moment | string, tz: string): Moment {
  const wall = typeof clock === "string" ? clock : clock.format("HH:mm:ss");
  return dayjs.tz(`${day.format("YYYY-MM-DD")}T${wall}`, tz);
}

// Today's occurrence of the clock time, or tomorrow's when today's is not in the future.
export function nextDailyOccurrence(clock: Moment, now: Moment, tz: string): Moment {
  const today = atClock(now, clock, tz);
  return today.isAfter(now) ? today : atClock(now.add(1, "day"), clock, tz);
}
