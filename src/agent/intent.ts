import type { TaskMode } from "./schema.js";
import { atClock, formatWallTime, nowIn, type Moment } from "../tools/time.js";

export type FeedIntent =
  | { kind: "feed"; deviceName: string | null; feedCount: number }
  | {
      kind: "schedule";
      deviceName: string | null;
      feedCount: number;
      mode: TaskMode;
      /** `YYYY-MM-DDTHH:MM:SS`, or null when the request names a day but no clock time. */
      scheduledTime: string | null;
    }
  | { kind: "list-tasks" }
  | { kind: "delete-task"; taskId: string | null }
  | { kind: "unknown" };

const CN_DIGITS: Record<string, number> = {
  零: 0,
  〇: 0,
  一: 1,
  二: 2,
  两: 2,
  三: 3,
  四: 4,
  五: 5,
  六: 6,
  七: 7,
  八: 8,
  九: 9
};

const NUM = "[0-9]{1,2}|[零〇一二两三四五六七八九十]{1,3}";

const RECURRENCE = /每天|每日|天天|every\s*day|daily/i;
const COLON_CLOCK = /(\d{1,2})[:：](\d{2})/;
const CN_CLOCK = new RegExp(
  `(${NUM})\\s*[点點时時](?:\\s*(半|一刻|三刻|(${NUM})(?![0-9零〇一二两三四五六七八九十]|\\s*份)\\s*分?))?`
);
const RELATIVE_MINUTES = new RegExp(`(${NUM})\\s*分钟(?:之|以)?后`);
const RELATIVE_HOURS = new RegExp(`(${NUM}|半)\\s*个?\\s*(?:小时|钟头)(?:之|以)?后`);
const FEED_COUNT = /(?<![0-9零〇一二两三四五六七八九十百])(\d+|[零〇一二两三四五六七八九十百]+)\s*份/;
const FEED_WORD = /喂|投喂|饲料|feed/i;
const DEVICE_AFTER_GEI = /给\s*([A-Za-z0-9_\-一-龥]+?)\s*(?:投喂|喂食|喂)/;
const DEVICE_LABELLED = /(?:设备|喂食机)\s*([A-Za-z0-9_-]+)/;
const DELETE_TASK = /(?:删除|取消)\s*(?:定时)?(?:投喂|喂食)?任务\s*([0-9a-fA-F-]{6,})?/;
const CANCEL_WORD = /取消|删除|删掉/;
const TASK_EDIT = /(?:修改|更改|改成|不要).*任务|任务.*(?:修改|更改|改成)/;
const TASK_ID = /[0-9a-fA-F]{8}(?:-[0-9a-fA-F]{4}){3}-[0-9a-fA-F]{12}/;
const LIST_TASKS = /(?:查看|查询|列出|显示|有哪些).*任务|任务列表|list\s+tasks/i;

const DAY_WORDS: Array<[RegExp, number]> = [
  [/大后天/, 3],
  [/后天/, 2],
  [/明天|明日|明早|明晚/, 1],
  [/今天|今日|今早|今晚/, 0]
];

/** Parses Arabic digits or a Chinese numeral up to the hundreds. */
export function parseNumber(token: string): number | null {
  const text = token.trim();
  if (/^\d+$/.test(text)) {
    return Number(text);
  }
  if (!/^[零〇一二两三四五六七八九十百]+$/.test(text)) {
    return null;
  }

  let total = 0;
  let digit: number | null = null;
  for (const char of text) {
    if (char === "十") {
      total += (digit ?? 1) * 10;
      digit = null;
    } else if (char === "百") {
      if (digit === null) return null;
      total += digit * 100;
      digit = null;
    } else {
      if (digit !== null && digit !== 0) return null;
      digit = CN_DIGITS[char];
    }
  }
  return total + (digit ?? 0);
}

interface Clock {
  hour: number;
  minute: number;
  /** Midnight at the end of the named day. */
  nextDay: boolean;
}

function adjustForPeriod(text: string, hour: number): { hour: number; nextDay: boolean } {
  if (/晚上|夜里|半夜|今晚|明晚/.test(text) && hour === 12) {
    return { hour: 0, nextDay: true };
  }
  if (/下午|傍晚|晚上|夜里|今晚|明晚/.test(text) && hour < 12) {
    return { hour: hour + 12, nextDay: false };
  }
  if (/中午/.test(text) && hour < 11) {
    return { hour: hour + 12, nextDay: false };
  }
  if (/凌晨|早上|早晨|清晨|上午|今早|明早/.test(text) && hour === 12) {
    return { hour: 0, nextDay: false };
  }
  return { hour, nextDay: false };
}

function parseClock(text: string): Clock | null {
  const colon = COLON_CLOCK.exec(text);
  if (colon) {
    const { hour, nextDay } = adjustForPeriod(text, Number(colon[1]));
    const minute = Number(colon[2]);
    return hour <= 23 && minute <= 59 ? { hour, minute, nextDay } : null;
  }

  const cn = CN_CLOCK.exec(text);
  if (!cn) return null;

  const rawHour = parseNumber(cn[1]);
  if (rawHour === null) return null;

  let minute = 0;
  if (cn[2] === "半") minute = 30;
  else if (cn[2] === "一刻") minute = 15;
  else if (cn[2] === "三刻") minute = 45;
  else if (cn[3]) minute = parseNumber(cn[3]) ?? -1;

  const { hour, nextDay } = adjustForPeriod(text, rawHour);
  return hour <= 23 && minute >= 0 && minute <= 59 ? { hour, minute, nextDay } : null;
}

function parseDayOffset(text: string): number | null {
  for (const [pattern, offset] of DAY_WORDS) {
    if (pattern.test(text)) return offset;
  }
  return null;
}

function parseRelativeMinutes(text: string): number | null {
  const minutes = RELATIVE_MINUTES.exec(text);
  if (minutes) {
    return parseNumber(minutes[1]);
  }

  const hours = RELATIVE_HOURS.exec(text);
  if (hours) {
    if (hours[1] === "半") return 30;
    const value = parseNumber(hours[1]);
    return value === null ? null : value * 60;
  }
  return null;
}

function parseDeviceName(text: string): string | null {
  const match = DEVICE_AFTER_GEI.exec(text) ?? DEVICE_LABELLED.exec(text);
  return match ? match[1] : null;
}

// An unreadable count comes back as 0 so the feed is refused rather than guessed.
function parseFeedCount(text: string): number {
  const match = FEED_COUNT.exec(text);
  if (!match) return 1;
  return parseNumber(match[1]) ?? 0;
}

/**
 * True when the request carries an explicit time reference: a clock time, a
 * relative day or offset, or a recurrence word.
 */
export function hasTimeReference(text: string): boolean {
  return (
    RECURRENCE.test(text) ||
    parseClock(text) !== null ||
    parseDayOffset(text) !== null ||
    parseRelativeMinutes(text) !== null
  );
}

function clockText(clock: Clock): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${pad(clock.hour)}:${pad(clock.minute)}:00`;
}

function resolveOnceTime(text: string, now: Moment, timezone: string): string | null {
  const relative = parseRelativeMinutes(text);
  if (relative !== null) {
    return formatWallTime(now.add(relative, "minute"));
  }

  const clock = parseClock(text);
  if (!clock) return null;

  const wall = clockText(clock);
  const dayOffset = parseDayOffset(text);
  const days = (dayOffset ?? 0) + (clock.nextDay ? 1 : 0);
  let at = atClock(now.add(days, "day"), wall, timezone);

  // A bare clock time that has already passed today means the next one.
  if (dayOffset === null && !at.isAfter(now)) {
    at = atClock(now.add(1, "day"), wall, timezone);
  }
  return formatWallTime(at);
}

function resolveDailyTime(text: string, now: Moment, timezone: string): string | null {
  const clock = parseClock(text);
  if (!clock) return null;
  return formatWallTime(atClock(now, clockText(clock), timezone));
}

/**
 * Classifies a feeding request. No explicit time reference means an immediate
 * feed; a time reference means a scheduled task, `daily` when the request
 * implies recurrence and `once` otherwise.
 */
export function classifyRequest(
  text: string,
  options: { now: Date; timezone: string }
): FeedIntent {
  const normalized = text.trim();

  if (LIST_TASKS.test(normalized)) {
    return { kind: "list-tasks" };
  }

  if (CANCEL_WORD.test(normalized)) {
    const taskId = DELETE_TASK.exec(normalized)?.[1] ?? TASK_ID.exec(normalized)?.[0] ?? null;
    return { kind: "delete-task", taskId };
  }

  // Edits are not handled by the rules; they must never turn into a new feed.
  if (TASK_EDIT.test(normalized)) {
    return { kind: "unknown" };
  }

  if (!FEED_WORD.test(normalized)) {
    return { kind: "unknown" };
  }

  const deviceName = parseDeviceName(normalized);
  const feedCount = parseFeedCount(normalized);

  if (!hasTimeReference(normalized)) {
    return { kind: "feed", deviceName, feedCount };
  }

  const now = nowIn(options.timezone, options.now);
  const mode: TaskMode = RECURRENCE.test(normalized) ? "daily" : "once";
  const scheduledTime =
    mode === "daily"
      ? resolveDailyTime(normalized, now, options.timezone)
      : resolveOnceTime(normalized, now, options.timezone);

  return { kind: "schedule", deviceName, feedCount, mode, scheduledTime };
}
