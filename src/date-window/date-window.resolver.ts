import { Injectable } from '@nestjs/common';
import { DateTime, DurationLikeObject, IANAZone } from 'luxon';
import { MAX_LOOKBACK_DAYS } from '../config/router.config';
import { UnparseableWindowError, WindowOutOfRangeError } from '../common/errors';
import { DateWindow, Daypart } from '../common/types';

type PeriodUnit = 'day' | 'week' | 'month';

interface Span {
  from: DateTime;
  to: DateTime;
}

const WEEKDAYS: Record<string, number> = {
  monday: 1, mon: 1,
  tuesday: 2, tue: 2, tues: 2,
  wednesday: 3, wed: 3,
  thursday: 4, thu: 4, thur: 4, thurs: 4,
  friday: 5, fri: 5,
  saturday: 6, sat: 6,
  sunday: 7, sun: 7,
};

const MONTHS: Record<string, number> = {
  january: 1, jan: 1,
  february: 2, feb: 2,
  march: 3, mar: 3,
  april: 4, apr: 4,
  may: 5,
  june: 6, jun: 6,
  july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  october: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};

const NUMBER_WORDS: Record<string, number> = {
  a: 1, an: 1, one: 1, two: 2, three: 3, four: 4, five: 5, six: 6,
  seven: 7, eight: 8, nine: 9, ten: 10, eleven: 11, twelve: 12,
};

const DAYPART_HOURS: Record<Daypart, [number, number]> = {
  morning: [8, 12],
  afternoon: [12, 17],
  evening: [17, 21],
};

const RANGE_SEPARATOR = /\s+(?:to|through|thru|until|till)\s+|\s+-\s+/;
const ROLLING_PERIOD = /^(?:last|past|previous)\s+(?:(\d+|[a-z]+)\s+)?(day|week|month)s?$/;

/**
 * Turns phrases like "yesterday", "past 2 weeks" or "July 1 to July 7" into
 * a bounded window in the caller's timezone. Weeks start on Monday. Every
 * window is clamped so that it never reaches further back than
 * MAX_LOOKBACK_DAYS before `referenceNow`, and never ends after it.
 */
@Injectable()
export class DateWindowResolver {
  readonly maxLookbackDays = MAX_LOOKBACK_DAYS;

  resolve(phrase: string, referenceNow: Date, timezone: string): DateWindow {
    if (!IANAZone.isValidZone(timezone)) {
      throw new UnparseableWindowError(phrase, `Unknown timezone '${timezone}'.`);
    }

    const now = DateTime.fromJSDate(referenceNow, { zone: timezone });
    const span = this.match(normalizePhrase(phrase), now);
    if (!span) {
      throw new UnparseableWindowError(phrase);
    }

    return this.clamp(phrase, span, now, timezone);
  }

  /**
   * Restricts a window to one part of its first day. The result never
   * extends past the original window.
   */
  narrowToDaypart(window: DateWindow, daypart: Daypart): DateWindow {
    const [startHour, endHour] = DAYPART_HOURS[daypart];
    const day = DateTime.fromJSDate(window.startsAt, { zone: window.timezone }).startOf('day');

    const windowStart = window.startsAt.getTime();
    const windowEnd = window.endsAt.getTime();
    const to = Math.min(day.set({ hour: endHour }).toMillis(), windowEnd);
    const from = Math.min(Math.max(day.set({ hour: startHour }).toMillis(), windowStart), to);

    const date = isoDate(day, daypart);
    return Object.freeze({
      start: date,
      end: date,
      timezone: window.timezone,
      startsAt: new Date(from),
      endsAt: new Date(to),
    });
  }

  private match(text: string, now: DateTime): Span | null {
    const today = now.startOf('day');

    switch (text) {
      case 'today':
        return { from: today, to: now };
      case 'yesterday':
      case 'yday': {
        const day = today.minus({ days: 1 });
        return wholeDay(day);
      }
      case 'this week':
        return { from: now.startOf('week'), to: now };
      case 'last week':
      case 'previous week': {
        const start = now.startOf('week').minus({ weeks: 1 });
        return { from: start, to: start.endOf('week') };
      }
      case 'this month':
        return { from: now.startOf('month'), to: now };
      case 'last month':
      case 'previous month': {
        const start = now.startOf('month').minus({ months: 1 });
        return { from: start, to: start.endOf('month') };
      }
    }

    const rolling = ROLLING_PERIOD.exec(text);
    if (rolling) {
      const count = parseCount(rolling[1]);
      if (count === null) {
        return null;
      }
      return { from: now.minus(periodOf(count, asPeriodUnit(rolling[2]))), to: now };
    }

    const weekday = /^(?:last\s+)?([a-z]+)$/.exec(text);
    if (weekday && WEEKDAYS[weekday[1]] !== undefined) {
      // most recent past occurrence, never today
      const delta = (now.weekday - WEEKDAYS[weekday[1]] + 7) % 7 || 7;
      return wholeDay(today.minus({ days: delta }));
    }

    const parts = text.split(RANGE_SEPARATOR);
    if (parts.length === 2) {
      const range = rangeSpan(parts[0], parts[1], now);
      if (range) {
        return range;
      }
    }

    const compactRange = /^([a-z]+)\s+(\d{1,2})\s*-\s*(\d{1,2})$/.exec(text);
    if (compactRange) {
      const range = rangeSpan(`${compactRange[1]} ${compactRange[2]}`, `${compactRange[1]} ${compactRange[3]}`, now);
      if (range) {
        return range;
      }
    }

    const month = monthSpan(text, now);
    if (month) {
      return month;
    }

    const single = parseDay(text, now);
    return single ? wholeDay(single) : null;
  }

  private clamp(phrase: string, span: Span, now: DateTime, timezone: string): DateWindow {
    const earliest = now.minus({ hours: 24 * this.maxLookbackDays });
    const to = span.to.toMillis() > now.toMillis() ? now : span.to;

    if (span.from.toMillis() > to.toMillis()) {
      throw new UnparseableWindowError(phrase, `I couldn't resolve the time window '${phrase}'.`);
    }
    if (to.toMillis() < earliest.toMillis()) {
      throw new WindowOutOfRangeError(phrase, this.maxLookbackDays);
    }

    const from = span.from.toMillis() < earliest.toMillis() ? earliest : span.from;
    return Object.freeze({
      start: isoDate(from, phrase),
      end: isoDate(to, phrase),
      timezone,
      startsAt: from.toJSDate(),
      endsAt: to.toJSDate(),
    });
  }
}

export function normalizePhrase(phrase: string): string {
  let text = phrase
    .toLowerCase()
    .trim()
    .replace(/(\d+)(st|nd|rd|th)\b/g, '$1')
    .replace(/,/g, ' ')
    .replace(/[?.!]+$/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  let previous: string;
  do {
    previous = text;
    text = text.replace(/^(?:on|from|in|during|for|over|the)\s+/, '');
  } while (text !== previous);

  return text;
}

function wholeDay(day: DateTime): Span {
  return { from: day.startOf('day'), to: day.endOf('day') };
}

function parseCount(token: string | undefined): number | null {
  if (token === undefined) {
    return 1;
  }
  const count = /^\d+$/.test(token) ? Number(token) : NUMBER_WORDS[token];
  return count !== undefined && count > 0 ? count : null;
}

function asPeriodUnit(token: string): PeriodUnit {
  return token === 'week' || token === 'month' ? token : 'day';
}

function periodOf(count: number, unit: PeriodUnit): DurationLikeObject {
  switch (unit) {
    case 'day':
      return { days: count };
    case 'week':
      return { weeks: count };
    case 'month':
      return { months: count };
  }
}

function monthSpan(text: string, now: DateTime): Span | null {
  const withYear = /^([a-z]+)(?:\s+(\d{4}))?$/.exec(text);
  if (!withYear || MONTHS[withYear[1]] === undefined) {
    return null;
  }

  const month = MONTHS[withYear[1]];
  const year = withYear[2] ? Number(withYear[2]) : month <= now.month ? now.year : now.year - 1;
  const start = DateTime.fromObject({ year, month, day: 1 }, { zone: now.zone });
  return start.isValid ? { from: start, to: start.endOf('month') } : null;
}

interface DayParts {
  year?: number;
  month: number;
  day: number;
}

function dayParts(value: string): DayParts | null {
  const text = value.trim();
  let match: RegExpExecArray | null;
  if ((match = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/.exec(text))) {
    return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  }
  if ((match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text))) {
    return { year: Number(match[3]), month: Number(match[2]), day: Number(match[1]) };
  }
  if ((match = /^([a-z]+)\s+(\d{1,2})(?:\s+(\d{4}))?$/.exec(text)) && MONTHS[match[1]] !== undefined) {
    return { year: match[3] ? Number(match[3]) : undefined, month: MONTHS[match[1]], day: Number(match[2]) };
  }
  if ((match = /^(\d{1,2})\s+([a-z]+)(?:\s+(\d{4}))?$/.exec(text)) && MONTHS[match[2]] !== undefined) {
    return { year: match[3] ? Number(match[3]) : undefined, month: MONTHS[match[2]], day: Number(match[1]) };
  }
  return null;
}

function atDay(year: number, { month, day }: DayParts, now: DateTime): DateTime | null {
  const date = DateTime.fromObject({ year, month, day }, { zone: now.zone });
  return date.isValid ? date : null;
}

/**
 * Parses one calendar day. Without a year the current year is assumed,
 * falling back one year when that date has not happened yet.
 */
export function parseDay(value: string, now: DateTime): DateTime | null {
  const parts = dayParts(value);
  if (!parts) {
    return null;
  }
  if (parts.year !== undefined) {
    return atDay(parts.year, parts, now);
  }

  const candidate = atDay(now.year, parts, now);
  if (candidate && candidate.toMillis() <= now.toMillis()) {
    return candidate;
  }
  return atDay(now.year - 1, parts, now);
}

/**
 * Both ends of a range share one year unless they name their own, so an end
 * after `now` is capped later instead of moving to another year. Reversed
 * ends are swapped, except December-to-January style ranges, which wrap.
 */
function rangeSpan(firstText: string, secondText: string, now: DateTime): Span | null {
  const first = dayParts(firstText);
  const second = dayParts(secondText);
  if (!first || !second) {
    return null;
  }

  const year = first.year ?? second.year ?? now.year;
  const firstYear =
    first.year ?? (second.year !== undefined && first.month > second.month ? second.year - 1 : year);
  let from = atDay(firstYear, first, now);
  let to = atDay(second.year ?? year, second, now);
  if (!from || !to) {
    return null;
  }

  if (to.toMillis() < from.toMillis()) {
    if (second.year === undefined && from.month - to.month > 6) {
      to = to.plus({ years: 1 });
    } else {
      [from, to] = [to, from];
    }
  }

  if (first.year === undefined && second.year === undefined && from.toMillis() > now.toMillis()) {
    from = from.minus({ years: 1 });
    to = to.minus({ years: 1 });
  }
  return { from, to: to.endOf('day') };
}

function isoDate(value: DateTime, phrase: string): string {
  const iso = value.toISODate();
  if (iso === null) {
    throw new UnparseableWindowError(phrase);
  }
  return iso;
}
