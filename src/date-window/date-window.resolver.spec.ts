import { Test } from '@nestjs/testing';
import { DateTime } from 'luxon';
import { UnparseableWindowError, WindowOutOfRangeError } from '../common/errors';
import { DateWindowModule } from './date-window.module';
import { DateWindowResolver, normalizePhrase, parseDay } from './date-window.resolver';

// Saturday 2025-09-27 10:00 in London (BST)
const NOW = new Date('2025-09-27T09:00:00.000Z');
const TZ = 'Europe/London';
const CAP_MS = 960 * 60 * 60 * 1000;

describe('DateWindowResolver', () => {
  let resolver: DateWindowResolver;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [DateWindowModule],
    }).compile();

    resolver = moduleRef.get(DateWindowResolver);
  });

  const resolve = (phrase: string) => resolver.resolve(phrase, NOW, TZ);

  describe('relative phrases', () => {
    it('resolves yesterday to the whole previous local day', () => {
      const window = resolve('yesterday');

      expect(window.start).toBe('2025-09-26');
      expect(window.end).toBe('2025-09-26');
      expect(window.timezone).toBe(TZ);
      expect(window.startsAt.toISOString()).toBe('2025-09-25T23:00:00.000Z');
      expect(window.endsAt.toISOString()).toBe('2025-09-26T22:59:59.999Z');
    });

    it('treats yday as yesterday', () => {
      expect(resolve('yday').start).toBe('2025-09-26');
    });

    it('resolves today from local midnight up to now', () => {
      const window = resolve('today');

      expect(window.start).toBe('2025-09-27');
      expect(window.end).toBe('2025-09-27');
      expect(window.startsAt.toISOString()).toBe('2025-09-26T23:00:00.000Z');
      expect(window.endsAt.getTime()).toBe(NOW.getTime());
    });

    it('starts this week on Monday', () => {
      const window = resolve('this week');

      expect(window.start).toBe('2025-09-22');
      expect(window.end).toBe('2025-09-27');
      expect(window.endsAt.getTime()).toBe(NOW.getTime());
    });

    it('resolves last week to the previous Monday through Sunday', () => {
      const window = resolve('last week');

      expect(window.start).toBe('2025-09-15');
      expect(window.end).toBe('2025-09-21');
      expect(window.endsAt.toISOString()).toBe('2025-09-21T22:59:59.999Z');
    });

    it('resolves this month up to now', () => {
      const window = resolve('this month');

      expect(window.start).toBe('2025-09-01');
      expect(window.end).toBe('2025-09-27');
    });

    it('clips last month at the lookback cap', () => {
      const window = resolve('last month');

      expect(window.start).toBe('2025-08-18');
      expect(window.end).toBe('2025-08-31');
    });

    it.each([
      ['past 2 weeks', '2025-09-13'],
      ['past two weeks', '2025-09-13'],
      ['last 3 days', '2025-09-24'],
      ['past week', '2025-09-20'],
      ['previous 10 days', '2025-09-17'],
    ])('resolves rolling period %s', (phrase, start) => {
      const window = resolve(phrase);

      expect(window.start).toBe(start);
      expect(window.end).toBe('2025-09-27');
      expect(window.endsAt.getTime()).toBe(NOW.getTime());
    });

    it('rejects a zero-length rolling period', () => {
      expect(() => resolve('past 0 days')).toThrow(UnparseableWindowError);
    });
  });

  describe('weekdays', () => {
    it.each([
      ['monday', '2025-09-22'],
      ['on Monday', '2025-09-22'],
      ['last friday', '2025-09-26'],
      ['wed', '2025-09-24'],
    ])('resolves %s to its most recent past occurrence', (phrase, date) => {
      const window = resolve(phrase);

      expect(window.start).toBe(date);
      expect(window.end).toBe(date);
    });

    it('never resolves a weekday to today', () => {
      expect(resolve('saturday').start).toBe('2025-09-20');
    });
  });

  describe('explicit dates', () => {
    it.each([
      ['2025-09-25', '2025-09-25'],
      ['2025/09/25', '2025-09-25'],
      ['25/09/2025', '2025-09-25'],
      ['September 20th, 2025', '2025-09-20'],
      ['20 Sept', '2025-09-20'],
      ['sep 1', '2025-09-01'],
    ])('resolves %s to a whole day', (phrase, date) => {
      const window = resolve(phrase);

      expect(window.start).toBe(date);
      expect(window.end).toBe(date);
    });

    it('resolves ranges with either end first', () => {
      const forward = resolve('Sept 20 to Sept 22');
      const reversed = resolve('sept 22 through sept 20');

      expect([forward.start, forward.end]).toEqual(['2025-09-20', '2025-09-22']);
      expect([reversed.start, reversed.end]).toEqual(['2025-09-20', '2025-09-22']);
      expect(forward.endsAt.toISOString()).toBe('2025-09-22T22:59:59.999Z');
    });

    it('resolves a compact day range within one month', () => {
      const window = resolve('september 1-7');

      expect(window.start).toBe('2025-09-01');
      expect(window.end).toBe('2025-09-07');
    });

    it.each([
      ['Sept 20 to Sept 30', '2025-09-20'],
      ['september 20-30', '2025-09-20'],
      ['September 25 - October 3', '2025-09-25'],
    ])('keeps %p in the current year and caps its end at now', (phrase, start) => {
      const window = resolve(phrase);

      expect([window.start, window.end]).toEqual([start, '2025-09-27']);
      expect(window.endsAt).toEqual(NOW);
    });

    it('wraps a range across the new year', () => {
      const window = resolver.resolve('Dec 20 to Jan 5', new Date('2026-01-10T12:00:00.000Z'), TZ);

      expect([window.start, window.end]).toEqual(['2025-12-20', '2026-01-05']);
    });

    it('moves a range that has not started yet back a year', () => {
      expect(() => resolve('Oct 1 to Oct 5')).toThrow('I can only access items from the last 40 days.');
    });

    it('resolves a month name to that month, capped at now', () => {
      const window = resolve('september');

      expect(window.start).toBe('2025-09-01');
      expect(window.end).toBe('2025-09-27');
    });

    it('rolls an omitted year back when the date is still ahead', () => {
      expect(parseDay('september 30', DateTime.fromJSDate(NOW, { zone: TZ }))?.toISODate()).toBe('2024-09-30');
      expect(() => resolve('september 30')).toThrow(WindowOutOfRangeError);
    });

    it('rejects an explicit future date', () => {
      expect(() => resolve('2025-10-01')).toThrow("I couldn't resolve the time window '2025-10-01'.");
    });
  });

  describe('lookback cap', () => {
    it('clamps past 2 months to 40 days back', () => {
      const window = resolve('past 2 months');

      expect(window.start).toBe('2025-08-18');
      expect(window.end).toBe('2025-09-27');
      expect(window.startsAt.toISOString()).toBe('2025-08-18T09:00:00.000Z');
    });

    it('treats exactly 40 days back as inside the cap', () => {
      const window = resolve('past 40 days');

      expect(NOW.getTime() - window.startsAt.getTime()).toBe(CAP_MS);
    });

    it('clips a day that straddles the cap', () => {
      const window = resolve('August 18');

      expect(window.start).toBe('2025-08-18');
      expect(window.startsAt.toISOString()).toBe('2025-08-18T09:00:00.000Z');
      expect(window.endsAt.toISOString()).toBe('2025-08-18T22:59:59.999Z');
    });

    it.each(['August 17', 'July 14', 'december'])('rejects %s as out of range', (phrase) => {
      expect(() => resolve(phrase)).toThrow('I can only access items from the last 40 days.');
    });

    it('reports the cap on the error', () => {
      let caught: unknown;
      try {
        resolve('July 14');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(WindowOutOfRangeError);
      expect(caught).toBeInstanceOf(UnparseableWindowError);
      expect(caught).toMatchObject({ code: 'WINDOW_OUT_OF_RANGE', maxLookbackDays: 40, phrase: 'July 14' });
    });

    it.each([
      'today',
      'yesterday',
      'this week',
      'last week',
      'this month',
      'last month',
      'past 3 months',
      'past 12 weeks',
      'monday',
      'september',
      'Sept 1 to Sept 20',
    ])('keeps %s ordered, in the past and inside the cap', (phrase) => {
      const window = resolve(phrase);

      expect(window.start <= window.end).toBe(true);
      expect(window.startsAt.getTime()).toBeLessThanOrEqual(window.endsAt.getTime());
      expect(window.endsAt.getTime()).toBeLessThanOrEqual(NOW.getTime());
      expect(NOW.getTime() - window.startsAt.getTime()).toBeLessThanOrEqual(CAP_MS);
      expect(Object.isFrozen(window)).toBe(true);
    });
  });

  describe('failures', () => {
    it.each(['tomorrow', 'next week', 'whenever', ''])('rejects %p', (phrase) => {
      expect(() => resolve(phrase)).toThrow(
        `I couldn't understand the time window '${phrase}'. Try 'yesterday', 'last week', or a specific date like 'July 14'.`,
      );
    });

    it('rejects an unknown timezone', () => {
      expect(() => resolver.resolve('today', NOW, 'Mars/Olympus')).toThrow("Unknown timezone 'Mars/Olympus'.");
    });
  });

  describe('narrowToDaypart', () => {
    it('narrows a past day to the afternoon', () => {
      const window = resolver.narrowToDaypart(resolve('monday'), 'afternoon');

      expect(window.start).toBe('2025-09-22');
      expect(window.end).toBe('2025-09-22');
      expect(window.startsAt.toISOString()).toBe('2025-09-22T11:00:00.000Z');
      expect(window.endsAt.toISOString()).toBe('2025-09-22T16:00:00.000Z');
    });

    it('never extends past the original window', () => {
      const window = resolver.narrowToDaypart(resolve('today'), 'morning');

      expect(window.startsAt.toISOString()).toBe('2025-09-27T07:00:00.000Z');
      expect(window.endsAt.getTime()).toBe(NOW.getTime());
    });

    it('collapses a daypart that has not started yet', () => {
      const window = resolver.narrowToDaypart(resolve('today'), 'evening');

      expect(window.startsAt.getTime()).toBe(NOW.getTime());
      expect(window.endsAt.getTime()).toBe(NOW.getTime());
    });
  });
});

describe('normalizePhrase', () => {
  it('strips filler, ordinals and punctuation', () => {
    expect(normalizePhrase('  On   Monday? ')).toBe('monday');
    expect(normalizePhrase('From the 1st, July')).toBe('1 july');
    expect(normalizePhrase('during the past 2 weeks.')).toBe('past 2 weeks');
  });
});
