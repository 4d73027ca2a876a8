import { DateTime } from 'luxon';
import { DateWindow, MessageSummary } from '../common/types';

/**
 * Gmail's after:/before: operators are exclusive and day-granular, so the
 * bounds are widened by one day on each side. filterMessagesByWindow trims
 * the result back to the exact window.
 */
export function composeGmailQuery(userQuery: string | undefined, window: DateWindow, focus?: string): string {
  const parts: string[] = [];
  if (userQuery?.trim()) {
    parts.push(userQuery.trim());
  }

  parts.push(`after:${shiftDay(window.start, -1)}`, `before:${shiftDay(window.end, 1)}`);

  const focusText = focus?.toLowerCase() ?? '';
  if (focusText.includes('important')) {
    parts.push('label:important');
  }
  if (focusText.includes('unread')) {
    parts.push('is:unread');
  }

  return [...new Set(parts)].join(' ');
}

/** Keeps messages whose own timestamp lies inside the window; undated ones are dropped. */
export function filterMessagesByWindow(messages: MessageSummary[], window: DateWindow): MessageSummary[] {
  const from = window.startsAt.getTime();
  const to = window.endsAt.getTime();
  return messages.filter((message) => {
    const timestamp = Number(message.internalDate);
    return message.internalDate !== undefined && Number.isFinite(timestamp) && timestamp >= from && timestamp <= to;
  });
}

function shiftDay(isoDate: string, days: number): string {
  return DateTime.fromISO(isoDate, { zone: 'utc' }).plus({ days }).toFormat('yyyy/MM/dd');
}
