import { ActionResult, DateWindow, Intent, RoutedResponse } from '../common/types';

const EMPTY_SUCCESS_TEXT = 'Done.';
const EMPTY_FAILURE_TEXT = 'Sorry, something went wrong while handling that request.';

/**
 * Builds the response envelope. Total over every ActionResult: the text is
 * never empty, whatever the dispatcher returned.
 */
export function normalizeResponse(query: string, intent: Intent, result: ActionResult, timestamp: Date): RoutedResponse {
  const textMarkdown = result.summary.trim() || (result.success ? EMPTY_SUCCESS_TEXT : EMPTY_FAILURE_TEXT);

  return Object.freeze({
    ok: result.success,
    status: result.raw.status,
    query,
    text: stripMarkdown(textMarkdown) || textMarkdown,
    textMarkdown,
    kind: intent.kind,
    intent: echoIntent(intent),
    details: withoutUndefined(result.raw),
    timestamp: timestamp.toISOString(),
  });
}

/** Plain-text rendering for clients that cannot show markdown. */
export function stripMarkdown(text: string): string {
  return text
    .replace(/\*\*(.*?)\*\*/g, '$1')
    .replace(/\b_([^_\n]+)_\b/g, '$1')
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/^[-*]\s+/gm, '- ')
    .replace(/^(\d+)\.\s+/gm, '$1) ')
    .replace(/`/g, '')
    .trim();
}

export function echoIntent(intent: Intent): Record<string, unknown> {
  const echo: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(intent)) {
    echo[key] = isDateWindow(value) ? serializeWindow(value) : value;
  }
  return withoutUndefined(echo);
}

function serializeWindow(window: DateWindow): Record<string, string> {
  return {
    start: window.start,
    end: window.end,
    timezone: window.timezone,
    startsAt: window.startsAt.toISOString(),
    endsAt: window.endsAt.toISOString(),
  };
}

function isDateWindow(value: unknown): value is DateWindow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'startsAt' in value &&
    value.startsAt instanceof Date &&
    'endsAt' in value &&
    value.endsAt instanceof Date
  );
}

function withoutUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}
