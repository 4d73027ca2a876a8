import { ActionResult, DateWindow } from '../common/types';
import { echoIntent, normalizeResponse, stripMarkdown } from './response-normalizer';

const AT = new Date('2025-09-27T09:00:00.000Z');

describe('normalizeResponse', () => {
  const intent = { kind: 'summarize_emails' as const, timeWindow: 'yesterday', query: undefined };

  it('keeps the markdown and a plain rendering of the summary', () => {
    const result: ActionResult = {
      success: true,
      summary: '**2 emails between 2025-09-26 and 2025-09-26:**\n\n* Alice - Invoice\n',
      raw: { action: 'summarize_emails', status: 'summarized', messages_considered: 2 },
    };

    const response = normalizeResponse('summarize yesterday', intent, result, AT);

    expect(response).toEqual({
      ok: true,
      status: 'summarized',
      query: 'summarize yesterday',
      text: '2 emails between 2025-09-26 and 2025-09-26:\n\n- Alice - Invoice',
      textMarkdown: '**2 emails between 2025-09-26 and 2025-09-26:**\n\n* Alice - Invoice',
      kind: 'summarize_emails',
      intent: { kind: 'summarize_emails', timeWindow: 'yesterday' },
      details: { action: 'summarize_emails', status: 'summarized', messages_considered: 2 },
      timestamp: '2025-09-27T09:00:00.000Z',
    });
    expect(Object.isFrozen(response)).toBe(true);
  });

  it('drops undefined detail values', () => {
    const response = normalizeResponse('send it', intent, {
      success: true,
      summary: 'Sent!',
      raw: { action: 'send_email', status: 'sent', cc: undefined, message_id: 'sent-1' },
    }, AT);

    expect(response.details).toEqual({ action: 'send_email', status: 'sent', message_id: 'sent-1' });
    expect('cc' in response.details).toBe(false);
  });

  it.each<[ActionResult, boolean, string]>([
    [{ success: false, summary: '', raw: { action: 'send_email', status: 'error' } }, false, 'Sorry, something went wrong while handling that request.'],
    [{ success: true, summary: '   ', raw: { action: 'freeform', status: 'ok' } }, true, 'Done.'],
    [{ success: true, summary: '``', raw: { action: 'freeform', status: 'ok' } }, true, '``'],
  ])('never returns empty text (%#)', (result, ok, text) => {
    const response = normalizeResponse('x', intent, result, AT);

    expect(response.ok).toBe(ok);
    expect(response.text).toBe(text);
  });

  it('reports the failure status', () => {
    const response = normalizeResponse('x', intent, {
      success: false,
      summary: 'I can only access items from the last 40 days.',
      raw: { action: 'summarize_emails', status: 'error', error_code: 'WINDOW_OUT_OF_RANGE' },
    }, AT);

    expect(response.ok).toBe(false);
    expect(response.status).toBe('error');
    expect(response.text).toBe('I can only access items from the last 40 days.');
  });
});

describe('echoIntent', () => {
  it('serializes resolved windows as ISO strings', () => {
    const window: DateWindow = {
      start: '2025-09-22',
      end: '2025-09-22',
      timezone: 'Europe/London',
      startsAt: new Date('2025-09-21T23:00:00.000Z'),
      endsAt: new Date('2025-09-22T22:59:59.999Z'),
    };

    expect(echoIntent({ kind: 'calendly_lookup', dateWindow: window, daypart: undefined })).toEqual({
      kind: 'calendly_lookup',
      dateWindow: {
        start: '2025-09-22',
        end: '2025-09-22',
        timezone: 'Europe/London',
        startsAt: '2025-09-21T23:00:00.000Z',
        endsAt: '2025-09-22T22:59:59.999Z',
      },
    });
  });
});

describe('stripMarkdown', () => {
  it.each([
    ['1. First\n2. Second', '1) First\n2) Second'],
    ['# Heading\n_note_ and `code`', 'Heading\nnote and code'],
    ['- one\n*   two', '- one\n- two'],
    ['write to first_last@example.com', 'write to first_last@example.com'],
  ])('%p', (input, expected) => {
    expect(stripMarkdown(input)).toBe(expected);
  });
});
