import { DateTime } from 'luxon';
import { z } from 'zod';
import { OutputSchema, Prompt } from '../common/collaborators';
import { CalendlyEvent, DateWindow, MessageSummary } from '../common/types';

const PREVIEW_SIZE = 5;
// keeps the serialized payload well inside the model's context window
const MAX_PAYLOAD_CHARS = 100000;

export const CLARIFICATION_REPLY =
  "I'm not sure what you'd like me to do. I can send an email, summarize your inbox, look up Calendly meetings or share your booking link.";

export function emailSummaryPrompt(request: string, timezone: string, messages: MessageSummary[]): Prompt {
  return {
    system:
      'You summarize emails for the user. Write up to 5 bullets, each "Sender - Subject - one sentence gist - (date/time)". ' +
      "Finish with 'Key actions:' and up to 3 next steps when there are any. " +
      'Stay within the time window and focus the user asked for. Keep it under 1200 characters.',
    turns: [
      { role: 'user', content: `User request: ${request}` },
      { role: 'user', content: `Local timezone: ${timezone}` },
      { role: 'user', content: `Emails (JSON array):\n${JSON.stringify(messages).slice(0, MAX_PAYLOAD_CHARS)}` },
    ],
    temperature: 0.2,
  };
}

export function eventSummaryPrompt(window: DateWindow, label: string, events: CalendlyEvent[]): Prompt {
  return {
    system:
      'Summarize hosted Calendly meetings for the requested date and part of day. ' +
      'Write up to 5 bullets: who (names, emails) - when (local time) - meeting type - notable answers - follow-ups. ' +
      'Keep it under 600 characters.',
    turns: [
      { role: 'user', content: `Date: ${window.start}  Window: ${label}  TZ: ${window.timezone}` },
      { role: 'user', content: JSON.stringify(events).slice(0, MAX_PAYLOAD_CHARS) },
    ],
    temperature: 0.2,
  };
}

export const DRAFT_SCHEMA: OutputSchema = {
  name: 'email_draft',
  jsonSchema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      subject: { type: 'string' },
      body_text: { type: 'string' },
    },
    required: ['subject', 'body_text'],
  },
};

export const draftSchema = z.object({
  subject: z.string(),
  body_text: z.string(),
});

export function draftPrompt(instruction: string, recipients: string[], subjectHint: string, signature: string): Prompt {
  return {
    system:
      'You write concise, professional emails from a short instruction. ' +
      'Be respectful and clear, and considerate when the topic is sensitive. ' +
      'Avoid slang and harsh phrasing. Do not give legal advice. Return only JSON with subject and body_text.',
    turns: [
      {
        role: 'user',
        content: [
          `Instruction: ${instruction}`,
          `Recipient(s): ${recipients.join(', ') || '(not specified)'}`,
          `Subject hint: ${subjectHint || '(none)'}`,
          `Signature: ${signature || '(none)'}`,
          "Constraints: at most 180 words. If no recipient name is known, open with a generic greeting such as 'Hello'.",
        ].join('\n'),
      },
    ],
    temperature: 0.2,
  };
}

export function withSignature(body: string, signature: string): string {
  if (!signature || body.includes(signature)) {
    return body;
  }
  return `${body.replace(/\n*$/, '')}\n\n${signature}`;
}

export function fallbackEmailSummary(messages: MessageSummary[], window: DateWindow): string {
  const lines = [`**${plural(messages.length, 'email')} between ${window.start} and ${window.end}:**`, ''];
  for (const message of messages.slice(0, PREVIEW_SIZE)) {
    const subject = message.subject || '(no subject)';
    lines.push(`- ${senderName(message.from)} - ${subject}${message.snippet ? ` - ${message.snippet}` : ''}`);
  }
  if (messages.length > PREVIEW_SIZE) {
    lines.push(`- ...and ${messages.length - PREVIEW_SIZE} more`);
  }
  return lines.join('\n');
}

export function fallbackEventSummary(events: CalendlyEvent[], window: DateWindow, label: string): string {
  const lines = [`**${plural(events.length, 'Calendly event')} on ${window.start} (${label}):**`, ''];
  for (const event of events.slice(0, PREVIEW_SIZE)) {
    const time = event.startTime ? DateTime.fromISO(event.startTime, { zone: window.timezone }).toFormat('HH:mm') : '??:??';
    const who = event.invitees.map((invitee) => invitee.name ?? invitee.email ?? 'unknown').join(', ');
    lines.push(`- ${time} ${event.name ?? 'Meeting'}${who ? ` with ${who}` : ''}`);
  }
  if (events.length > PREVIEW_SIZE) {
    lines.push(`- ...and ${events.length - PREVIEW_SIZE} more`);
  }
  return lines.join('\n');
}

export function senderName(from: string): string {
  const match = /^\s*"?([^"<]*?)"?\s*<([^>]+)>/.exec(from);
  if (!match) {
    return from.trim() || 'Unknown sender';
  }
  return match[1].trim() || match[2].trim();
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
