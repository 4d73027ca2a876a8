import { z } from 'zod';
import { ChatTurn, OutputSchema } from '../common/collaborators';
import { IntentKind } from '../common/types';

export const INTENT_KINDS = [
  'send_email',
  'summarize_emails',
  'calendly_lookup',
  'send_scheduling_link',
  'other',
] as const satisfies readonly IntentKind[];

const DAYPARTS = ['morning', 'afternoon', 'evening'] as const;

const describeKind: Record<IntentKind, string> = {
  send_email: 'send_email - compose and send an email (needs "to"; use "message" for the body)',
  summarize_emails: 'summarize_emails - summarize inbox messages over a time_window, optionally narrowed by query/focus',
  calendly_lookup: 'calendly_lookup - list hosted Calendly meetings on a date_ref, optionally in a daypart',
  send_scheduling_link: 'send_scheduling_link - email a Calendly booking link to one recipient',
  other: 'other - anything else; put a short helpful answer in "reply"',
};

export function buildIntentSystemPrompt(capabilities: readonly IntentKind[]): string {
  return `You turn a user's request into exactly one JSON intent.

Kinds:
${capabilities.map((kind) => `- ${describeKind[kind]}`).join('\n')}

Rules:
- Never invent email addresses or names. Unknown fields are null.
- Keep subjects short and neutral. Use the user's own wording for "message" when given, otherwise draft a brief professional first version.
- time_window and date_ref stay as the user's phrase ("yesterday", "last 3 days", "monday", "2025-07-14"). Do not convert them to dates.
- Only set focus, query or daypart when the user implies them.
- Reply with the JSON object only.`;
}

const INTENT_FIELDS = [
  'kind',
  'account_email',
  'to',
  'subject',
  'message',
  'cc',
  'bcc',
  'in_reply_to_hint',
  'time_window',
  'query',
  'focus',
  'calendly_key',
  'date_ref',
  'daypart',
  'reply',
] as const;

type IntentField = (typeof INTENT_FIELDS)[number];

const nullableString = { type: ['string', 'null'] };
const nullableList = { type: ['array', 'null'], items: { type: 'string' } };

// strict mode wants every property listed as required, so optionality is expressed as null
export const INTENT_OUTPUT_SCHEMA: OutputSchema = {
  name: 'intent',
  jsonSchema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      kind: { type: 'string', enum: [...INTENT_KINDS] },
      account_email: nullableString,
      to: nullableList,
      subject: nullableString,
      message: nullableString,
      cc: nullableList,
      bcc: nullableList,
      in_reply_to_hint: nullableString,
      time_window: nullableString,
      query: nullableString,
      focus: nullableString,
      calendly_key: nullableString,
      date_ref: nullableString,
      daypart: { type: ['string', 'null'], enum: [...DAYPARTS, null] },
      reply: nullableString,
    } satisfies Record<IntentField, unknown>,
    required: [...INTENT_FIELDS],
  },
};

const text = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || undefined);

const addresses = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => {
    // commas and semicolons only, so `Name <addr>` stays in one piece
    const items = typeof value === 'string' ? value.split(/[,;]+/) : value ?? [];
    return items.map((item) => item.trim()).filter((item) => item.length > 0);
  });

export const rawIntentSchema = z.object({
  kind: z.enum(INTENT_KINDS),
  account_email: text,
  to: addresses,
  subject: text,
  message: text,
  cc: addresses,
  bcc: addresses,
  in_reply_to_hint: text,
  time_window: text,
  query: text,
  focus: text,
  calendly_key: text,
  date_ref: text,
  daypart: z.enum(DAYPARTS).nullish().catch(undefined),
  reply: text,
});

export type RawIntent = z.infer<typeof rawIntentSchema>;

type ExampleOutput = Partial<Record<IntentField, string | string[]>> & { kind: IntentKind };

function example(user: string, output: ExampleOutput): ChatTurn[] {
  const full: Record<string, unknown> = {};
  for (const field of INTENT_FIELDS) {
    full[field] = output[field] ?? null;
  }
  return [
    { role: 'user', content: user },
    { role: 'assistant', content: JSON.stringify(full) },
  ];
}

export const INTENT_EXAMPLES: ChatTurn[] = [
  ...example('email maria@example.com that the quarterly review moves to Thursday', {
    kind: 'send_email',
    to: ['maria@example.com'],
    subject: 'Quarterly review moved to Thursday',
    message: 'Hi Maria, a quick note that the quarterly review is moving to Thursday.',
  }),
  ...example('what important emails did I get yesterday about invoices?', {
    kind: 'summarize_emails',
    time_window: 'yesterday',
    focus: 'important',
    query: 'invoices',
  }),
  ...example('which Calendly meetings did I have on Tuesday morning?', {
    kind: 'calendly_lookup',
    date_ref: 'tuesday',
    daypart: 'morning',
  }),
  ...example('send sam@example.com a link to book time with me', {
    kind: 'send_scheduling_link',
    to: ['sam@example.com'],
    subject: 'Book a time',
    message: 'Here is a link to pick a time that works for you.',
  }),
  ...example('hello there', {
    kind: 'other',
    reply: 'Hi! I can send emails, summarize your inbox, look up Calendly meetings or share a booking link.',
  }),
];
