import {
  LanguageModel,
  MailProvider,
  OutputSchema,
  Prompt,
  SchedulingProvider,
} from '../common/collaborators';
import {
  CalendlyEvent,
  DateWindow,
  MessageDetail,
  MessageSummary,
  OutgoingEmail,
  SchedulingLink,
  SendResult,
} from '../common/types';

/** Replays queued outputs; throws when a queued item is an Error or nothing is queued. */
export class FakeLanguageModel implements LanguageModel {
  readonly completeCalls: { prompt: Prompt; schema: OutputSchema }[] = [];
  readonly replyCalls: Prompt[] = [];
  private readonly structured: unknown[] = [];
  private readonly replies: (string | Error)[] = [];

  queueStructured(...outputs: unknown[]): this {
    this.structured.push(...outputs);
    return this;
  }

  queueReply(...replies: (string | Error)[]): this {
    this.replies.push(...replies);
    return this;
  }

  async complete(prompt: Prompt, schema: OutputSchema): Promise<unknown> {
    this.completeCalls.push({ prompt, schema });
    if (this.structured.length === 0) {
      throw new Error('no structured output queued');
    }
    const next = this.structured.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async reply(prompt: Prompt): Promise<string> {
    this.replyCalls.push(prompt);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('no reply queued');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export class FakeMailProvider implements MailProvider {
  messages: MessageSummary[] = [];
  failure?: Error;
  readonly lists: { account?: string; maxResults: number }[] = [];
  readonly searches: { account?: string; query: string; maxResults: number }[] = [];
  readonly sent: { account?: string; email: OutgoingEmail }[] = [];

  async listMessages(account: string | undefined, maxResults: number): Promise<MessageSummary[]> {
    this.lists.push({ account, maxResults });
    this.throwIfFailing();
    return this.messages.slice(0, maxResults);
  }

  async searchMessages(account: string | undefined, query: string, maxResults: number): Promise<MessageSummary[]> {
    this.searches.push({ account, query, maxResults });
    this.throwIfFailing();
    return this.messages.slice(0, maxResults);
  }

  async getMessage(_account: string | undefined, messageId: string): Promise<MessageDetail> {
    this.throwIfFailing();
    const message = this.messages.find((candidate) => candidate.id === messageId);
    if (!message) {
      throw new Error(`Message ${messageId} not found`);
    }
    return { ...message, labelIds: [], textBody: message.snippet, htmlBody: '', attachments: [] };
  }

  async sendMessage(account: string | undefined, email: OutgoingEmail): Promise<SendResult> {
    this.throwIfFailing();
    this.sent.push({ account, email });
    const original = this.messages.find((candidate) => candidate.id === email.inReplyTo);
    return { id: `sent-${this.sent.length}`, threadId: original?.threadId ?? `thread-${this.sent.length}` };
  }

  private throwIfFailing(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

export class FakeSchedulingProvider implements SchedulingProvider {
  events: CalendlyEvent[] = [];
  link: SchedulingLink = { url: 'https://calendly.example/d/test-link', ownerType: 'EventType' };
  failure?: Error;
  readonly lookups: { accountKey?: string; window: DateWindow }[] = [];
  readonly linkRequests: { accountKey?: string; ownerType: string; maxCount: number }[] = [];

  async listEvents(accountKey: string | undefined, window: DateWindow): Promise<CalendlyEvent[]> {
    this.lookups.push({ accountKey, window });
    if (this.failure) {
      throw this.failure;
    }
    return this.events;
  }

  async createSchedulingLink(accountKey: string | undefined, ownerType: string, maxCount: number): Promise<SchedulingLink> {
    this.linkRequests.push({ accountKey, ownerType, maxCount });
    if (this.failure) {
      throw this.failure;
    }
    return this.link;
  }
}

export function message(overrides: Partial<MessageSummary> & { id: string }): MessageSummary {
  return {
    threadId: `thread-${overrides.id}`,
    snippet: '',
    from: 'sender@example.com',
    to: 'me@example.com',
    cc: '',
    date: '',
    subject: '',
    messageId: `<${overrides.id}@mail.example.com>`,
    ...overrides,
  };
}

/** A classifier output with every field null except the ones given. */
export function modelOutput(fields: Record<string, unknown>): Record<string, unknown> {
  return {
    kind: 'other',
    account_email: null,
    to: null,
    subject: null,
    message: null,
    cc: null,
    bcc: null,
    in_reply_to_hint: null,
    time_window: null,
    query: null,
    focus: null,
    calendly_key: null,
    date_ref: null,
    daypart: null,
    reply: null,
    ...fields,
  };
}
