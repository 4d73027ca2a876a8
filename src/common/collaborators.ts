import {
  CalendlyEvent,
  DateWindow,
  MessageDetail,
  MessageSummary,
  OutgoingEmail,
  SchedulingLink,
  SendResult,
} from './types';

export const MAIL_PROVIDER = Symbol('MAIL_PROVIDER');
export const SCHEDULING_PROVIDER = Symbol('SCHEDULING_PROVIDER');
export const LANGUAGE_MODEL = Symbol('LANGUAGE_MODEL');

// Calendly owner type used for scheduling links
export const SCHEDULING_OWNER_TYPE = 'EventType';

/**
 * Mailbox operations the router needs. `account` selects which stored
 * credential is used; `undefined` means the process-wide default.
 */
export interface MailProvider {
  listMessages(account: string | undefined, maxResults: number): Promise<MessageSummary[]>;
  searchMessages(account: string | undefined, query: string, maxResults: number): Promise<MessageSummary[]>;
  getMessage(account: string | undefined, messageId: string, downloadAttachments: boolean): Promise<MessageDetail>;
  sendMessage(account: string | undefined, email: OutgoingEmail): Promise<SendResult>;
}

export interface SchedulingProvider {
  listEvents(accountKey: string | undefined, window: DateWindow): Promise<CalendlyEvent[]>;
  createSchedulingLink(accountKey: string | undefined, ownerType: string, maxCount: number): Promise<SchedulingLink>;
}

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface Prompt {
  system: string;
  turns: ChatTurn[];
  temperature?: number;
}

export interface OutputSchema {
  name: string;
  jsonSchema: Record<string, unknown>;
}

export interface LanguageModel {
  /** One structured completion; the parsed JSON object is returned unvalidated. */
  complete(prompt: Prompt, schema: OutputSchema): Promise<unknown>;
  /** Free-text completion. */
  reply(prompt: Prompt): Promise<string>;
}
