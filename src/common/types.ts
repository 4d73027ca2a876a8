export type IntentKind =
  | 'send_email'
  | 'summarize_emails'
  | 'calendly_lookup'
  | 'send_scheduling_link'
  | 'other';

export type Daypart = 'morning' | 'afternoon' | 'evening';

export interface DateWindow {
  readonly start: string; // YYYY-MM-DD in `timezone`
  readonly end: string;   // YYYY-MM-DD in `timezone`
  readonly timezone: string;
  readonly startsAt: Date;
  readonly endsAt: Date;
}

// A window can travel as the raw phrase and be resolved at dispatch time
export type WindowSpec = DateWindow | string;

export interface SendEmailIntent {
  kind: 'send_email';
  to: string[];
  subject: string;
  body: string;
  cc?: string[];
  bcc?: string[];
  inReplyTo?: string; // subject or thread hint
  accountEmail?: string;
}

export interface SummarizeEmailsIntent {
  kind: 'summarize_emails';
  timeWindow: WindowSpec;
  query?: string;
  focus?: string;
  accountEmail?: string;
}

export interface CalendlyLookupIntent {
  kind: 'calendly_lookup';
  dateWindow: WindowSpec;
  daypart?: Daypart;
  accountKey?: string;
}

export interface SendSchedulingLinkIntent {
  kind: 'send_scheduling_link';
  to: string;
  ownerType: string;
  accountKey?: string;
  accountEmail?: string;
  subject?: string;
  message?: string;
}

export interface OtherIntent {
  kind: 'other';
  rawText: string;
  reply?: string;
  note?: string;
}

export type Intent =
  | SendEmailIntent
  | SummarizeEmailsIntent
  | CalendlyLookupIntent
  | SendSchedulingLinkIntent
  | OtherIntent;

export type ActionStatus =
  | 'sent'
  | 'simulated'
  | 'summarized'
  | 'empty'
  | 'ok'
  | 'error';

export interface ActionDetails {
  action: IntentKind | 'freeform';
  status: ActionStatus;
  [key: string]: unknown;
}

export interface ActionResult {
  success: boolean;
  summary: string;
  raw: ActionDetails;
}

export interface RoutedResponse {
  readonly ok: boolean;
  readonly status: ActionStatus;
  readonly query: string;
  readonly text: string;
  readonly textMarkdown: string;
  readonly kind: IntentKind;
  readonly intent: Record<string, unknown>;
  readonly details: Record<string, unknown>;
  readonly timestamp: string;
}

export interface MessageSummary {
  id: string;
  threadId?: string;
  internalDate?: string; // epoch millis, as Gmail returns it
  snippet: string;
  from: string;
  to: string;
  cc: string;
  date: string;
  subject: string;
  messageId: string;
}

export interface AttachmentInfo {
  filename: string;
  mimeType: string;
  size: number;
  savedTo?: string;
}

export interface MessageDetail extends MessageSummary {
  labelIds: string[];
  textBody: string;
  htmlBody: string;
  attachments: AttachmentInfo[];
}

export interface OutgoingEmail {
  to: string[];
  subject: string;
  body: string;
  cc?: string[];
  bcc?: string[];
  inReplyTo?: string; // Gmail message id of the message being answered
}

export interface SendResult {
  id: string;
  threadId?: string;
}

export interface CalendlyInvitee {
  name?: string;
  email?: string;
  timezone?: string;
  questionsAndAnswers: { question: string; answer: string }[];
}

export interface CalendlyEvent {
  name?: string;
  startTime?: string;
  endTime?: string;
  status?: string;
  location: string;
  invitees: CalendlyInvitee[];
}

export interface SchedulingLink {
  url: string;
  owner?: string;
  ownerType?: string;
}
