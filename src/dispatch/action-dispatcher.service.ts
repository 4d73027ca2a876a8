import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  LANGUAGE_MODEL,
  LanguageModel,
  MAIL_PROVIDER,
  MailProvider,
  Prompt,
  SCHEDULING_PROVIDER,
  SchedulingProvider,
} from '../common/collaborators';
import { mailboxAddress } from '../common/mailbox';
import {
  CollaboratorFailureError,
  RouterError,
  UnparseableWindowError,
  ValidationError,
  describeError,
} from '../common/errors';
import {
  ActionDetails,
  ActionResult,
  CalendlyEvent,
  CalendlyLookupIntent,
  DateWindow,
  Intent,
  IntentKind,
  MessageSummary,
  OtherIntent,
  OutgoingEmail,
  SchedulingLink,
  SendEmailIntent,
  SendResult,
  SendSchedulingLinkIntent,
  SummarizeEmailsIntent,
  WindowSpec,
} from '../common/types';
import { MAX_LOOKBACK_DAYS, RouterSettings, routerConfig } from '../config/router.config';
import { DateWindowResolver } from '../date-window/date-window.resolver';
import { MISSING_RECIPIENT_REPLY } from '../intent/intent-classifier.service';
import { composeGmailQuery, filterMessagesByWindow } from './gmail-query';
import {
  CLARIFICATION_REPLY,
  DRAFT_SCHEMA,
  draftPrompt,
  draftSchema,
  emailSummaryPrompt,
  eventSummaryPrompt,
  fallbackEmailSummary,
  fallbackEventSummary,
  withSignature,
} from './summaries';

export const SUMMARY_FETCH_LIMIT = 120;
export const SUMMARY_MESSAGE_LIMIT = 40;
const PREVIEW_SIZE = 5;

export interface DispatchContext {
  /** Reference time for resolving window phrases. */
  now: Date;
  accountEmail?: string;
  calendlyKey?: string;
  /** The user's original words, passed to summary prompts. */
  requestText?: string;
}

type Details = Record<string, unknown>;

@Injectable()
export class ActionDispatcherService {
  private readonly logger = new Logger(ActionDispatcherService.name);

  constructor(
    private readonly resolver: DateWindowResolver,
    @Inject(MAIL_PROVIDER) private readonly mail: MailProvider,
    @Inject(SCHEDULING_PROVIDER) private readonly scheduling: SchedulingProvider,
    @Inject(LANGUAGE_MODEL) private readonly languageModel: LanguageModel,
    @Inject(routerConfig.KEY) private readonly settings: RouterSettings,
  ) {}

  /** Executes one intent. Collaborator failures come back as `success: false`. */
  async dispatch(intent: Intent, context: DispatchContext): Promise<ActionResult> {
    switch (intent.kind) {
      case 'send_email':
        return this.sendEmail(intent, context);
      case 'summarize_emails':
        return this.summarizeEmails(intent, context);
      case 'calendly_lookup':
        return this.lookupEvents(intent, context);
      case 'send_scheduling_link':
        return this.sendSchedulingLink(intent, context);
      case 'other':
        return this.reply(intent);
      default: {
        const unhandled: never = intent;
        throw new Error(`Unhandled intent ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async sendEmail(intent: SendEmailIntent, context: DispatchContext): Promise<ActionResult> {
    const account = this.accountFor(intent.accountEmail, context);
    const details: Details = { account_email: account, to: intent.to, cc: intent.cc, bcc: intent.bcc };

    if (intent.to.length === 0) {
      return this.failure('send_email', new ValidationError(MISSING_RECIPIENT_REPLY), details, MISSING_RECIPIENT_REPLY);
    }
    const invalid = [...intent.to, ...(intent.cc ?? []), ...(intent.bcc ?? [])].filter(
      (address) => mailboxAddress(address) === undefined,
    );
    if (invalid.length > 0) {
      return this.failure('send_email', new ValidationError(`Invalid email address: ${invalid.join(', ')}`), details);
    }

    const { subject, body } = await this.draft(intent);
    const inReplyTo = intent.inReplyTo ? await this.findThread(account, intent.inReplyTo) : undefined;
    const email: OutgoingEmail = { to: intent.to, subject, body, cc: intent.cc, bcc: intent.bcc, inReplyTo };
    Object.assign(details, { subject, in_reply_to: inReplyTo });

    let sent: SendResult | undefined;
    try {
      sent = await this.deliver(account, email);
    } catch (error) {
      return this.failure('send_email', new CollaboratorFailureError('Gmail send', error), details);
    }

    if (!sent) {
      return {
        success: true,
        summary: `Dry run: would send "${subject || '(no subject)'}" to ${intent.to.join(', ')}. Nothing was sent.`,
        raw: { ...details, action: 'send_email', status: 'simulated' },
      };
    }
    return {
      success: true,
      summary: `Sent! id=${sent.id} thread=${sent.threadId ?? 'none'}`,
      raw: { ...details, action: 'send_email', status: 'sent', message_id: sent.id, thread_id: sent.threadId },
    };
  }

  private async summarizeEmails(intent: SummarizeEmailsIntent, context: DispatchContext): Promise<ActionResult> {
    const account = this.accountFor(intent.accountEmail, context);
    const details: Details = {
      account_email: account,
      time_window: typeof intent.timeWindow === 'string' ? intent.timeWindow : undefined,
      focus: intent.focus,
    };

    let window: DateWindow;
    try {
      window = this.windowFor(intent.timeWindow, context.now);
    } catch (error) {
      return this.windowFailure('summarize_emails', error, details);
    }

    const query = composeGmailQuery(intent.query, window, intent.focus);
    Object.assign(details, { query, date_range: { start: window.start, end: window.end } });

    let fetched: MessageSummary[];
    try {
      fetched = await this.mail.searchMessages(account, query, SUMMARY_FETCH_LIMIT);
    } catch (error) {
      return this.failure('summarize_emails', new CollaboratorFailureError('Gmail search', error), details);
    }

    const messages = filterMessagesByWindow(fetched, window);
    this.logger.log(`Kept ${messages.length} of ${fetched.length} message(s) inside ${window.start}..${window.end}`);
    details.messages_considered = messages.length;

    if (messages.length === 0) {
      return {
        success: true,
        summary: `I couldn't find emails between ${window.start} and ${window.end} within the last ${MAX_LOOKBACK_DAYS} days.`,
        raw: { ...details, action: 'summarize_emails', status: 'empty' },
      };
    }

    const considered = messages.slice(0, SUMMARY_MESSAGE_LIMIT);
    const summary = await this.narrate(
      emailSummaryPrompt(context.requestText ?? '', window.timezone, considered),
      () => fallbackEmailSummary(considered, window),
    );
    return {
      success: true,
      summary,
      raw: {
        ...details,
        action: 'summarize_emails',
        status: 'summarized',
        messages_preview: considered.slice(0, PREVIEW_SIZE),
      },
    };
  }

  private async lookupEvents(intent: CalendlyLookupIntent, context: DispatchContext): Promise<ActionResult> {
    const accountKey = intent.accountKey ?? context.calendlyKey;
    const details: Details = { calendly_key: accountKey };

    let window: DateWindow;
    try {
      window = this.windowFor(intent.dateWindow, context.now);
    } catch (error) {
      return this.windowFailure('calendly_lookup', error, details);
    }

    let label = 'day';
    if (intent.daypart && window.start === window.end) {
      window = this.resolver.narrowToDaypart(window, intent.daypart);
      label = intent.daypart;
    } else if (intent.daypart) {
      this.logger.warn(`Ignoring daypart '${intent.daypart}' for multi-day window ${window.start}..${window.end}`);
    }
    Object.assign(details, {
      date: window.start,
      window: label,
      date_range: { start: window.startsAt.toISOString(), end: window.endsAt.toISOString() },
    });

    let events: CalendlyEvent[];
    try {
      events = await this.scheduling.listEvents(accountKey, window);
    } catch (error) {
      return this.failure('calendly_lookup', new CollaboratorFailureError('Calendly lookup', error), details);
    }
    Object.assign(details, { events, count: events.length });

    if (events.length === 0) {
      return {
        success: true,
        summary: `No hosted Calendly events found on ${window.start} (${label}).`,
        raw: { ...details, action: 'calendly_lookup', status: 'empty' },
      };
    }

    const summary = await this.narrate(eventSummaryPrompt(window, label, events), () =>
      fallbackEventSummary(events, window, label),
    );
    return { success: true, summary, raw: { ...details, action: 'calendly_lookup', status: 'ok' } };
  }

  /** Link creation must succeed before any email is attempted. */
  private async sendSchedulingLink(intent: SendSchedulingLinkIntent, context: DispatchContext): Promise<ActionResult> {
    const account = this.accountFor(intent.accountEmail, context);
    const accountKey = intent.accountKey ?? context.calendlyKey;
    const details: Details = { account_email: account, calendly_key: accountKey, to: [intent.to] };

    if (mailboxAddress(intent.to) === undefined) {
      return this.failure('send_scheduling_link', new ValidationError(`Invalid email address: ${intent.to}`), details);
    }

    let link: SchedulingLink;
    try {
      link = await this.scheduling.createSchedulingLink(accountKey, intent.ownerType, this.settings.schedulingLinkMaxCount);
    } catch (error) {
      return this.failure(
        'send_scheduling_link',
        new CollaboratorFailureError('Calendly scheduling link', error),
        details,
        "I couldn't generate a Calendly scheduling link.",
      );
    }
    if (!link.url) {
      return this.failure(
        'send_scheduling_link',
        new CollaboratorFailureError('Calendly scheduling link', 'Calendly did not return a link'),
        details,
        "I couldn't generate a Calendly scheduling link.",
      );
    }
    details.link = link;

    const message = intent.message
      ? `${intent.message}${intent.message.includes(link.url) ? '' : `\n\n${link.url}`}`
      : `Here is my Calendly link to book a time: ${link.url}`;
    const email: OutgoingEmail = {
      to: [intent.to],
      subject: intent.subject ?? 'Schedule a time',
      body: withSignature(message, this.settings.defaultSignature),
    };

    let sent: SendResult | undefined;
    try {
      sent = await this.deliver(account, email);
    } catch (error) {
      return this.failure('send_scheduling_link', new CollaboratorFailureError('Gmail send', error), details);
    }

    if (!sent) {
      return {
        success: true,
        summary: `Dry run: would send scheduling link (${link.url}) to ${intent.to}. Nothing was sent.`,
        raw: { ...details, action: 'send_scheduling_link', status: 'simulated' },
      };
    }
    return {
      success: true,
      summary: `Sent scheduling link (${link.url}) to ${intent.to}. id=${sent.id}`,
      raw: {
        ...details,
        action: 'send_scheduling_link',
        status: 'sent',
        message_id: sent.id,
        thread_id: sent.threadId,
      },
    };
  }

  private reply(intent: OtherIntent): ActionResult {
    return {
      success: true,
      summary: intent.reply ?? CLARIFICATION_REPLY,
      raw: { action: 'freeform', status: 'ok', note: intent.note },
    };
  }

  /** Returns undefined under DRY_RUN, when the mail provider is never called. */
  private async deliver(account: string | undefined, email: OutgoingEmail): Promise<SendResult | undefined> {
    if (this.settings.dryRun) {
      this.logger.log(`DRY_RUN enabled; skipping send to ${email.to.length} recipient(s)`);
      return undefined;
    }
    return this.mail.sendMessage(account, email);
  }

  private async draft(intent: SendEmailIntent): Promise<{ subject: string; body: string }> {
    const signature = this.settings.defaultSignature;
    if (!this.settings.draftEmails) {
      return { subject: intent.subject, body: withSignature(intent.body, signature) };
    }

    try {
      const output = await this.languageModel.complete(
        draftPrompt(intent.body, intent.to, intent.subject, signature),
        DRAFT_SCHEMA,
      );
      const drafted = draftSchema.parse(output);
      return {
        subject: drafted.subject.trim() || intent.subject,
        body: withSignature(drafted.body_text.trim() || intent.body, signature),
      };
    } catch (error) {
      this.logger.warn(`Drafting failed, sending the text as classified: ${describeError(error)}`);
      return { subject: intent.subject, body: withSignature(intent.body, signature) };
    }
  }

  /** Resolves a subject or thread hint to the id of the newest matching message. */
  private async findThread(account: string | undefined, hint: string): Promise<string | undefined> {
    const trimmed = hint.trim();
    const query = /[:()\s]/.test(trimmed) ? trimmed : `subject:"${trimmed}"`;
    try {
      const [hit] = await this.mail.searchMessages(account, query, 1);
      if (!hit) {
        this.logger.warn(`No message matched reply hint '${trimmed}'; sending as a new thread`);
      }
      return hit?.id;
    } catch (error) {
      this.logger.warn(`Failed to resolve reply thread for '${trimmed}': ${describeError(error)}`);
      return undefined;
    }
  }

  private async narrate(prompt: Prompt, fallback: () => string): Promise<string> {
    try {
      return await this.languageModel.reply(prompt);
    } catch (error) {
      this.logger.warn(`Summary generation failed, using plain listing: ${describeError(error)}`);
      return fallback();
    }
  }

  private accountFor(intentAccount: string | undefined, context: DispatchContext): string | undefined {
    return intentAccount ?? context.accountEmail ?? this.settings.defaultAccountEmail;
  }

  private windowFor(spec: WindowSpec, now: Date): DateWindow {
    return typeof spec === 'string' ? this.resolver.resolve(spec, now, this.settings.timezone) : spec;
  }

  private windowFailure(action: IntentKind, error: unknown, details: Details): ActionResult {
    if (!(error instanceof UnparseableWindowError)) {
      throw error;
    }
    return this.failure(action, error, details, error.message);
  }

  private failure(action: IntentKind, error: RouterError, details: Details, summary?: string): ActionResult {
    if (error instanceof CollaboratorFailureError) {
      this.logger.error(`${action}: ${error.message}`, error.cause instanceof Error ? error.cause.stack : undefined);
    } else {
      this.logger.warn(`${action}: ${error.message}`);
    }

    const raw: ActionDetails = { ...details, action, status: 'error', error: error.message, error_code: error.code };
    return { success: false, summary: summary ?? `Sorry, that didn't work. ${error.message}`, raw };
  }
}
