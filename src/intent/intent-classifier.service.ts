import { Inject, Injectable, Logger } from '@nestjs/common';
import { LANGUAGE_MODEL, LanguageModel, Prompt, SCHEDULING_OWNER_TYPE } from '../common/collaborators';
import { ClassificationInvalidError, describeError } from '../common/errors';
import { mailboxAddress } from '../common/mailbox';
import { Intent, IntentKind, OtherIntent } from '../common/types';
import {
  INTENT_EXAMPLES,
  INTENT_KINDS,
  INTENT_OUTPUT_SCHEMA,
  RawIntent,
  buildIntentSystemPrompt,
  rawIntentSchema,
} from './intent.prompts';

export const MISSING_RECIPIENT_REPLY = "I couldn't find a recipient. Please include an email address.";
export const DEFAULT_SUMMARY_WINDOW = 'past 7 days';
export const DEFAULT_LOOKUP_DATE = 'today';

export interface ClassifierContext {
  /** Account supplied with the request, used when the text names none. */
  defaultAccount?: string;
  calendlyKey?: string;
  /** Kinds the model may choose from; `other` is always allowed. */
  capabilities?: readonly IntentKind[];
}

@Injectable()
export class IntentClassifierService {
  private readonly logger = new Logger(IntentClassifierService.name);

  constructor(@Inject(LANGUAGE_MODEL) private readonly languageModel: LanguageModel) {}

  /**
   * One model call, validated. Anything the model gets wrong comes back as
   * an `other` intent carrying a `note`; this never rejects.
   */
  async classify(text: string, context: ClassifierContext = {}): Promise<Intent> {
    const rawText = text.trim();
    if (!rawText) {
      return { kind: 'other', rawText, note: 'Empty request' };
    }

    const capabilities = withOther(context.capabilities ?? INTENT_KINDS);
    const prompt: Prompt = {
      system: buildIntentSystemPrompt(capabilities),
      turns: [
        ...INTENT_EXAMPLES,
        { role: 'user', content: rawText },
        {
          role: 'user',
          content: `account_email=${context.defaultAccount ?? ''} calendly_key=${context.calendlyKey ?? ''}`,
        },
      ],
      temperature: 0,
    };

    let output: unknown;
    try {
      output = await this.languageModel.complete(prompt, INTENT_OUTPUT_SCHEMA);
    } catch (error) {
      this.logger.warn(`Intent classification failed: ${describeError(error)}`);
      return { kind: 'other', rawText, note: `Classification failed: ${describeError(error)}` };
    }

    try {
      const intent = toIntent(output, rawText, context);
      if (!capabilities.includes(intent.kind)) {
        throw new ClassificationInvalidError(`Intent '${intent.kind}' is not available`);
      }
      this.logger.log(`Classified request as ${intent.kind}`);
      return intent;
    } catch (error) {
      if (!(error instanceof ClassificationInvalidError)) {
        throw error;
      }
      this.logger.warn(`Downgrading to other: ${error.message}`);
      return { kind: 'other', rawText, note: [error.message, ...error.issues].join('; ') };
    }
  }
}

/**
 * Validates raw model output and builds the typed intent. Throws
 * ClassificationInvalidError when the output cannot be acted on.
 */
export function toIntent(output: unknown, rawText: string, context: ClassifierContext = {}): Intent {
  const parsed = rawIntentSchema.safeParse(output);
  if (!parsed.success) {
    throw new ClassificationInvalidError(
      'Model output did not match the intent schema',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const raw = parsed.data;
  const accountEmail = raw.account_email ?? context.defaultAccount;

  switch (raw.kind) {
    case 'send_email': {
      const to = addressList(raw.to, 'to');
      if (to.length === 0) {
        return missingRecipient(rawText, 'send_email');
      }
      return {
        kind: 'send_email',
        to,
        subject: raw.subject ?? '',
        body: raw.message ?? rawText,
        cc: optionalList(addressList(raw.cc, 'cc')),
        bcc: optionalList(addressList(raw.bcc, 'bcc')),
        inReplyTo: raw.in_reply_to_hint,
        accountEmail,
      };
    }
    case 'summarize_emails':
      return {
        kind: 'summarize_emails',
        timeWindow: raw.time_window ?? DEFAULT_SUMMARY_WINDOW,
        query: raw.query,
        focus: raw.focus,
        accountEmail,
      };
    case 'calendly_lookup':
      return {
        kind: 'calendly_lookup',
        dateWindow: raw.date_ref ?? raw.time_window ?? DEFAULT_LOOKUP_DATE,
        daypart: raw.daypart ?? undefined,
        accountKey: raw.calendly_key ?? context.calendlyKey,
      };
    case 'send_scheduling_link': {
      const [to] = addressList(raw.to, 'to');
      if (to === undefined) {
        return missingRecipient(rawText, 'send_scheduling_link');
      }
      return {
        kind: 'send_scheduling_link',
        to,
        ownerType: SCHEDULING_OWNER_TYPE,
        accountKey: raw.calendly_key ?? context.calendlyKey,
        accountEmail,
        subject: raw.subject,
        message: raw.message,
      };
    }
    case 'other':
      return { kind: 'other', rawText, reply: raw.reply ?? raw.message };
  }
}

function withOther(kinds: readonly IntentKind[]): IntentKind[] {
  return kinds.includes('other') ? [...kinds] : [...kinds, 'other'];
}

function missingRecipient(rawText: string, kind: IntentKind): OtherIntent {
  return { kind: 'other', rawText, reply: MISSING_RECIPIENT_REPLY, note: `${kind} without a recipient` };
}

function addressList(values: RawIntent['to'], field: string): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const address = mailboxAddress(value);
    if (address === undefined) {
      throw new ClassificationInvalidError(`Invalid ${field} address '${value}'`);
    }
    const key = address.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}

function optionalList(values: string[]): string[] | undefined {
  return values.length > 0 ? values : undefined;
}
