import { gmail_v1 } from 'googleapis';
import { MessageSummary, OutgoingEmail } from '../common/types';

export const METADATA_HEADERS = ['From', 'To', 'Cc', 'Date', 'Subject', 'Message-Id'];

export interface ThreadHeaders {
  inReplyTo: string;
  references: string;
}

type Header = gmail_v1.Schema$MessagePartHeader;

export function headerMap(headers: Header[] | undefined): Map<string, string> {
  const map = new Map<string, string>();
  for (const header of headers ?? []) {
    if (header.name) {
      map.set(header.name.toLowerCase(), header.value ?? '');
    }
  }
  return map;
}

export function toMessageSummary(message: gmail_v1.Schema$Message): MessageSummary {
  const headers = headerMap(message.payload?.headers);
  return {
    id: message.id ?? '',
    threadId: message.threadId ?? undefined,
    internalDate: message.internalDate ?? undefined,
    snippet: message.snippet ?? '',
    from: headers.get('from') ?? '',
    to: headers.get('to') ?? '',
    cc: headers.get('cc') ?? '',
    date: headers.get('date') ?? '',
    subject: headers.get('subject') ?? '',
    messageId: headers.get('message-id') ?? '',
  };
}

/** Leaf parts of a (possibly nested) multipart payload, in document order. */
export function walkParts(part: gmail_v1.Schema$MessagePart | undefined): gmail_v1.Schema$MessagePart[] {
  if (!part) {
    return [];
  }
  if (part.parts && part.parts.length > 0) {
    return part.parts.flatMap((child) => walkParts(child));
  }
  return [part];
}

export function decodeBody(data: string | null | undefined): string {
  return data ? Buffer.from(data, 'base64url').toString('utf8') : '';
}

/**
 * Threading headers for a reply. `References` carries the original's chain
 * followed by its own Message-Id.
 */
export function threadHeadersFor(original: gmail_v1.Schema$Message): ThreadHeaders | undefined {
  const headers = headerMap(original.payload?.headers);
  const messageId = headers.get('message-id');
  if (!messageId) {
    return undefined;
  }
  const references = headers.get('references')?.trim();
  return {
    inReplyTo: messageId,
    references: references ? `${references} ${messageId}` : messageId,
  };
}

export function buildRawMessage(email: OutgoingEmail, thread?: ThreadHeaders): string {
  const lines = [`To: ${email.to.join(', ')}`];
  if (email.cc && email.cc.length > 0) {
    lines.push(`Cc: ${email.cc.join(', ')}`);
  }
  if (email.bcc && email.bcc.length > 0) {
    lines.push(`Bcc: ${email.bcc.join(', ')}`);
  }
  lines.push(`Subject: ${encodeHeaderValue(email.subject)}`);
  if (thread) {
    lines.push(`In-Reply-To: ${thread.inReplyTo}`, `References: ${thread.references}`);
  }
  lines.push(
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: base64',
    '',
    wrap(Buffer.from(email.body, 'utf8').toString('base64'), 76),
  );

  return Buffer.from(lines.join('\r\n'), 'utf8').toString('base64url');
}

// RFC 2047 encoded-word for non-ASCII subjects
export function encodeHeaderValue(value: string): string {
  const flat = value.replace(/[\r\n]+/g, ' ');
  return /^[\x20-\x7e]*$/.test(flat) ? flat : `=?UTF-8?B?${Buffer.from(flat, 'utf8').toString('base64')}?=`;
}

export function safeFilename(name: string | null | undefined, fallback = 'attachment.bin'): string {
  const cleaned = (name ?? '')
    .trim()
    .replace(/[\\/\r\n\t]+/g, '_')
    .replace(/[^A-Za-z0-9._+-]/g, '_')
    .slice(0, 200);
  return cleaned || fallback;
}

function wrap(value: string, width: number): string {
  const lines: string[] = [];
  for (let index = 0; index < value.length; index += width) {
    lines.push(value.slice(index, index + width));
  }
  return lines.join('\r\n');
}
