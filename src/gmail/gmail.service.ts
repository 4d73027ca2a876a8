import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Auth, gmail_v1, google } from 'googleapis';
import * as fs from 'fs/promises';
import * as path from 'path';
import { MailProvider } from '../common/collaborators';
import { AttachmentInfo, MessageDetail, MessageSummary, OutgoingEmail, SendResult } from '../common/types';
import { GmailTokenStore } from './gmail-token.store';
import {
  METADATA_HEADERS,
  ThreadHeaders,
  buildRawMessage,
  decodeBody,
  safeFilename,
  threadHeadersFor,
  toMessageSummary,
  walkParts,
} from './gmail.mime';

const SCOPES = ['https://www.googleapis.com/auth/gmail.modify'];

interface Connection {
  gmail: gmail_v1.Gmail;
  account: string;
}

@Injectable()
export class GmailService implements MailProvider {
  private readonly logger = new Logger(GmailService.name);
  private readonly downloadDir: string;
  private readonly defaultAccount?: string;

  constructor(
    private configService: ConfigService,
    private tokenStore: GmailTokenStore,
  ) {
    this.downloadDir = path.resolve(this.configService.get<string>('DOWNLOAD_DIR') ?? 'downloads');
    this.defaultAccount = this.configService.get<string>('DEFAULT_ACCOUNT_EMAIL');
  }

  generateAuthUrl(account: string): string {
    return this.createOAuthClient().generateAuthUrl({
      access_type: 'offline',
      scope: SCOPES,
      prompt: 'consent',
      login_hint: account,
      state: account,
    });
  }

  async exchangeCodeForTokens(code: string, account: string): Promise<string> {
    const { tokens } = await this.createOAuthClient().getToken(code);
    if (!tokens.refresh_token) {
      this.logger.warn(`Google returned no refresh token for ${account}; access will expire`);
    }
    return this.tokenStore.save(account, tokens);
  }

  async listMessages(account: string | undefined, maxResults: number): Promise<MessageSummary[]> {
    const { gmail } = await this.connect(account);
    const { data } = await gmail.users.messages.list({ userId: 'me', labelIds: ['INBOX'], maxResults });
    return this.fetchSummaries(gmail, data.messages);
  }

  async searchMessages(account: string | undefined, query: string, maxResults: number): Promise<MessageSummary[]> {
    const { gmail } = await this.connect(account);
    const { data } = await gmail.users.messages.list({ userId: 'me', q: query, maxResults });
    return this.fetchSummaries(gmail, data.messages);
  }

  async getMessage(account: string | undefined, messageId: string, downloadAttachments: boolean): Promise<MessageDetail> {
    const connection = await this.connect(account);
    const { data } = await connection.gmail.users.messages.get({ userId: 'me', id: messageId, format: 'full' });

    let textBody = '';
    let htmlBody = '';
    const attachments: AttachmentInfo[] = [];

    for (const part of walkParts(data.payload)) {
      const attachmentId = part.body?.attachmentId;
      if (part.filename && attachmentId) {
        attachments.push(
          await this.fetchAttachment(connection, messageId, part, attachmentId, downloadAttachments),
        );
      } else if (part.mimeType === 'text/plain') {
        textBody += `${decodeBody(part.body?.data)}\n`;
      } else if (part.mimeType === 'text/html') {
        htmlBody += `${decodeBody(part.body?.data)}\n`;
      }
    }

    return {
      ...toMessageSummary(data),
      labelIds: data.labelIds ?? [],
      textBody: textBody.trim(),
      htmlBody: htmlBody.trim(),
      attachments,
    };
  }

  async sendMessage(account: string | undefined, email: OutgoingEmail): Promise<SendResult> {
    const { gmail, account: sender } = await this.connect(account);

    let thread: ThreadHeaders | undefined;
    let threadId: string | undefined;
    if (email.inReplyTo) {
      const { data: original } = await gmail.users.messages.get({
        userId: 'me',
        id: email.inReplyTo,
        format: 'metadata',
        metadataHeaders: ['Message-Id', 'References'],
      });
      thread = threadHeadersFor(original);
      threadId = original.threadId ?? undefined;
    }

    this.logger.log(`Sending Gmail message as ${sender} to ${email.to.length} recipient(s)`);
    const { data } = await gmail.users.messages.send({
      userId: 'me',
      requestBody: { raw: buildRawMessage(email, thread), threadId },
    });

    if (!data.id) {
      throw new Error('Gmail did not return a message id');
    }
    return { id: data.id, threadId: data.threadId ?? undefined };
  }

  private async connect(account: string | undefined): Promise<Connection> {
    const resolved = account ?? this.defaultAccount;
    if (!resolved) {
      throw new Error('No account given and DEFAULT_ACCOUNT_EMAIL is not set');
    }

    const credentials = await this.tokenStore.load(resolved);
    if (!credentials) {
      throw new Error(
        `Gmail is not authorized for ${resolved}; open /oauth/gmail/start?account=${encodeURIComponent(resolved)}`,
      );
    }

    const auth = this.createOAuthClient();
    auth.setCredentials(credentials);
    auth.on('tokens', (tokens) => {
      this.tokenStore.merge(resolved, tokens).catch((error) => {
        this.logger.error(`Failed to save refreshed tokens for ${resolved}`, error);
      });
    });

    return { gmail: google.gmail({ version: 'v1', auth }), account: resolved };
  }

  private createOAuthClient(): Auth.OAuth2Client {
    return new google.auth.OAuth2(
      this.configService.get<string>('GOOGLE_OAUTH_CLIENT_ID'),
      this.configService.get<string>('GOOGLE_OAUTH_CLIENT_SECRET'),
      this.configService.get<string>('GOOGLE_OAUTH_REDIRECT_URL'),
    );
  }

  private async fetchSummaries(
    gmail: gmail_v1.Gmail,
    refs: gmail_v1.Schema$Message[] | undefined,
  ): Promise<MessageSummary[]> {
    const summaries: MessageSummary[] = [];
    for (const ref of refs ?? []) {
      if (!ref.id) {
        continue;
      }
      const { data } = await gmail.users.messages.get({
        userId: 'me',
        id: ref.id,
        format: 'metadata',
        metadataHeaders: METADATA_HEADERS,
      });
      summaries.push(toMessageSummary(data));
    }
    return summaries;
  }

  private async fetchAttachment(
    { gmail, account }: Connection,
    messageId: string,
    part: gmail_v1.Schema$MessagePart,
    attachmentId: string,
    download: boolean,
  ): Promise<AttachmentInfo> {
    const { data } = await gmail.users.messages.attachments.get({ userId: 'me', messageId, id: attachmentId });
    const content = Buffer.from(data.data ?? '', 'base64url');
    const info: AttachmentInfo = {
      filename: part.filename ?? '',
      mimeType: part.mimeType ?? '',
      size: content.length,
    };

    if (download) {
      const dir = path.join(this.downloadDir, safeFilename(account), safeFilename(messageId));
      await fs.mkdir(dir, { recursive: true });
      info.savedTo = path.join(dir, safeFilename(part.filename));
      await fs.writeFile(info.savedTo, content);
    }
    return info;
  }
}
