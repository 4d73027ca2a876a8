import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Auth } from 'googleapis';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { accountSlug, isMissingFile } from '../common/files';

const credentialsSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  id_token: z.string().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().optional(),
});

/** One JSON credentials file per Gmail account under GOOGLE_TOKENS_DIR. */
@Injectable()
export class GmailTokenStore {
  private readonly logger = new Logger(GmailTokenStore.name);
  private readonly tokensDir: string;

  constructor(private configService: ConfigService) {
    this.tokensDir = path.resolve(this.configService.get<string>('GOOGLE_TOKENS_DIR') ?? 'tokens');
  }

  pathFor(account: string): string {
    return path.join(this.tokensDir, `gmail-${accountSlug(account)}.json`);
  }

  async load(account: string): Promise<Auth.Credentials | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.pathFor(account), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    const parsed = credentialsSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed token file for ${account}`);
      return undefined;
    }
    return parsed.data;
  }

  async save(account: string, credentials: Auth.Credentials): Promise<string> {
    const target = this.pathFor(account);
    await fs.mkdir(this.tokensDir, { recursive: true });
    await fs.writeFile(target, JSON.stringify(credentials, null, 2));
    this.logger.log(`Saved Gmail tokens for ${account}`);
    return target;
  }

  /** Keeps a stored refresh token when Google omits it from a refresh response. */
  async merge(account: string, update: Auth.Credentials): Promise<void> {
    const current = (await this.load(account)) ?? {};
    await this.save(account, {
      ...current,
      ...update,
      refresh_token: update.refresh_token ?? current.refresh_token,
    });
  }
}
