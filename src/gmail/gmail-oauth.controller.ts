import { Controller, Get, Logger, Query, Res } from '@nestjs/common';
import { Response } from 'express';
import { z } from 'zod';
import { describeError } from '../common/errors';
import { GmailService } from './gmail.service';

const accountSchema = z.string().email();

@Controller('oauth/gmail')
export class GmailOAuthController {
  private readonly logger = new Logger(GmailOAuthController.name);

  constructor(private gmailService: GmailService) {}

  @Get('start')
  startAuth(@Query('account') account: string | undefined, @Res() res: Response) {
    const parsed = accountSchema.safeParse(account);
    if (!parsed.success) {
      return res.status(400).send('Pass the Gmail address to connect as ?account=you@example.com');
    }
    res.redirect(this.gmailService.generateAuthUrl(parsed.data));
  }

  @Get('callback')
  async handleCallback(
    @Query('code') code: string | undefined,
    @Query('state') state: string | undefined,
    @Res() res: Response,
  ) {
    const account = accountSchema.safeParse(state);
    if (!code || !account.success) {
      return res.status(400).send('Authorization code or account not provided');
    }

    try {
      await this.gmailService.exchangeCodeForTokens(code, account.data);
      res.send(`
        <html>
          <body>
            <h2>Gmail connected</h2>
            <p>${escapeHtml(account.data)} is ready. You can close this window.</p>
          </body>
        </html>
      `);
    } catch (error) {
      this.logger.error(`OAuth callback failed: ${describeError(error)}`);
      res.status(500).send('Failed to authenticate with Gmail');
    }
  }
}

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => `&#${char.charCodeAt(0)};`);
}
