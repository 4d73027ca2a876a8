import { Body, Controller, Inject, Logger, Post } from '@nestjs/common';
import { z } from 'zod';
import { describeError } from '../common/errors';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { RouterSettings, routerConfig } from '../config/router.config';
import { GmailService } from './gmail.service';

const account = z.string().email().optional();
const maxResults = z.coerce.number().int().min(1).max(500).default(25);
const addresses = z.array(z.string().email());

const listSchema = z.object({ account, maxResults });
const searchSchema = z.object({ account, query: z.string().min(1), maxResults });
const getSchema = z.object({ account, id: z.string().min(1), downloadAttachments: z.boolean().default(false) });
const sendSchema = z.object({
  account,
  to: addresses.min(1),
  subject: z.string().default(''),
  body: z.string().default(''),
  cc: addresses.optional(),
  bcc: addresses.optional(),
  inReplyTo: z.string().optional(),
});

type ListBody = z.infer<typeof listSchema>;
type SearchBody = z.infer<typeof searchSchema>;
type GetBody = z.infer<typeof getSchema>;
type SendBody = z.infer<typeof sendSchema>;

@Controller('gmail')
export class GmailController {
  private readonly logger = new Logger(GmailController.name);

  constructor(
    private readonly gmailService: GmailService,
    @Inject(routerConfig.KEY) private readonly settings: RouterSettings,
  ) {}

  @Post('list')
  async list(@Body(new ZodValidationPipe(listSchema)) body: ListBody) {
    return this.run('list', async () => ({
      messages: await this.gmailService.listMessages(body.account, body.maxResults),
    }));
  }

  @Post('search')
  async search(@Body(new ZodValidationPipe(searchSchema)) body: SearchBody) {
    return this.run('search', async () => ({
      messages: await this.gmailService.searchMessages(body.account, body.query, body.maxResults),
    }));
  }

  @Post('get')
  async get(@Body(new ZodValidationPipe(getSchema)) body: GetBody) {
    return this.run('get', async () => ({
      message: await this.gmailService.getMessage(body.account, body.id, body.downloadAttachments),
    }));
  }

  @Post('send')
  async send(@Body(new ZodValidationPipe(sendSchema)) body: SendBody) {
    const { account: sender, ...email } = body;
    if (this.settings.dryRun) {
      this.logger.log(`DRY_RUN enabled; not sending to ${email.to.length} recipient(s)`);
      return { success: true, status: 'simulated', to: email.to };
    }
    return this.run('send', async () => ({
      status: 'sent',
      ...(await this.gmailService.sendMessage(sender, email)),
    }));
  }

  private async run<T extends object>(operation: string, action: () => Promise<T>) {
    try {
      return { success: true, ...(await action()) };
    } catch (error) {
      this.logger.error(`gmail ${operation} failed: ${describeError(error)}`);
      return { success: false, error: describeError(error) };
    }
  }
}
