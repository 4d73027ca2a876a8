import { Body, Controller, Inject, Logger, Post } from '@nestjs/common';
import { z } from 'zod';
import { SCHEDULING_OWNER_TYPE } from '../common/collaborators';
import { describeError } from '../common/errors';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { RouterSettings, routerConfig } from '../config/router.config';
import { DateWindowResolver } from '../date-window/date-window.resolver';
import { CalendlyService } from './calendly.service';

const eventsSchema = z.object({
  accountKey: z.string().min(1).optional(),
  when: z.string().min(1).default('today'),
  daypart: z.enum(['morning', 'afternoon', 'evening']).optional(),
});

const linkSchema = z.object({
  accountKey: z.string().min(1).optional(),
  maxCount: z.coerce.number().int().positive().optional(),
});

type EventsBody = z.infer<typeof eventsSchema>;
type LinkBody = z.infer<typeof linkSchema>;

@Controller('calendly')
export class CalendlyController {
  private readonly logger = new Logger(CalendlyController.name);

  constructor(
    private readonly calendlyService: CalendlyService,
    private readonly resolver: DateWindowResolver,
    @Inject(routerConfig.KEY) private readonly settings: RouterSettings,
  ) {}

  @Post('events')
  async events(@Body(new ZodValidationPipe(eventsSchema)) body: EventsBody) {
    try {
      const resolved = this.resolver.resolve(body.when, new Date(), this.settings.timezone);
      const window =
        body.daypart && resolved.start === resolved.end
          ? this.resolver.narrowToDaypart(resolved, body.daypart)
          : resolved;
      const events = await this.calendlyService.listEvents(body.accountKey, window);
      return {
        success: true,
        window: { start: window.startsAt.toISOString(), end: window.endsAt.toISOString() },
        count: events.length,
        events,
      };
    } catch (error) {
      this.logger.error(`calendly events failed: ${describeError(error)}`);
      return { success: false, error: describeError(error) };
    }
  }

  @Post('link')
  async link(@Body(new ZodValidationPipe(linkSchema)) body: LinkBody) {
    try {
      const link = await this.calendlyService.createSchedulingLink(
        body.accountKey,
        SCHEDULING_OWNER_TYPE,
        body.maxCount ?? this.settings.schedulingLinkMaxCount,
      );
      return { success: true, link };
    } catch (error) {
      this.logger.error(`calendly link failed: ${describeError(error)}`);
      return { success: false, error: describeError(error) };
    }
  }
}
