import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { z } from 'zod';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { RouterService } from './router.service';

const routeSchema = z.object({
  text: z.string().trim().min(1, 'text is required'),
  accountEmail: z.string().email().optional(),
  calendlyKey: z.string().min(1).optional(),
});

type RouteBody = z.infer<typeof routeSchema>;

@Controller()
export class RouterController {
  constructor(private readonly routerService: RouterService) {}

  @Get('health')
  health() {
    return { status: 'ok', service: 'assistant-router', timestamp: new Date().toISOString() };
  }

  @Post('route')
  @HttpCode(200)
  route(@Body(new ZodValidationPipe(routeSchema)) body: RouteBody) {
    return this.routerService.route(body.text, {
      accountEmail: body.accountEmail,
      calendlyKey: body.calendlyKey,
    });
  }
}
