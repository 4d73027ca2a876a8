import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError } from '../common/errors';
import { ActionResult, Intent, RoutedResponse } from '../common/types';
import { RouterSettings, routerConfig } from '../config/router.config';
import { ActionDispatcherService } from '../dispatch/action-dispatcher.service';
import { IntentClassifierService } from '../intent/intent-classifier.service';
import { normalizeResponse } from './response-normalizer';

export interface RouteOptions {
  accountEmail?: string;
  calendlyKey?: string;
  /** Reference time for date phrases; defaults to the current time. */
  now?: Date;
}

@Injectable()
export class RouterService {
  private readonly logger = new Logger(RouterService.name);

  constructor(
    private readonly classifier: IntentClassifierService,
    private readonly dispatcher: ActionDispatcherService,
    @Inject(routerConfig.KEY) private readonly settings: RouterSettings,
  ) {}

  /** Classifies and executes one request. Never rejects. */
  async route(text: string, options: RouteOptions = {}): Promise<RoutedResponse> {
    const now = options.now ?? new Date();
    const query = text.trim();
    let intent: Intent = { kind: 'other', rawText: query };

    try {
      intent = await this.classifier.classify(query, {
        defaultAccount: options.accountEmail,
        calendlyKey: options.calendlyKey,
      });
      this.logger.log(`Routing ${intent.kind}${this.settings.dryRun ? ' (dry run)' : ''}`);

      const result = await this.dispatcher.dispatch(intent, {
        now,
        accountEmail: options.accountEmail,
        calendlyKey: options.calendlyKey,
        requestText: query,
      });
      if (!result.success) {
        this.logger.warn(`${intent.kind} did not complete: ${result.summary}`);
      }
      return normalizeResponse(query, intent, result, now);
    } catch (error) {
      this.logger.error(`Routing failed: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
      return normalizeResponse(query, intent, unexpectedFailure(intent, error), now);
    }
  }
}

function unexpectedFailure(intent: Intent, error: unknown): ActionResult {
  return {
    success: false,
    summary: `Sorry, something went wrong: ${describeError(error)}`,
    raw: {
      action: intent.kind === 'other' ? 'freeform' : intent.kind,
      status: 'error',
      error: describeError(error),
    },
  };
}
