import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ZodTypeAny, z } from 'zod';
import { SchedulingProvider } from '../common/collaborators';
import { CalendlyEvent, DateWindow, SchedulingLink } from '../common/types';
import { accountSlug, isMissingFile } from '../common/files';
import {
  currentUserSchema,
  eventTypeSchema,
  inviteeSchema,
  pageSchema,
  pickEventTypeUri,
  scheduledEventSchema,
  schedulingLinkResponseSchema,
  toCalendlyEvent,
  toSchedulingLink,
} from './calendly.mapper';

const BASE_URL = 'https://api.calendly.com';
const PAGE_SIZE = 100;

/** Calendly API v2 as the token owner. Lists only events the owner hosts. */
@Injectable()
export class CalendlyService implements SchedulingProvider {
  private readonly logger = new Logger(CalendlyService.name);
  private readonly tokensDir: string;

  constructor(private configService: ConfigService) {
    this.tokensDir = path.resolve(this.configService.get<string>('GOOGLE_TOKENS_DIR') ?? 'tokens');
  }

  async listEvents(accountKey: string | undefined, window: DateWindow): Promise<CalendlyEvent[]> {
    const http = await this.client(accountKey);
    const me = currentUserSchema.parse((await http.get('/users/me')).data);

    const events = await this.follow(http, '/scheduled_events', scheduledEventSchema, {
      organization: me.resource.current_organization,
      min_start_time: window.startsAt.toISOString(),
      max_start_time: window.endsAt.toISOString(),
      count: PAGE_SIZE,
    });

    const result: CalendlyEvent[] = [];
    for (const event of events) {
      const invitees = await this.follow(http, `${event.uri}/invitees`, inviteeSchema, { count: PAGE_SIZE });
      result.push(toCalendlyEvent(event, invitees));
    }

    this.logger.log(`Found ${result.length} Calendly event(s) between ${window.start} and ${window.end}`);
    return result;
  }

  async createSchedulingLink(accountKey: string | undefined, ownerType: string, maxCount: number): Promise<SchedulingLink> {
    const http = await this.client(accountKey);
    const preferred = this.configService.get<string>('CALENDLY_EVENT_TYPE_URI');

    let owner = preferred;
    if (!owner) {
      const me = currentUserSchema.parse((await http.get('/users/me')).data);
      const eventTypes = await this.page(http, '/event_types', eventTypeSchema, { user: me.resource.uri, count: PAGE_SIZE });
      owner = pickEventTypeUri(eventTypes);
    }

    try {
      const { data } = await http.post('/scheduling_links', {
        owner,
        owner_type: ownerType,
        max_event_count: maxCount,
      });
      const link = toSchedulingLink(schedulingLinkResponseSchema.parse(data));
      this.logger.log('Created Calendly scheduling link');
      return link;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        throw new Error(
          `Calendly scheduling_links error ${error.response.status}: ${JSON.stringify(error.response.data)}`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  private async client(accountKey: string | undefined): Promise<AxiosInstance> {
    const token = await this.tokenFor(accountKey);
    return axios.create({
      baseURL: BASE_URL,
      timeout: 30000,
      headers: { Authorization: `Bearer ${token}` },
    });
  }

  private async tokenFor(accountKey: string | undefined): Promise<string> {
    if (accountKey) {
      try {
        const stored = (await fs.readFile(path.join(this.tokensDir, `calendly-${accountSlug(accountKey)}.txt`), 'utf-8')).trim();
        if (stored) {
          return stored;
        }
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
        this.logger.warn(`No Calendly token file for '${accountKey}', using CALENDLY_TOKEN`);
      }
    }

    const fallback = this.configService.get<string>('CALENDLY_TOKEN');
    if (!fallback) {
      throw new Error('No Calendly token found. Set CALENDLY_TOKEN or create tokens/calendly-<key>.txt');
    }
    return fallback;
  }

  private async page<T extends ZodTypeAny>(
    http: AxiosInstance,
    url: string,
    item: T,
    params: Record<string, string | number>,
  ): Promise<z.infer<T>[]> {
    const { data } = await http.get(url, { params });
    return pageSchema.parse(data).collection.map((entry) => item.parse(entry));
  }

  private async follow<T extends ZodTypeAny>(
    http: AxiosInstance,
    url: string,
    item: T,
    params: Record<string, string | number>,
  ): Promise<z.infer<T>[]> {
    const items: z.infer<T>[] = [];
    let nextUrl: string | null | undefined = url;
    let nextParams: Record<string, string | number> = params;

    while (nextUrl) {
      const response = await http.get(nextUrl, { params: nextParams });
      const page = pageSchema.parse(response.data);
      items.push(...page.collection.map((entry) => item.parse(entry)));
      nextUrl = page.pagination?.next_page;
      nextParams = {};
    }
    return items;
  }
}
