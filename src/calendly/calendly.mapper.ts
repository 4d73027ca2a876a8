import { z } from 'zod';
import { CalendlyEvent, SchedulingLink } from '../common/types';

const optionalText = z.string().nullish();

export const currentUserSchema = z.object({
  resource: z.object({
    uri: z.string(),
    current_organization: z.string(),
  }),
});

export const pageSchema = z.object({
  collection: z.array(z.unknown()).default([]),
  pagination: z.object({ next_page: optionalText }).nullish(),
});

export const scheduledEventSchema = z.object({
  uri: z.string(),
  name: optionalText,
  start_time: optionalText,
  end_time: optionalText,
  status: optionalText,
  location: z.object({ location: optionalText }).nullish(),
});

export const inviteeSchema = z.object({
  name: optionalText,
  email: optionalText,
  timezone: optionalText,
  questions_and_answers: z
    .array(z.object({ question: z.string(), answer: z.string() }))
    .nullish(),
});

export const eventTypeSchema = z.object({
  uri: z.string(),
  active: z.boolean().nullish(),
  deleted_at: optionalText,
});

export const schedulingLinkResponseSchema = z.object({
  resource: z.object({
    booking_url: optionalText,
    url: optionalText,
    owner: optionalText,
    owner_type: optionalText,
  }),
});

export type ScheduledEvent = z.infer<typeof scheduledEventSchema>;
export type Invitee = z.infer<typeof inviteeSchema>;
export type EventType = z.infer<typeof eventTypeSchema>;

export function toCalendlyEvent(event: ScheduledEvent, invitees: Invitee[]): CalendlyEvent {
  return {
    name: event.name ?? undefined,
    startTime: event.start_time ?? undefined,
    endTime: event.end_time ?? undefined,
    status: event.status ?? undefined,
    location: event.location?.location ?? '',
    invitees: invitees.map((invitee) => ({
      name: invitee.name ?? undefined,
      email: invitee.email ?? undefined,
      timezone: invitee.timezone ?? undefined,
      questionsAndAnswers: invitee.questions_and_answers ?? [],
    })),
  };
}

/**
 * The configured event type wins; otherwise the first active, non-deleted
 * one, otherwise the first listed.
 */
export function pickEventTypeUri(eventTypes: EventType[], preferredUri?: string): string {
  if (preferredUri) {
    return preferredUri;
  }
  if (eventTypes.length === 0) {
    throw new Error('No Calendly event types found for this user. Create at least one event type in Calendly.');
  }
  const active = eventTypes.find((eventType) => eventType.active !== false && !eventType.deleted_at);
  return (active ?? eventTypes[0]).uri;
}

export function toSchedulingLink(response: z.infer<typeof schedulingLinkResponseSchema>): SchedulingLink {
  const { booking_url, url, owner, owner_type } = response.resource;
  const link = booking_url || url;
  if (!link) {
    throw new Error('Calendly did not return a link');
  }
  return { url: link, owner: owner ?? undefined, ownerType: owner_type ?? undefined };
}
