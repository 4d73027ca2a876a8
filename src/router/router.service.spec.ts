import { Test } from '@nestjs/testing';
import { LANGUAGE_MODEL, MAIL_PROVIDER, SCHEDULING_PROVIDER } from '../common/collaborators';
import { RouterSettings, routerConfig } from '../config/router.config';
import { DateWindowResolver } from '../date-window/date-window.resolver';
import { ActionDispatcherService } from '../dispatch/action-dispatcher.service';
import { CLARIFICATION_REPLY } from '../dispatch/summaries';
import { IntentClassifierService } from '../intent/intent-classifier.service';
import { FakeLanguageModel, FakeMailProvider, FakeSchedulingProvider, modelOutput } from '../testing/fakes';
import { RouterService } from './router.service';

// Saturday 10:00 in London
const NOW = new Date('2025-09-27T09:00:00.000Z');

describe('RouterService', () => {
  let router: RouterService;
  let dispatcher: ActionDispatcherService;
  let model: FakeLanguageModel;
  let mail: FakeMailProvider;
  let scheduling: FakeSchedulingProvider;
  let settings: RouterSettings;

  beforeEach(async () => {
    model = new FakeLanguageModel();
    mail = new FakeMailProvider();
    scheduling = new FakeSchedulingProvider();
    settings = {
      defaultAccountEmail: 'me@example.com',
      timezone: 'Europe/London',
      dryRun: false,
      draftEmails: false,
      defaultSignature: '',
      schedulingLinkMaxCount: 1,
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        RouterService,
        IntentClassifierService,
        ActionDispatcherService,
        DateWindowResolver,
        { provide: LANGUAGE_MODEL, useValue: model },
        { provide: MAIL_PROVIDER, useValue: mail },
        { provide: SCHEDULING_PROVIDER, useValue: scheduling },
        { provide: routerConfig.KEY, useValue: settings },
      ],
    }).compile();

    router = moduleRef.get(RouterService);
    dispatcher = moduleRef.get(ActionDispatcherService);
  });

  it('summarizes yesterday as the previous local day', async () => {
    model.queueStructured(modelOutput({ kind: 'summarize_emails', time_window: 'yesterday' }));

    const response = await router.route('summarize my emails from yesterday', { now: NOW });

    expect(response.kind).toBe('summarize_emails');
    expect(response.intent).toEqual({ kind: 'summarize_emails', timeWindow: 'yesterday' });
    expect(response.details.date_range).toEqual({ start: '2025-09-26', end: '2025-09-26' });
    expect(mail.searches[0].query).toBe('after:2025/09/25 before:2025/09/27');
    expect(response.status).toBe('empty');
    expect(response.text).toBe("I couldn't find emails between 2025-09-26 and 2025-09-26 within the last 40 days.");
  });

  it('simulates a send under dry run', async () => {
    settings.dryRun = true;
    model.queueStructured(modelOutput({ kind: 'send_email', to: ['bob@example.com'], message: 'hi' }));

    const response = await router.route('send an email to bob@example.com saying hi', { now: NOW });

    expect(response.ok).toBe(true);
    expect(response.status).toBe('simulated');
    expect(response.details.to).toEqual(['bob@example.com']);
    expect(response.text).toBe('Dry run: would send "(no subject)" to bob@example.com. Nothing was sent.');
    expect(mail.sent).toHaveLength(0);
  });

  it('looks up Monday afternoon in Calendly', async () => {
    model.queueStructured(modelOutput({ kind: 'calendly_lookup', date_ref: 'monday', daypart: 'afternoon' }));

    const response = await router.route('who did I meet on Monday afternoon?', { now: NOW, calendlyKey: 'team' });

    expect(response.kind).toBe('calendly_lookup');
    expect(response.details).toMatchObject({ date: '2025-09-22', window: 'afternoon', events: [], count: 0 });
    expect(scheduling.lookups[0].accountKey).toBe('team');
    expect(response.text).toBe('No hosted Calendly events found on 2025-09-22 (afternoon).');
  });

  it('clamps a long window to the lookback cap', async () => {
    model.queueStructured(modelOutput({ kind: 'summarize_emails', time_window: 'past 2 months' }));

    const response = await router.route('summarize my emails from the past 2 months', { now: NOW });

    expect(response.details.date_range).toEqual({ start: '2025-08-18', end: '2025-09-27' });
    expect(mail.searches[0].query).toBe('after:2025/08/17 before:2025/09/28');
  });

  it('answers garbage with a clarification', async () => {
    model.queueStructured(new Error('invalid json'));

    const response = await router.route('asdf qwer', { now: NOW });

    expect(response).toMatchObject({
      ok: true,
      status: 'ok',
      kind: 'other',
      text: CLARIFICATION_REPLY,
      details: { action: 'freeform', status: 'ok', note: 'Classification failed: invalid json' },
    });
  });

  it('still returns an envelope when dispatch throws', async () => {
    model.queueStructured(modelOutput({ kind: 'other', reply: 'Hello!' }));
    jest.spyOn(dispatcher, 'dispatch').mockRejectedValue(new Error('boom'));

    const response = await router.route('hello', { now: NOW });

    expect(response).toMatchObject({
      ok: false,
      status: 'error',
      query: 'hello',
      kind: 'other',
      text: 'Sorry, something went wrong: boom',
      timestamp: '2025-09-27T09:00:00.000Z',
    });
  });
});
