/**
 * Focus Agreement System Tests
 */

import {
  AgreementOutcome,
  AuditEventType,
  BehavioralEvent,
  ComplianceState,
  EnforcementResult,
  ErrorCode,
  EventSeverity,
  FocusAgreementSystem,
  MemoryStorageAdapter,
  NegotiationStep,
  NotificationUrgency,
} from '../src';
import {
  ManualClock,
  RecordingNotifier,
  RecordingSpeechSynthesizer,
  ScriptedResourceCloser,
  StaticActivitySource,
} from '../src/testing';

const T0 = new Date('2024-01-01T00:00:00.000Z');

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function event(overrides: Partial<BehavioralEvent> = {}): BehavioralEvent {
  return {
    event_type: 'distraction_site',
    severity: EventSeverity.MEDIUM,
    subject_key: 'youtube.com',
    duration_seconds: 1500,
    detected_at: T0,
    metadata: { category: 'Entertainment' },
    ...overrides,
  };
}

function sessionIdOf(step: NegotiationStep): string {
  if (step.kind !== 'prompt') {
    throw new Error(`expected a prompt, got ${step.kind}`);
  }
  return step.session_id;
}

describe('FocusAgreementSystem', () => {
  let clock: ManualClock;
  let source: StaticActivitySource;
  let voice: RecordingSpeechSynthesizer;
  let notifier: RecordingNotifier;
  let closer: ScriptedResourceCloser;
  let store: MemoryStorageAdapter;
  let system: FocusAgreementSystem;

  function createSystem(): FocusAgreementSystem {
    const created = new FocusAgreementSystem({
      activitySource: source,
      clock: clock.now,
      errorHandler: { console_logging: false },
      monitor: { tickIntervalMs: 60000 },
    });
    const registry = created.getCapabilityRegistry();
    registry.register('synthesize_speech', 'voice', voice);
    registry.register('notify', 'recorder', notifier);
    registry.register('close_resource', 'closer', closer);
    registry.register('persist_agreement', 'memory', store);
    registry.register('load_recent_agreements', 'memory', store);
    return created;
  }

  async function negotiateTenMinutes(target: FocusAgreementSystem = system): Promise<string> {
    const sessionId = sessionIdOf(await target.handleEvent(event()));
    const step = await target.respond(sessionId, '10 minutes');
    if (step.kind !== 'agreed') {
      throw new Error(`expected an agreement, got ${step.kind}`);
    }
    return step.agreement.agreement_id;
  }

  beforeEach(() => {
    clock = new ManualClock(T0);
    source = new StaticActivitySource();
    voice = new RecordingSpeechSynthesizer();
    notifier = new RecordingNotifier();
    closer = new ScriptedResourceCloser();
    store = new MemoryStorageAdapter();
    system = createSystem();
  });

  afterEach(() => {
    system.stopMonitoring();
  });

  describe('Negotiation', () => {
    test('should speak every monitor line', async () => {
      const sessionId = sessionIdOf(await system.handleEvent(event()));
      await system.respond(sessionId, '20 minutes');
      await system.respond(sessionId, 'ok');
      const agreed = await system.respond(sessionId, '10');

      expect(voice.spoken).toEqual([
        "You've been on Entertainment: youtube.com for 25 minutes.\n\nIs this for work or leisure? How long do you need?",
        '20 minutes is a lot.\n\nHow about 10 minutes instead?',
        "Please tell me how many minutes you need. For example: '10 minutes' or '15 min'.",
        "Okay, 10 minutes. I'll check back then.",
      ]);
      expect(agreed.kind).toBe('agreed');
    });

    test('should track and persist a concluded agreement', async () => {
      const agreementId = await negotiateTenMinutes();

      expect(system.getActiveAgreements().map((a) => a.agreement_id)).toEqual([agreementId]);
      expect(system.getAgreement(agreementId)?.agreed_duration_seconds).toBe(600);
      expect((await store.get(agreementId))?.outcome).toBe(AgreementOutcome.NEGOTIATED);
      expect(system.getStatus(agreementId)).toMatchObject({
        state: ComplianceState.SAFE,
        seconds_remaining: 600,
      });
    });

    test('should create nothing when the user declines', async () => {
      const sessionId = sessionIdOf(await system.handleEvent(event()));
      const step = await system.respond(sessionId, "I'm done");

      expect(step.kind).toBe('declined');
      expect(system.getActiveAgreements()).toEqual([]);
      expect(await store.count()).toBe(0);
      expect(system.getNegotiation(sessionId)).toBeNull();
    });

    test('should abandon an open negotiation', async () => {
      const sessionId = sessionIdOf(await system.handleEvent(event()));

      system.abandonNegotiation(sessionId);

      expect(system.getNegotiation(sessionId)).toBeNull();
    });

    test('should fall back to the console without a voice', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const silent = new FocusAgreementSystem({
        clock: clock.now,
        errorHandler: { console_logging: false },
      });

      await silent.handleEvent(event({ event_type: 'late_night_gaming', subject_key: 'steam', duration_seconds: 3600 }));

      expect(log).toHaveBeenCalledWith(
        "[focus-monitor] You've been on steam for 60 minutes.\n\nHow much longer do you need?"
      );
      log.mockRestore();
    });
  });

  describe('Blocking', () => {
    test('should enforce high-severity behavior at once', async () => {
      const step = await system.handleEvent(
        event({ event_type: 'adult_content', severity: EventSeverity.HIGH, subject_key: 'example.test' })
      );

      expect(step.kind).toBe('blocked');
      if (step.kind !== 'blocked') return;
      expect(voice.spoken).toEqual(['This has to stop right now.']);
      expect(closer.calls).toEqual(['example.test']);
      expect(step.agreement.is_active).toBe(false);
      expect(step.agreement.is_violated).toBe(false);
      expect((await store.get(step.agreement.agreement_id))?.is_active).toBe(false);
    });
  });

  describe('Monitoring', () => {
    test('should warn, then enforce and persist a violation', async () => {
      const agreementId = await negotiateTenMinutes();

      clock.advance(560);
      source.set({ subject_key: 'https://youtube.com/watch', observed_at: clock.now() });
      await system.tick();
      await flush();

      expect(notifier.messages).toEqual([
        {
          message: '⏰ Warning: 40 seconds remaining\nActivity: distraction_site\nTarget: youtube.com',
          urgency: NotificationUrgency.NORMAL,
        },
      ]);

      clock.advance(90);
      source.set({ subject_key: 'https://youtube.com/watch', observed_at: clock.now() });
      const result = await system.tick();

      expect(result?.enforcement.map((o) => o.result)).toEqual([EnforcementResult.ENFORCED]);
      expect(closer.calls).toEqual(['youtube.com']);
      expect(await store.get(agreementId)).toMatchObject({
        is_active: false,
        is_violated: true,
        violation_count: 1,
      });
      expect(
        system.getAgreementHistory(agreementId).map((e) => e.event_type)
      ).toContain(AuditEventType.ENFORCEMENT_EXECUTED);
      expect(system.getMonitorStats().totalEnforcements).toBe(1);
    });

    test('should persist a completed agreement', async () => {
      const agreementId = await negotiateTenMinutes();

      clock.advance(601);
      source.set(null);
      await system.tick();

      expect(await store.get(agreementId)).toMatchObject({ is_active: false, is_violated: false });
      expect(system.getSummary()).toMatchObject({ total: 0, active: 0 });
    });

    test('should toggle the monitoring loop', () => {
      system.startMonitoring();
      expect(system.isMonitoring()).toBe(true);

      system.stopMonitoring();
      expect(system.isMonitoring()).toBe(false);
    });
  });

  describe('Extension', () => {
    test('should extend and persist an agreement', async () => {
      const agreementId = await negotiateTenMinutes();

      const extended = await system.extendAgreement(agreementId, 300, {
        approved_by: 'user',
        user_text: 'five more minutes please',
      });

      expect(extended.agreed_duration_seconds).toBe(900);
      expect((await store.get(agreementId))?.agreed_duration_seconds).toBe(900);
      expect(system.getStatus(agreementId)?.seconds_remaining).toBe(900);
    });

    test('should warn again before the extended expiry', async () => {
      const agreementId = await negotiateTenMinutes();
      const warning = {
        message: '⏰ Warning: 40 seconds remaining\nActivity: distraction_site\nTarget: youtube.com',
        urgency: NotificationUrgency.NORMAL,
      };

      clock.advance(560);
      source.set({ subject_key: 'youtube.com', observed_at: clock.now() });
      await system.tick();
      await flush();

      await system.extendAgreement(agreementId, 300, { approved_by: 'user' });

      clock.advance(300);
      source.set({ subject_key: 'youtube.com', observed_at: clock.now() });
      await system.tick();
      await flush();

      expect(notifier.messages).toEqual([warning, warning]);
    });

    test('should refuse to extend an agreement awaiting enforcement', async () => {
      const agreementId = await negotiateTenMinutes();
      const registry = system.getCapabilityRegistry();
      registry.unregister('close_resource', 'closer');
      registry.register('close_resource', 'stuck', new ScriptedResourceCloser([false]));

      clock.advance(650);
      source.set({ subject_key: 'youtube.com', observed_at: clock.now() });
      await system.tick();

      await expect(
        system.extendAgreement(agreementId, 600, { approved_by: 'user' })
      ).rejects.toMatchObject({ code: ErrorCode.AGREEMENT_INVALID_STATE });
      expect(system.getAgreement(agreementId)?.agreed_duration_seconds).toBe(600);
    });

    test('should reject unknown agreements', async () => {
      await expect(
        system.extendAgreement('missing', 300, { approved_by: 'user' })
      ).rejects.toMatchObject({ code: ErrorCode.AGREEMENT_NOT_FOUND });
    });
  });

  describe('Persistence', () => {
    test('should restore active agreements into a new system', async () => {
      const agreementId = await negotiateTenMinutes();
      const restarted = createSystem();

      expect(await restarted.restoreRecent()).toBe(1);
      expect(await restarted.restoreRecent()).toBe(0);
      expect(restarted.getActiveAgreements().map((a) => a.agreement_id)).toEqual([agreementId]);
    });

    test('should restore nothing without a loader', async () => {
      const bare = new FocusAgreementSystem({ clock: clock.now, errorHandler: { console_logging: false } });

      expect(await bare.restoreRecent()).toBe(0);
    });

    test('should report a failing store without losing the agreement', async () => {
      const registry = system.getCapabilityRegistry();
      registry.unregister('persist_agreement', 'memory');
      registry.register('persist_agreement', 'broken', {
        save: async () => {
          throw new Error('disk full');
        },
      });

      const agreementId = await negotiateTenMinutes();

      expect(system.getAgreement(agreementId)).not.toBeNull();
      const [latest] = system.getErrorHandler().getRecentErrors(1);
      expect(latest?.code).toBe(ErrorCode.STORAGE_WRITE_FAILED);
      expect(latest?.message).toBe('Failed to persist agreement: disk full');
    });
  });
});
