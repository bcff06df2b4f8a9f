/**
 * Compliance Tracker Tests
 */

import {
  Agreement,
  AgreementLifecycleManager,
  AgreementOutcome,
  AuditEventType,
  AuditLogger,
  CentralErrorHandler,
  ComplianceHooks,
  ComplianceState,
  ComplianceTracker,
  ComplianceTransitionType,
  ErrorCode,
  EventSeverity,
  MalformedActivitySignalError,
} from '../src';
import { ManualClock } from '../src/testing';

const T0 = new Date('2024-01-01T00:00:00.000Z');

function at(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

function recordingHooks(): ComplianceHooks & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    onWarning: jest.fn((agreement: Agreement, secondsRemaining: number) => {
      calls.push(`warning:${agreement.subject_key}:${secondsRemaining}`);
    }),
    onExpired: jest.fn((agreement: Agreement) => {
      calls.push(`expired:${agreement.subject_key}`);
    }),
    onViolation: jest.fn((agreement: Agreement) => {
      calls.push(`violation:${agreement.subject_key}`);
    }),
    onCompleted: jest.fn((agreement: Agreement) => {
      calls.push(`completed:${agreement.subject_key}`);
    }),
  };
}

describe('Compliance Tracker', () => {
  let clock: ManualClock;
  let auditLogger: AuditLogger;
  let lifecycle: AgreementLifecycleManager;
  let errorHandler: CentralErrorHandler;
  let tracker: ComplianceTracker;

  function track(
    subjectKey: string | null,
    durationSeconds: number,
    createdAtSeconds = 0
  ): Agreement {
    const agreement = lifecycle.create({
      event_type: 'distraction_site',
      severity: EventSeverity.MEDIUM,
      subject_key: subjectKey,
      agreed_duration_seconds: durationSeconds,
      outcome: AgreementOutcome.NEGOTIATED,
      created_at: at(createdAtSeconds),
    });
    tracker.add(agreement);
    return agreement;
  }

  beforeEach(() => {
    clock = new ManualClock(T0);
    auditLogger = new AuditLogger();
    lifecycle = new AgreementLifecycleManager(auditLogger, { clock: clock.now });
    errorHandler = new CentralErrorHandler({ console_logging: false });
    tracker = new ComplianceTracker(lifecycle, auditLogger, errorHandler, { clock: clock.now });
  });

  describe('Violations', () => {
    test('should flag activity past the grace period as a violation', () => {
      const agreement = track('youtube.com', 60);
      const hooks = recordingHooks();

      const result = tracker.checkCompliance(
        { subject_key: 'https://www.youtube.com/watch?v=abc', observed_at: at(95) },
        hooks
      );

      expect(result.skipped).toBe(false);
      expect(result.transitions.map((t) => t.transition)).toEqual([
        ComplianceTransitionType.EXPIRED,
        ComplianceTransitionType.VIOLATED,
      ]);
      expect(hooks.calls).toEqual(['expired:youtube.com', 'violation:youtube.com']);
      expect(agreement.is_violated).toBe(true);
      expect(agreement.is_active).toBe(true);
      expect(agreement.violation_count).toBe(1);
    });

    test('should fire each callback at most once', () => {
      const agreement = track('youtube.com', 60);
      const hooks = recordingHooks();

      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(95) }, hooks);
      const second = tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(100) }, hooks);

      expect(second.transitions).toEqual([]);
      expect(hooks.onViolation).toHaveBeenCalledTimes(1);
      expect(hooks.onExpired).toHaveBeenCalledTimes(1);
      expect(agreement.violation_count).toBe(1);
    });

    test('should tolerate activity inside the grace period', () => {
      const agreement = track('youtube.com', 120);
      const hooks = recordingHooks();

      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(125) }, hooks);
      expect(agreement.is_violated).toBe(false);
      expect(agreement.is_active).toBe(true);
      expect(hooks.calls).toEqual(['expired:youtube.com']);

      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(150) }, hooks);
      expect(agreement.is_violated).toBe(true);
      expect(hooks.calls).toEqual(['expired:youtube.com', 'violation:youtube.com']);
    });

    test('should match subjects case-insensitively', () => {
      const agreement = track('YouTube.com', 60);

      tracker.checkCompliance({ subject_key: 'm.youtube.com/feed', observed_at: at(95) }, recordingHooks());

      expect(agreement.is_violated).toBe(true);
    });

    test('should treat any identified activity as a whole-device violation', () => {
      const agreement = track(null, 60);

      tracker.checkCompliance({ subject_key: 'anything', observed_at: at(95) }, recordingHooks());

      expect(agreement.is_violated).toBe(true);
    });

    test('should audit the violation', () => {
      const agreement = track('youtube.com', 60);

      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(95) }, recordingHooks());

      const violations = auditLogger.getViolations();
      expect(violations).toHaveLength(1);
      expect(violations[0]?.subject_id).toBe(agreement.agreement_id);
      expect(violations[0]?.details['violation_count']).toBe(1);
    });
  });

  describe('Completion', () => {
    test('should complete an expired agreement with no matching activity', () => {
      const agreement = track('youtube.com', 60);
      const hooks = recordingHooks();

      const result = tracker.checkCompliance(
        { subject_key: 'docs.example.com', observed_at: at(65) },
        hooks
      );

      expect(result.transitions.map((t) => t.transition)).toEqual([
        ComplianceTransitionType.EXPIRED,
        ComplianceTransitionType.COMPLETED,
      ]);
      expect(hooks.calls).toEqual(['expired:youtube.com', 'completed:youtube.com']);
      expect(hooks.onViolation).not.toHaveBeenCalled();
      expect(agreement.is_active).toBe(false);
      expect(agreement.is_violated).toBe(false);
    });

    test('should count unidentified activity against a whole-device agreement', () => {
      const agreement = track(null, 60);

      tracker.checkCompliance({ observed_at: at(200) }, recordingHooks());

      expect(agreement.is_active).toBe(true);
      expect(agreement.is_violated).toBe(true);
      expect(agreement.violation_count).toBe(1);
    });

    test('should complete a whole-device agreement once the device is idle', () => {
      const agreement = track(null, 60);
      clock.advance(200);

      tracker.checkCompliance(null, recordingHooks());

      expect(agreement.is_active).toBe(false);
      expect(agreement.is_violated).toBe(false);
    });

    test('should not count unidentified activity against a subject agreement', () => {
      const agreement = track('youtube.com', 60);

      tracker.checkCompliance({ observed_at: at(200) }, recordingHooks());

      expect(agreement.is_active).toBe(false);
      expect(agreement.is_violated).toBe(false);
    });

    test('should use the clock when there is no signal', () => {
      const agreement = track('youtube.com', 60);
      clock.advance(61);

      const result = tracker.checkCompliance(null, recordingHooks());

      expect(result.observed_at).toEqual(at(61));
      expect(agreement.is_active).toBe(false);
    });

    test('should stop evaluating deactivated agreements', () => {
      track('youtube.com', 60);
      const hooks = recordingHooks();

      tracker.checkCompliance({ observed_at: at(65) }, hooks);
      const second = tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(200) }, hooks);

      expect(second.agreements_checked).toBe(0);
      expect(hooks.onViolation).not.toHaveBeenCalled();
    });
  });

  describe('Warnings', () => {
    test('should warn once inside the warning window', () => {
      track('youtube.com', 120);
      const hooks = recordingHooks();

      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(10) }, hooks);
      expect(hooks.calls).toEqual([]);

      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(70) }, hooks);
      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(80) }, hooks);

      expect(hooks.calls).toEqual(['warning:youtube.com:50']);
    });

    test('should not warn when the window was never observed', () => {
      track('youtube.com', 120);
      const hooks = recordingHooks();

      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(10) }, hooks);
      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(130) }, hooks);

      expect(hooks.onWarning).not.toHaveBeenCalled();
      expect(hooks.calls).toEqual(['expired:youtube.com']);
    });

    test('should fire warning, expiry and violation in order', () => {
      track('youtube.com', 120);
      const hooks = recordingHooks();

      for (const seconds of [70, 125, 155]) {
        tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(seconds) }, hooks);
      }

      expect(hooks.calls).toEqual([
        'warning:youtube.com:50',
        'expired:youtube.com',
        'violation:youtube.com',
      ]);
    });

    test('should warn and expire again after an extension', () => {
      const agreement = track('youtube.com', 120);
      const hooks = recordingHooks();
      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(70) }, hooks);
      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(125) }, hooks);

      lifecycle.extend(agreement, 300, { approved_by: 'user' });
      expect(tracker.rearm(agreement.agreement_id)).toBe(true);

      for (const seconds of [370, 425, 455]) {
        tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(seconds) }, hooks);
      }

      expect(hooks.calls).toEqual([
        'warning:youtube.com:50',
        'expired:youtube.com',
        'warning:youtube.com:50',
        'expired:youtube.com',
        'violation:youtube.com',
      ]);
    });

    test('should not re-arm a violated agreement', () => {
      const agreement = track('youtube.com', 60);
      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(95) }, recordingHooks());

      expect(tracker.rearm(agreement.agreement_id)).toBe(false);
      expect(tracker.rearm('missing')).toBe(false);
    });
  });

  describe('Overlapping agreements', () => {
    test('should keep only the agreement that expires last', () => {
      const earlier = track('YouTube.com', 300);
      const later = track('youtube.com', 600, 10);
      const hooks = recordingHooks();

      const result = tracker.checkCompliance({ observed_at: at(20) }, hooks);

      expect(result.transitions).toEqual([
        { agreement_id: earlier.agreement_id, transition: ComplianceTransitionType.SUPERSEDED },
      ]);
      expect(earlier.is_active).toBe(false);
      expect(later.is_active).toBe(true);
      expect(hooks.calls).toEqual(['completed:YouTube.com']);
      expect(
        auditLogger
          .getAgreementHistory(earlier.agreement_id)
          .find((e) => e.event_type === AuditEventType.AGREEMENT_COMPLETED)?.details['reason']
      ).toBe('superseded');
    });

    test('should keep the later-created agreement on equal expiry', () => {
      const first = track('youtube.com', 300);
      const second = track('youtube.com', 290, 10);

      tracker.checkCompliance({ observed_at: at(20) }, recordingHooks());

      expect(first.is_active).toBe(false);
      expect(second.is_active).toBe(true);
    });

    test('should leave agreements on different subjects alone', () => {
      const a = track('youtube.com', 300);
      const b = track('reddit.com', 300);

      tracker.checkCompliance({ observed_at: at(20) }, recordingHooks());

      expect(a.is_active).toBe(true);
      expect(b.is_active).toBe(true);
    });
  });

  describe('Error isolation', () => {
    test('should skip a tick on a malformed signal', () => {
      const agreement = track('youtube.com', 60);
      const hooks = recordingHooks();

      const result = tracker.checkCompliance({ observed_at: new Date('not a date') }, hooks);

      expect(result.skipped).toBe(true);
      expect(result.agreements_checked).toBe(0);
      expect(result.errors[0]).toBeInstanceOf(MalformedActivitySignalError);
      expect(agreement.is_active).toBe(true);
      expect(hooks.calls).toEqual([]);
    });

    test('should reject a non-string subject key', () => {
      track('youtube.com', 60);

      const result = tracker.checkCompliance(
        { subject_key: JSON.parse('42'), observed_at: at(95) },
        recordingHooks()
      );

      expect(result.skipped).toBe(true);
      expect(result.errors[0]?.message).toBe('Activity signal subject_key must be a string');
    });

    test('should keep evaluating after a callback throws', () => {
      const a = track('a.example.com', 60);
      const b = track('b.example.com', 60, 1);
      const hooks: ComplianceHooks = {
        onWarning: jest.fn(),
        onExpired: jest.fn(() => {
          throw new Error('boom');
        }),
        onViolation: jest.fn(),
      };

      const result = tracker.checkCompliance({ observed_at: at(70) }, hooks);

      expect(result.errors).toHaveLength(2);
      expect(result.errors.map((e) => e.code)).toEqual([
        ErrorCode.COMPLIANCE_CALLBACK_FAILED,
        ErrorCode.COMPLIANCE_CALLBACK_FAILED,
      ]);
      expect(result.errors[0]?.message).toBe('Compliance callback failed: boom');
      expect(a.is_active).toBe(false);
      expect(b.is_active).toBe(false);
    });
  });

  describe('Status and cleanup', () => {
    test('should report status through the lifecycle', () => {
      const agreement = track('youtube.com', 120);

      expect(tracker.getStatus(agreement.agreement_id, at(30))).toEqual({
        agreement_id: agreement.agreement_id,
        subject_key: 'youtube.com',
        event_type: 'distraction_site',
        state: ComplianceState.SAFE,
        seconds_remaining: 90,
        progress_percentage: 25,
        expires_at: at(120),
        violation_count: 0,
      });
      expect(tracker.getStatus(agreement.agreement_id, at(70))?.state).toBe(ComplianceState.WARNING);
      expect(tracker.getStatus(agreement.agreement_id, at(120))?.state).toBe(ComplianceState.EXPIRED);
      expect(tracker.getStatus('missing')).toBeNull();
    });

    test('should list expired agreements', () => {
      const short = track('youtube.com', 60);
      track('reddit.com', 600);

      expect(tracker.getExpired(at(61))).toEqual([short]);
    });

    test('should summarize and clean up the working set', () => {
      track('youtube.com', 60);
      track('reddit.com', 60, 1);
      track('news.example.com', 600, 2);

      tracker.checkCompliance({ subject_key: 'youtube.com', observed_at: at(95) }, recordingHooks());

      expect(tracker.getSummary(at(95))).toEqual({
        total: 3,
        active: 2,
        expired: 1,
        violated: 1,
        completed: 1,
        total_violations: 1,
      });
      expect(tracker.cleanupInactive()).toBe(1);
      expect(tracker.getActive()).toHaveLength(2);
    });
  });
});
