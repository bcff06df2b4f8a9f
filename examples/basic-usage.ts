/**
 * Basic Usage Examples for Focus Agreements
 */

import * as os from 'os';
import * as path from 'path';
import {
  ActivitySignal,
  EventSeverity,
  FileStorageAdapter,
  FocusAgreementSystem,
  NotificationUrgency,
} from '../src';

// Stand-in for a browser/window watcher
let currentActivity: ActivitySignal | null = null;

const system = new FocusAgreementSystem({
  activitySource: { getCurrentActivity: () => currentActivity },
  gracePeriodSeconds: 30,
  negotiation: {
    ceilings: { endless_scrolling: 600 },
  },
});

const registry = system.getCapabilityRegistry();

registry.register('notify', 'console', {
  notify: async (message: string, urgency: NotificationUrgency) => {
    console.log(`[notify:${urgency}] ${message}`);
  },
});

registry.register('close_resource', 'console', {
  close: async (subjectKey: string) => {
    console.log(`[close] ${subjectKey}`);
    return true;
  },
});

/**
 * Example 1: Negotiate over a distraction site
 */
async function example1_negotiation(): Promise<string | null> {
  console.log('\n=== Example 1: Negotiation ===');

  const opening = await system.handleEvent({
    event_type: 'distraction_site',
    severity: EventSeverity.MEDIUM,
    subject_key: 'youtube.com',
    duration_seconds: 1500,
    detected_at: new Date(),
    metadata: { category: 'Entertainment' },
  });

  if (opening.kind !== 'prompt') {
    return null;
  }

  // Over the 15 minute ceiling: the monitor counters with 10 minutes
  const counter = await system.respond(opening.session_id, '20 minutes');
  console.log('Counter-offer:', counter.kind === 'prompt' ? counter.counter_offer_seconds : null);

  const agreed = await system.respond(opening.session_id, 'fine, 10 minutes');
  if (agreed.kind !== 'agreed') {
    return null;
  }

  console.log('Agreement:', agreed.agreement.agreement_id);
  console.log('Expires at:', agreed.agreement.expires_at.toISOString());
  return agreed.agreement.agreement_id;
}

/**
 * Example 2: Blocking high-severity behavior
 */
async function example2_block() {
  console.log('\n=== Example 2: Immediate Block ===');

  const step = await system.handleEvent({
    event_type: 'adult_content',
    severity: EventSeverity.HIGH,
    subject_key: 'example.test',
    duration_seconds: 5,
    detected_at: new Date(),
    metadata: {},
  });

  if (step.kind === 'blocked') {
    console.log('Blocked, still active?', step.agreement.is_active); // false
  }
}

/**
 * Example 3: Checking compliance by hand
 */
async function example3_compliance(agreementId: string) {
  console.log('\n=== Example 3: Compliance Tick ===');

  currentActivity = { subject_key: 'https://youtube.com/watch', observed_at: new Date() };
  const result = await system.tick();

  console.log('Transitions:', result?.compliance.transitions.length ?? 0);
  console.log('Status:', system.getStatus(agreementId));
}

/**
 * Example 4: Extending an agreement on the user's say-so
 */
async function example4_extension(agreementId: string) {
  console.log('\n=== Example 4: Extension ===');

  const extended = await system.extendAgreement(agreementId, 300, {
    approved_by: 'user',
    user_text: 'five more minutes, I am almost done',
  });

  console.log('New duration (s):', extended.agreed_duration_seconds);
}

/**
 * Example 5: Persisting agreements to a file
 */
async function example5_persistence() {
  console.log('\n=== Example 5: File Persistence ===');

  const storage = new FileStorageAdapter({
    filePath: path.join(os.tmpdir(), 'focus-agreements', 'agreements.json'),
    prettyPrint: true,
  });
  await storage.initialize();

  registry.register('persist_agreement', 'file', storage);
  registry.register('load_recent_agreements', 'file', storage);

  console.log('Restored:', await system.restoreRecent());
  console.log('Stored agreements:', await storage.count());
}

/**
 * Example 6: Audit trail
 */
function example6_audit(agreementId: string) {
  console.log('\n=== Example 6: Audit Trail ===');

  for (const event of system.getAgreementHistory(agreementId)) {
    console.log(`${event.timestamp.toISOString()} ${event.event_type} by ${event.actor}`);
  }
}

async function main() {
  await example5_persistence();

  const agreementId = await example1_negotiation();
  await example2_block();

  if (agreementId) {
    await example3_compliance(agreementId);
    await example4_extension(agreementId);
    example6_audit(agreementId);
  }

  console.log('\nSummary:', system.getSummary());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
