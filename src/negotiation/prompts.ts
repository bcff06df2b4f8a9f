/**
 * Negotiation Prompts
 *
 * Deterministic monitor lines. Opening prompts are keyed by event type
 * and how long the behavior has been going on.
 */

import { BehavioralEvent, KnownEventType } from '../types';
import { formatDuration } from './time-parser';

type OpeningTemplate = (subject: string | undefined, minutes: number, event: BehavioralEvent) => string;

const OPENING_TEMPLATES: Record<KnownEventType, OpeningTemplate> = {
  [KnownEventType.ENDLESS_SCROLLING]: (subject, minutes) =>
    `I noticed you've been scrolling ${subject ?? 'this feed'} for ${minutes} minutes.\n\n` +
    'How much longer do you need?',

  [KnownEventType.DISTRACTION_SITE]: (subject, minutes, event) => {
    const category = event.metadata['category'];
    const label = typeof category === 'string' && category !== '' ? category : 'a distraction site';
    return (
      `You've been on ${label}: ${subject ?? 'this site'} for ${minutes} minutes.\n\n` +
      'Is this for work or leisure? How long do you need?'
    );
  },

  [KnownEventType.ADULT_CONTENT]: (subject) =>
    `${subject ?? 'This content'} is outside what we agreed on.\n\n` +
    'How long do you need to wrap up?',
};

const KNOWN_EVENT_TYPES: readonly string[] = Object.values(KnownEventType);

function isKnownEventType(eventType: string): eventType is KnownEventType {
  return KNOWN_EVENT_TYPES.includes(eventType);
}

/**
 * Opening line for a negotiation
 */
export function openingPrompt(event: BehavioralEvent): string {
  const minutes = Math.floor(event.duration_seconds / 60);

  if (isKnownEventType(event.event_type)) {
    return OPENING_TEMPLATES[event.event_type](event.subject_key, minutes, event);
  }

  return (
    `You've been on ${event.subject_key ?? 'this'} for ${minutes} minutes.\n\n` +
    'How much longer do you need?'
  );
}

export const REPROMPT_MESSAGE =
  "Please tell me how many minutes you need. For example: '10 minutes' or '15 min'.";

export const DECLINED_MESSAGE = "Good call. I'll leave you to it.";

export const BLOCKED_MESSAGE = 'This has to stop right now.';

export function counterOfferMessage(requestedSeconds: number, counterSeconds: number): string {
  return `${formatDuration(requestedSeconds)} is a lot.\n\nHow about ${formatDuration(counterSeconds)} instead?`;
}

export function acceptedMessage(seconds: number): string {
  return `Okay, ${formatDuration(seconds)}. I'll check back then.`;
}

export function finalOfferMessage(seconds: number): string {
  return `We've gone back and forth enough. ${formatDuration(seconds)}, final offer.`;
}

export function imposedMessage(seconds: number): string {
  return `Since we can't agree, I'm setting a limit of ${formatDuration(seconds)}.`;
}
