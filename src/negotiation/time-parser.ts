/**
 * Reply Time Parser
 *
 * Extracts a duration from one line of free-text user input.
 * "No duration" is an ordinary result, never an exception.
 */

interface TimePattern {
  pattern: RegExp;
  /** Seconds for the match, from the captured amount when there is one */
  toSeconds: (match: RegExpExecArray) => number;
}

function amount(match: RegExpExecArray): number {
  return parseFloat(match[1] ?? '');
}

const NUMBER = '(-?\\d+(?:\\.\\d+)?)';

/**
 * Listed most specific first; on a tie in position the earlier entry wins
 * (so "10 minutes" is read as minutes, not as a bare number).
 */
const TIME_PATTERNS: TimePattern[] = [
  {
    pattern: new RegExp(`${NUMBER}\\s*(?:more\\s+)?(?:hours?|hrs?|h)\\b`),
    toSeconds: (m) => amount(m) * 3600,
  },
  {
    pattern: new RegExp(`${NUMBER}\\s*(?:more\\s+)?(?:minutes?|mins?|m)\\b`),
    toSeconds: (m) => amount(m) * 60,
  },
  {
    pattern: new RegExp(`${NUMBER}\\s*(?:more\\s+)?(?:seconds?|secs?|s)\\b`),
    toSeconds: (m) => amount(m),
  },
  { pattern: /\bhalf\s+(?:an?\s+)?hour\b/, toSeconds: () => 1800 },
  { pattern: /\bquarter\s+(?:of\s+an\s+)?hour\b/, toSeconds: () => 900 },
  { pattern: /\b(?:an?|one)\s+hour\b/, toSeconds: () => 3600 },
  {
    pattern: /\b(?:a\s+)?couple(?:\s+of)?\s+(?:more\s+)?(?:minutes?|mins?)\b/,
    toSeconds: () => 120,
  },
  {
    pattern: /\b(?:a\s+)?few\s+(?:more\s+)?(?:minutes?|mins?)\b/,
    toSeconds: () => 180,
  },
  {
    pattern: /\ba\s+(?:bit|little)\b|\b(?:bit|little)\s+(?:longer|more)\b/,
    toSeconds: () => 120,
  },
  { pattern: /\bquick(?:ly)?\b/, toSeconds: () => 60 },
  // Bare number, read as minutes
  {
    pattern: new RegExp(`(?<![\\w.])${NUMBER}(?!\\w|\\.\\d)`),
    toSeconds: (m) => amount(m) * 60,
  },
];

const STOP_PATTERN =
  /\b(?:stop(?:ping)?|quit(?:ting)?|i'?m\s+done|i\s+am\s+done|close\s+it|log(?:ging)?\s+off)\b/;

/**
 * First time mention in a reply
 */
export interface TimeMention {
  /** Position of the mention in the reply */
  index: number;
  /** Matched text */
  phrase: string;
  /** Duration in seconds; may be zero or negative */
  seconds: number;
}

/**
 * Finds the earliest time mention in the text, case-insensitive
 */
export function findFirstTimeMention(text: string): TimeMention | null {
  const normalized = text.toLowerCase();
  let first: TimeMention | null = null;

  for (const { pattern, toSeconds } of TIME_PATTERNS) {
    const match = pattern.exec(normalized);
    if (!match) {
      continue;
    }

    if (first === null || match.index < first.index) {
      first = {
        index: match.index,
        phrase: match[0],
        seconds: toSeconds(match),
      };
    }
  }

  return first;
}

/**
 * Parses a duration in seconds from a reply.
 *
 * Returns null for non-numeric text, rejection phrases, and zero or
 * negative amounts.
 */
export function parseDurationSeconds(text: string): number | null {
  const mention = findFirstTimeMention(text);
  if (mention === null || !Number.isFinite(mention.seconds) || mention.seconds <= 0) {
    return null;
  }
  return mention.seconds;
}

/**
 * Whether a reply means "I'll stop now": an explicit zero or negative
 * amount, or a stop phrase with no usable duration.
 */
export function isDeclineReply(text: string): boolean {
  const mention = findFirstTimeMention(text);
  if (mention !== null) {
    return mention.seconds <= 0;
  }
  return STOP_PATTERN.test(text.toLowerCase());
}

/**
 * Human wording for a number of seconds ("10 minutes", "1 hour", "90 seconds")
 */
export function formatDuration(seconds: number): string {
  const rounded = Math.round(seconds);
  if (rounded >= 3600 && rounded % 3600 === 0) {
    const hours = rounded / 3600;
    return `${hours} hour${hours === 1 ? '' : 's'}`;
  }
  if (rounded >= 60 && rounded % 60 === 0) {
    const minutes = rounded / 60;
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  return `${rounded} second${rounded === 1 ? '' : 's'}`;
}
