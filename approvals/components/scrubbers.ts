// approvals/components/scrubbers.ts

/**
 * Pure text normalization applied to received text before it is written and
 * compared. Every scrubber here is idempotent on its own output.
 */
export type Scrubber = (text: string) => string;

export type Replacement = string | ((match: string, index: number) => string);

const GUID_PATTERN = /[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}/g;
const ISO_DATE_PATTERN =
  /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?/g;

export const doNothing: Scrubber = (text) => text;

/** Apply scrubbers left to right. */
export function combineScrubbers(...scrubbers: Scrubber[]): Scrubber {
  return (text) => scrubbers.reduce((acc, scrub) => scrub(acc), text);
}

function globalPattern(pattern: RegExp | string): RegExp {
  if (typeof pattern === 'string') return new RegExp(pattern, 'g');
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  return new RegExp(pattern.source, flags);
}

/**
 * Replace every match. A function replacement gets the match and its
 * 0-based occurrence index.
 */
export function createRegexScrubber(pattern: RegExp | string, replacement: Replacement): Scrubber {
  return (text) => {
    const re = globalPattern(pattern);
    if (typeof replacement === 'string') return text.replace(re, replacement);
    let index = 0;
    return text.replace(re, (match) => replacement(match, index++));
  };
}

/** GUIDs → guid_1, guid_2, …; the same GUID keeps its number. */
export const scrubGuids: Scrubber = (text) => {
  const seen = new Map<string, number>();
  return text.replace(globalPattern(GUID_PATTERN), (match) => {
    const key = match.toLowerCase();
    let n = seen.get(key);
    if (n === undefined) {
      n = seen.size + 1;
      seen.set(key, n);
    }
    return `guid_${n}`;
  });
};

export function createIsoDateScrubber(replacement = '[date]'): Scrubber {
  return createRegexScrubber(ISO_DATE_PATTERN, replacement);
}

export const scrubLineEndings: Scrubber = (text) => text.replace(/\r\n/g, '\n');

/** Drop every line the predicate matches. */
export function createLinesScrubber(predicate: (line: string) => boolean): Scrubber {
  return (text) =>
    text
      .split('\n')
      .filter((line) => !predicate(line))
      .join('\n');
}
