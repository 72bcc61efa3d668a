// approvals/components/format.ts
// Shared, pure formatting helpers reused by logger.ts, the console reporter and the run summary
import type { Indent } from '../types/logger.ts';

/** Default box width (characters), including the left glyph and padding. */
export const DEFAULT_BOX_WIDTH = 78;

/** Truncate without ellipsis to keep scans clean. */
export function fitLabel(label: string, maxLen: number): string {
  return label.length <= maxLen ? label : label.slice(0, maxLen);
}

export function makeRule(openGlyph: '┌' | '└', label: string, width: number): string {
  const head = `${openGlyph}─ `;
  const usable = Math.max(0, width - head.length);
  const text = fitLabel(label, usable);
  const dashes = Math.max(0, usable - text.length);
  return head + text + '─'.repeat(dashes);
}

// Interpret indent with a fallback and modifiers:
// - undefined  → use fallback
// - number     → absolute spaces
// - string "+n"/"-n" → relative to fallback length
// - any other string → literal prefix (e.g. "│ ")
export function resolveIndent(ind: Indent | undefined, fallback: string): string {
  if (ind === undefined) return fallback;

  if (typeof ind === 'number') {
    return ' '.repeat(Math.max(0, ind));
  }

  const m = ind.match(/^([+-])(\d+)$/);
  if (m) {
    const sign = m[1] === '+' ? 1 : -1;
    const delta = parseInt(m[2], 10);
    const next = Math.max(0, fallback.length + sign * delta);
    return ' '.repeat(next);
  }

  return ind;
}

/**
 * Split a body line into "│ "-prefixed rows, hard-wrapping (no hyphenation)
 * at the content width. An empty line yields a bare "│".
 */
export function boxBody(line: string, width = DEFAULT_BOX_WIDTH): string[] {
  if (!line) return ['│'];

  const contentWidth = Math.max(1, width - 2);
  const rows: string[] = [];
  for (const l of line.replace(/\r\n/g, '\n').split('\n')) {
    if (l.length <= contentWidth) {
      rows.push(l ? `│ ${l}` : '│');
      continue;
    }
    for (let i = 0; i < l.length; i += contentWidth) {
      rows.push(`│ ${l.slice(i, i + contentWidth)}`);
    }
  }
  return rows;
}

/** Render a whole box: top rule, body rows, bottom rule. */
export function renderBox(
  title: string,
  lines: readonly string[],
  footer: string,
  width = DEFAULT_BOX_WIDTH,
): string[] {
  return [
    makeRule('┌', title, width),
    ...lines.flatMap((l) => boxBody(l, width)),
    makeRule('└', footer, width),
  ];
}

/** Sanitize a name into a safe file-name segment. */
export function sanitizeFileName(name: string): string {
  return name.replace(/[^\w.+-]/g, '_');
}

export function plural(count: number, noun: string): string {
  return `${count} ${count === 1 ? noun : `${noun}s`}`;
}
