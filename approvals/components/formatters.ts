// approvals/components/formatters.ts
// Pure text builders behind the collection, combination and exception entry points
import { NO_EXCEPTION_SENTINEL } from './constants.ts';
import { defaultToString, type ToString } from './to-string.ts';

/**
 * `<header>\n\n\n[0] = <item0>\n[1] = <item1>\n…`
 * The header block is left out when the header is empty. `items` is iterated once.
 */
export function formatAll<T>(
  header: string,
  items: Iterable<T>,
  converter: ToString<T> = defaultToString,
): string {
  let out = header ? `${header}\n\n\n` : '';
  let index = 0;
  for (const item of items) {
    out += `[${index}] = ${converter(item)}\n`;
    index += 1;
  }
  return out;
}

export type CapturedMessage = { kind: 'thrown'; message: string } | { kind: 'none' };

/** Run `fn` and report whether it threw, and with which message. */
export function captureMessage(fn: () => unknown): CapturedMessage {
  try {
    fn();
  } catch (err) {
    return { kind: 'thrown', message: err instanceof Error ? err.message : String(err) };
  }
  return { kind: 'none' };
}

export function messageText(captured: CapturedMessage): string {
  return captured.kind === 'thrown' ? captured.message : NO_EXCEPTION_SENTINEL;
}

function describeResult(fn: () => unknown, toText: ToString): string {
  try {
    return toText(fn());
  } catch (err) {
    return err instanceof Error ? `${err.name}: ${err.message}` : `thrown: ${String(err)}`;
  }
}

/**
 * One line per combination of inputs, first input varying slowest:
 * `(<a>, <b>) => <result>`. A throwing call renders as `<Name>: <message>`.
 * No lines at all when any input is empty.
 */
export function formatCombinations(
  fn: (...args: unknown[]) => unknown,
  inputs: readonly Iterable<unknown>[],
  toText: ToString = defaultToString,
): string {
  const lists = inputs.map((i) => Array.from(i));
  if (lists.length === 0 || lists.some((l) => l.length === 0)) return '';

  const odometer = lists.map(() => 0);
  let out = '';
  for (;;) {
    const args = lists.map((l, i) => l[odometer[i]]);
    out += `(${args.map(toText).join(', ')}) => ${describeResult(() => fn(...args), toText)}\n`;

    let digit = lists.length - 1;
    while (digit >= 0) {
      odometer[digit] += 1;
      if (odometer[digit] < lists[digit].length) break;
      odometer[digit] = 0;
      digit -= 1;
    }
    if (digit < 0) return out;
  }
}
