// test/unit/scrubbers.test.ts
import { describe, expect, it } from 'vitest';

import {
  combineScrubbers,
  createIsoDateScrubber,
  createLinesScrubber,
  createRegexScrubber,
  doNothing,
  scrubGuids,
  scrubLineEndings,
} from '../../approvals/components/scrubbers.ts';

describe('scrubbers', () => {
  it('doNothing returns its input', () => {
    expect(doNothing('a\r\nb')).toBe('a\r\nb');
  });

  it('combines left to right', () => {
    const scrub = combineScrubbers(
      (t) => `${t}a`,
      (t) => `${t}b`,
    );
    expect(scrub('x')).toBe('xab');
  });

  it('replaces every regex match, with or without the g flag', () => {
    expect(createRegexScrubber(/\d+/, '#')('a1 b22 c333')).toBe('a# b# c#');
    expect(createRegexScrubber('\\d+', '#')('a1 b22')).toBe('a# b#');
  });

  it('passes the occurrence index to a replacement function', () => {
    const scrub = createRegexScrubber(/[a-z]+\d/, (match, i) => `<${i}:${match.length}>`);
    expect(scrub('ab1 c2 def3')).toBe('<0:3> <1:2> <2:4>');
  });

  it('restarts occurrence numbering on every call', () => {
    const scrub = createRegexScrubber(/x/, (_match, i) => String(i));
    expect(scrub('xx')).toBe('01');
    expect(scrub('xx')).toBe('01');
  });

  it('numbers GUIDs by first appearance, ignoring case', () => {
    const text =
      'a 2fd78d4a-ad49-447d-96a8-deb4e6f4a8e3 b 2FD78D4A-AD49-447D-96A8-DEB4E6F4A8E3 ' +
      'c 11111111-2222-3333-4444-555555555555';
    const scrubbed = scrubGuids(text);

    expect(scrubbed).toBe('a guid_1 b guid_1 c guid_2');
    expect(scrubGuids(scrubbed)).toBe(scrubbed);
  });

  it('replaces ISO-8601 timestamps', () => {
    const scrub = createIsoDateScrubber();
    const scrubbed = scrub('at 2024-03-01T12:30:45.123Z and 2024-03-02T08:00:00+02:00');

    expect(scrubbed).toBe('at [date] and [date]');
    expect(scrub(scrubbed)).toBe(scrubbed);
    expect(createIsoDateScrubber('<when>')('2024-03-01T12:30')).toBe('<when>');
  });

  it('normalizes line endings', () => {
    expect(scrubLineEndings('a\r\nb\r\n')).toBe('a\nb\n');
    expect(scrubLineEndings('a\nb\n')).toBe('a\nb\n');
  });

  it('drops matching lines', () => {
    const scrub = createLinesScrubber((line) => line.startsWith('#'));
    const scrubbed = scrub('# c\nkeep\n# d\nalso');

    expect(scrubbed).toBe('keep\nalso');
    expect(scrub(scrubbed)).toBe(scrubbed);
  });
});
