// test/unit/vitest-reporter.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { recordFailedComparison } from '../../approvals/components/approval-log.ts';
import { makeRule } from '../../approvals/components/format.ts';
import { ICON } from '../../approvals/types/ui.ts';
import ApprovalsReporter, { renderFailedSummary } from '../../approvals/vitest-reporter.ts';
import { createSandbox, type Sandbox } from '../components/sandbox.ts';

let sb: Sandbox;

beforeEach(() => {
  sb = createSandbox();
  vi.stubEnv('APPROVALS_TEMP_DIR', sb.path('.tmp'));
});

afterEach(() => {
  vi.unstubAllEnvs();
  sb.cleanup();
});

describe('renderFailedSummary', () => {
  it('is empty when nothing failed', () => {
    expect(renderFailedSummary([])).toEqual([]);
  });

  it('lists each failure with its approve command', () => {
    const lines = renderFailedSummary(
      [
        { receivedPath: 'a.received.txt', approvedPath: 'a.approved.txt' },
        { receivedPath: 'b.received.txt', approvedPath: 'b.approved.txt' },
      ],
      'linux',
    );

    expect(lines).toEqual([
      makeRule('┌', `${ICON.fail} Approvals`, 78),
      '│ • a.approved.txt',
      '│   mv -f "a.received.txt" "a.approved.txt"',
      '│ • b.approved.txt',
      '│   mv -f "b.received.txt" "b.approved.txt"',
      makeRule('└', '2 failed comparisons', 78),
    ]);
  });
});

describe('ApprovalsReporter', () => {
  it('prints nothing after a clean run', () => {
    const out: string[] = [];
    new ApprovalsReporter((l) => out.push(l)).onFinished();

    expect(out).toEqual([]);
  });

  it('prints the failed comparisons of the run', () => {
    recordFailedComparison('c.received.txt', 'c.approved.txt');
    const out: string[] = [];
    new ApprovalsReporter((l) => out.push(l)).onFinished();

    expect(out[0]).toBe('');
    expect(out[2]).toBe('│ • c.approved.txt');
    expect(out[out.length - 1]).toBe(makeRule('└', '1 failed comparison', 78));
  });
});
