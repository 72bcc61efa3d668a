// approvals/vitest-reporter.ts
import type { Reporter } from 'vitest/node';

import { readFailedComparisons, type FailedComparison } from './components/approval-log.ts';
import { approveCommand } from './components/ci.ts';
import { plural, renderBox } from './components/format.ts';
import { ICON } from './types/ui.ts';

/** Box listing each failed comparison with the command that approves it. */
export function renderFailedSummary(
  failed: readonly FailedComparison[],
  platform: NodeJS.Platform = process.platform,
): string[] {
  if (failed.length === 0) return [];
  const lines = failed.flatMap((c) => [
    `• ${c.approvedPath}`,
    `  ${approveCommand(c.receivedPath, c.approvedPath, platform)}`,
  ]);
  return renderBox(`${ICON.fail} Approvals`, lines, plural(failed.length, 'failed comparison'));
}

/**
 * Approvals Summary Reporter
 *
 * Runs next to Vitest's own reporter and, once the run is over, prints the
 * comparisons that failed during it (read from the failed-comparison log).
 */
export default class ApprovalsReporter implements Reporter {
  private readonly write: (line: string) => void;

  constructor(write: (line: string) => void = (line) => console.log(line)) {
    this.write = write;
  }

  onFinished(): void {
    const lines = renderFailedSummary(readFailedComparisons());
    if (lines.length === 0) return;
    this.write('');
    for (const line of lines) this.write(line);
  }
}
