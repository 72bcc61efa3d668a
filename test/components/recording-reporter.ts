// test/components/recording-reporter.ts
import type { Reporter } from '../../approvals/components/reporters.ts';
import { ApprovalMismatchError } from '../../approvals/components/errors.ts';

export type ReporterCall = { receivedPath: string; approvedPath: string };

export type RecordingReporter = Reporter & { calls: ReporterCall[] };

/** A reporter that remembers its calls and answers `handled`. */
export function createRecordingReporter(
  name = 'recording',
  handled = true,
  onReport?: (name: string) => void,
): RecordingReporter {
  const calls: ReporterCall[] = [];
  return {
    name,
    calls,
    report(receivedPath, approvedPath) {
      calls.push({ receivedPath, approvedPath });
      onReport?.(name);
      return handled;
    },
  };
}

/** Run `fn`, which must fail with an approval mismatch, and return that error. */
export function catchMismatch(fn: () => unknown): ApprovalMismatchError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ApprovalMismatchError) return err;
    throw err;
  }
  throw new Error('expected an approval mismatch, but verification passed');
}
