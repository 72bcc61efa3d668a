// approvals/components/errors.ts

export type MismatchKind = 'mismatch' | 'missing';

export type MismatchDetails = {
  kind: MismatchKind;
  receivedPath: string;
  approvedPath: string;
  reporterName: string;
  reporterHandled: boolean;
};

const HEADLINE: Record<MismatchKind, string> = {
  missing: 'Failed Approval: Approval File Not Found',
  mismatch: 'Failed Approval: Received does not match approved',
};

export function formatMismatchMessage(d: MismatchDetails): string {
  return [
    HEADLINE[d.kind],
    `  received: ${d.receivedPath}`,
    `  approved: ${d.approvedPath}`,
    `  reporter: ${d.reporterName} (${d.reporterHandled ? 'handled' : 'not handled'})`,
  ].join('\n');
}

/** The test-failure signal: received output differs from (or has no) approved baseline. */
export class ApprovalMismatchError extends Error {
  readonly kind: MismatchKind;
  readonly receivedPath: string;
  readonly approvedPath: string;
  readonly reporterName: string;
  readonly reporterHandled: boolean;

  constructor(details: MismatchDetails) {
    super(formatMismatchMessage(details));
    this.name = 'ApprovalMismatchError';
    this.kind = details.kind;
    this.receivedPath = details.receivedPath;
    this.approvedPath = details.approvedPath;
    this.reporterName = details.reporterName;
    this.reporterHandled = details.reporterHandled;
  }
}

/** A configuration override was released out of stack order, or twice. */
export class DisposerOrderError extends Error {
  readonly axis: string;
  readonly reason: string;

  constructor(axis: string, reason: string, options?: ErrorOptions) {
    super(`Disposer for "${axis}" ${reason}`, options);
    this.name = 'DisposerOrderError';
    this.axis = axis;
    this.reason = reason;
  }
}

/** A test finished while configuration overrides it pushed were still active. */
export class DisposerLeakError extends Error {
  readonly axes: readonly string[];

  constructor(axes: readonly string[]) {
    super(
      `Test leaked ${axes.length} configuration override(s): ${axes.join(', ')}. ` +
        'Release every disposer before the test ends.',
    );
    this.name = 'DisposerLeakError';
    this.axes = axes;
  }
}

export class TestIdentityError extends Error {
  constructor() {
    super(
      'Cannot name approval files: no running Vitest test found. ' +
        'Call verify() inside a test, or pass Options.withTestIdentity(...).',
    );
    this.name = 'TestIdentityError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
