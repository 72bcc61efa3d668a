// approvals/types/severity.ts

/** Outcome of one logged line: a verification passed, needs attention, or failed. */
export type Sev = 'ok' | 'warn' | 'fail';
