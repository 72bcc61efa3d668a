// approvals/types/ui.ts
import type { Sev } from './severity.ts';

// Icons shared by the verification log, the console reporter and the run summary
export const ICON: Record<Sev, string> = {
  ok: '✅',
  warn: '⚠️',
  fail: '❌',
};
