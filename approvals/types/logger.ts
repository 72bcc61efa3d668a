// approvals/types/logger.ts

export type Indent = number | string;

export type Logger = {
  filePath: string;
  step: (title: string, details?: string, indent?: Indent) => void;
  pass: (msg?: string, indent?: Indent) => void;
  warn: (msg: string, indent?: Indent) => void;
  fail: (msg: string, indent?: Indent) => void;
  write: (line: string, indent?: Indent) => void;
  /** Draw the top rule with a label, e.g. "┌─ received ─────" */
  boxStart: (title: string, opts?: { width?: number; indent?: Indent }) => void;
  /** Write a body line with "│ " prefix. Handles multi-line input. Empty line => "│" */
  boxLine: (line: string, opts?: { width?: number; indent?: Indent }) => void;
  /** Draw the bottom rule with a label, e.g. "└─ 3 lines ───────" */
  boxEnd: (label: string, opts?: { width?: number; indent?: Indent; suffix?: string }) => void;
};
