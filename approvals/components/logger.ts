// approvals/components/logger.ts
import path from 'node:path';

import fs from 'fs-extra';

import type { Indent, Logger } from '../types/logger.ts';
import { ICON } from '../types/ui.ts';
import { DEFAULT_BOX_WIDTH, boxBody, makeRule, resolveIndent } from './format.ts';
import { ENV_LOG_DIR, LOGS_DIR, LOG_FILE_NAME } from './constants.ts';

/** Default box indent. */
const DEFAULT_BOX_IND = '      ';

/**
 * Return a shallow "view" of a logger that automatically prefixes all writes
 * (write/pass/warn/fail and step details) with the given indent.
 * Step headers remain left-justified; only step *details* are indented.
 */
export function withIndent(base: Logger, indent: Indent): Logger {
  const pad = resolveIndent(indent, '');

  return {
    filePath: base.filePath,
    step: (title, details, _ind) => base.step(title, details, _ind ?? pad),
    pass: (msg, _ind) => base.pass(msg, _ind ?? pad),
    warn: (msg, _ind) => base.warn(msg, _ind ?? pad),
    fail: (msg, _ind) => base.fail(msg, _ind ?? pad),
    write: (line, _ind) => base.write(line, _ind ?? pad),
    boxStart: (title, opts) =>
      base.boxStart(title, { width: opts?.width, indent: opts?.indent ?? pad }),
    boxLine: (line, opts) =>
      base.boxLine(line, { width: opts?.width, indent: opts?.indent ?? pad }),
    boxEnd: (label, opts) =>
      base.boxEnd(label, {
        width: opts?.width,
        indent: opts?.indent ?? pad,
        suffix: opts?.suffix,
      }),
  };
}

/**
 * Append-only file logger. Writes are synchronous so a verification's log
 * lines are on disk before it returns or throws.
 */
export function createLogger(filePath: string): Logger {
  let counter = 0;
  fs.ensureDirSync(path.dirname(filePath));

  const append = (line: string) => {
    fs.appendFileSync(filePath, line.endsWith('\n') ? line : line + '\n', 'utf8');
  };

  const step: Logger['step'] = (title, details = '', indent) => {
    counter += 1;
    append(`${counter}) ${title}`); // header stays left-justified
    if (details) append(`${resolveIndent(indent, '   ')}${details}`);
  };

  const pass: Logger['pass'] = (msg = 'PASS', indent) =>
    append(`${resolveIndent(indent, '   ')}${ICON.ok} ${msg}`);

  const warn: Logger['warn'] = (msg, indent) =>
    append(`${resolveIndent(indent, '   ')}${ICON.warn} ${msg}`);

  const fail: Logger['fail'] = (msg, indent) =>
    append(`${resolveIndent(indent, '   ')}${ICON.fail} ${msg}`);

  const write: Logger['write'] = (line, indent) =>
    append(`${resolveIndent(indent, '    ')}${line}`); // default 4 for plain writes

  const boxStart: Logger['boxStart'] = (title, opts) => {
    const ind = resolveIndent(opts?.indent, DEFAULT_BOX_IND);
    append(ind + makeRule('┌', title, opts?.width ?? DEFAULT_BOX_WIDTH));
  };

  const boxLine: Logger['boxLine'] = (line, opts) => {
    const ind = resolveIndent(opts?.indent, DEFAULT_BOX_IND);
    for (const row of boxBody(line, opts?.width ?? DEFAULT_BOX_WIDTH)) append(ind + row);
  };

  const boxEnd: Logger['boxEnd'] = (label, opts) => {
    const ind = resolveIndent(opts?.indent, DEFAULT_BOX_IND);
    const full = opts?.suffix ? `${label} ${opts.suffix}` : label;
    append(ind + makeRule('└', full, opts?.width ?? DEFAULT_BOX_WIDTH));
  };

  return { filePath, step, pass, warn, fail, write, boxStart, boxLine, boxEnd };
}

// Run stamp for log directories (e.g. 2025-09-30T09-45-12-345Z)
export function makeLogStamp(d = new Date()): string {
  return d.toISOString().replace(/[:.]/g, '-');
}

// logs/<stamp>
export function buildLogRoot(stamp: string): string {
  return path.join(LOGS_DIR, stamp);
}

const loggers = new Map<string, Logger>();

/**
 * The verification logger for this run: `<APPROVALS_LOG_DIR>/approvals.log`,
 * or undefined when logging is not enabled.
 */
export function approvalLoggerFromEnv(): Logger | undefined {
  const dir = process.env[ENV_LOG_DIR];
  if (!dir) return undefined;

  const p = path.resolve(dir, LOG_FILE_NAME);
  let log = loggers.get(p);
  if (!log) {
    log = createLogger(p);
    loggers.set(p, log);
  }
  return log;
}
