// approvals/components/approval-log.ts
import * as path from 'node:path';

import fs from 'fs-extra';
import fg from 'fast-glob';

import type { Logger } from '../types/logger.ts';
import {
  APPROVED_INFIX,
  APPROVED_LOG_FILE,
  ENV_TEMP_DIR,
  FAILED_LOG_FILE,
  FAILED_LOG_SEPARATOR,
  TEMP_DIR_NAME,
} from './constants.ts';
import { isReceivedFile } from './namers.ts';

export type FailedComparison = {
  receivedPath: string;
  approvedPath: string;
};

/** `$APPROVALS_TEMP_DIR`, or `<cwd>/.approval_tests_temp`. */
export function tempDir(): string {
  const fromEnv = process.env[ENV_TEMP_DIR];
  return path.resolve(fromEnv || TEMP_DIR_NAME);
}

export function approvedLogPath(): string {
  return path.join(tempDir(), APPROVED_LOG_FILE);
}

export function failedLogPath(): string {
  return path.join(tempDir(), FAILED_LOG_FILE);
}

function appendLine(p: string, line: string): void {
  fs.ensureDirSync(path.dirname(p));
  fs.appendFileSync(p, line + '\n', 'utf8');
}

function readLines(p: string): string[] {
  if (!fs.pathExistsSync(p)) return [];
  return fs
    .readFileSync(p, 'utf8')
    .split('\n')
    .filter((l) => l.trim() !== '');
}

export function recordApprovedFile(approvedPath: string): void {
  appendLine(approvedLogPath(), approvedPath);
}

export function recordFailedComparison(receivedPath: string, approvedPath: string): void {
  appendLine(failedLogPath(), `${receivedPath}${FAILED_LOG_SEPARATOR}${approvedPath}`);
}

export function readApprovedFiles(): string[] {
  return Array.from(new Set(readLines(approvedLogPath())));
}

/** Failed comparisons of this run, one per received file (latest wins), in first-seen order. */
export function readFailedComparisons(): FailedComparison[] {
  const byReceived = new Map<string, FailedComparison>();
  for (const line of readLines(failedLogPath())) {
    const at = line.indexOf(FAILED_LOG_SEPARATOR);
    if (at < 0) continue;
    const receivedPath = line.slice(0, at);
    const approvedPath = line.slice(at + FAILED_LOG_SEPARATOR.length);
    byReceived.set(receivedPath, { receivedPath, approvedPath });
  }
  return Array.from(byReceived.values());
}

/** Forget the previous run. */
export function resetRunLogs(): void {
  fs.removeSync(approvedLogPath());
  fs.removeSync(failedLogPath());
}

/**
 * Move every received file of the failed log over its approved file, then
 * clear the failed log. A file verified in place is copied instead and stays
 * where it is. Entries whose received file is gone are skipped.
 */
export function approveFailedComparisons(log?: Logger): FailedComparison[] {
  const approved: FailedComparison[] = [];
  log?.step('Approve failed comparisons');

  for (const c of readFailedComparisons()) {
    if (!fs.pathExistsSync(c.receivedPath)) {
      log?.warn(`received file gone: ${c.receivedPath}`);
      continue;
    }
    const move = isReceivedFile(c.receivedPath);
    if (move) fs.moveSync(c.receivedPath, c.approvedPath, { overwrite: true });
    else fs.copySync(c.receivedPath, c.approvedPath, { overwrite: true });
    log?.write(
      `${path.basename(c.receivedPath)} → ${path.basename(c.approvedPath)}${move ? '' : ' (copied)'}`,
    );
    approved.push(c);
  }

  fs.removeSync(failedLogPath());
  log?.pass(`${approved.length} approved`);
  return approved;
}

/**
 * Approved files under `root` that no verification of this run used
 * (candidates for deletion after tests were renamed or removed).
 */
export async function findUnverifiedApprovedFiles(root: string): Promise<string[]> {
  const found = await fg(`**/*${APPROVED_INFIX}.*`, {
    cwd: root,
    absolute: true,
    dot: true,
    ignore: ['**/node_modules/**'],
  });
  const verified = new Set(readApprovedFiles().map((p) => path.resolve(p)));
  return found
    .map((p) => path.resolve(p))
    .filter((p) => !verified.has(p))
    .sort();
}
