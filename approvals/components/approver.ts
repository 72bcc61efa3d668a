// approvals/components/approver.ts
import * as path from 'node:path';

import fs from 'fs-extra';

import type { Logger } from '../types/logger.ts';
import { recordApprovedFile, recordFailedComparison } from './approval-log.ts';
import { getFrontLoadedReporters } from './defaults.ts';
import { ApprovalMismatchError, type MismatchKind } from './errors.ts';
import { plural } from './format.ts';
import { withIndent } from './logger.ts';
import { approvalBaseName, type ApprovalNamer } from './namers.ts';
import type { Reporter } from './reporters.ts';
import type { Scrubber } from './scrubbers.ts';
import type { TestIdentity } from './test-identity.ts';
import { toBytes, writePayload, type ApprovalWriter, type Payload } from './writers.ts';

export type ApprovalRequest = {
  namer: ApprovalNamer;
  writer: ApprovalWriter;
  reporter: Reporter;
  identity: TestIdentity;
  scrubber?: Scrubber;
  /** Defaults to the currently registered front-loaded reporters. */
  frontLoaded?: readonly Reporter[];
  log?: Logger;
};

export type ApprovalPaths = {
  approvedPath: string;
  receivedPath: string;
};

type Comparison = 'match' | MismatchKind;

/** Text payloads are scrubbed; binary payloads pass through untouched. */
export function scrubPayload(payload: Payload, scrubber?: Scrubber): Payload {
  if (typeof payload !== 'string' || !scrubber) return payload;
  return scrubber(payload);
}

function compareWithApproved(received: Buffer, approvedPath: string): Comparison {
  if (!fs.pathExistsSync(approvedPath)) return 'missing';
  return received.equals(fs.readFileSync(approvedPath)) ? 'match' : 'mismatch';
}

function logReceivedText(log: Logger, text: string): void {
  const body = text.replace(/\n$/, '');
  log.boxStart('received');
  log.boxLine(body);
  log.boxEnd(plural(body ? body.split('\n').length : 0, 'line'));
}

/**
 * Write the received file, compare it byte for byte with the approved file,
 * and either clean up (match) or run reporters and throw (mismatch/missing).
 */
export function verifyWithApprover(request: ApprovalRequest): ApprovalPaths {
  const { namer, writer, reporter, identity, scrubber, log } = request;
  const extension = writer.fileExtension;
  const approvedPath = namer.approvedPath(identity, extension);
  const receivedPath = namer.receivedPath(identity, extension);

  log?.step(`verify ${approvalBaseName(identity)}`);
  log?.write(`approved=${approvedPath}`);
  log?.write(`received=${receivedPath}`);

  const payload = scrubPayload(writer.payload(), scrubber);
  const received = toBytes(payload);

  // An existing file that is not rewritten is its own received file: never write or delete it.
  const inPlace =
    writer.existingFile !== undefined &&
    path.resolve(writer.existingFile) === path.resolve(receivedPath);
  if (!inPlace) writePayload(receivedPath, received);

  const outcome = compareWithApproved(received, approvedPath);
  if (outcome === 'match') {
    if (!inPlace) fs.removeSync(receivedPath);
    recordApprovedFile(approvedPath);
    log?.pass('approved');
    return { approvedPath, receivedPath };
  }

  recordFailedComparison(receivedPath, approvedPath);
  log?.fail(outcome === 'missing' ? 'approved file not found' : 'received differs from approved');
  if (log && typeof payload === 'string') logReceivedText(log, payload);

  const frontLoaded = request.frontLoaded ?? getFrontLoadedReporters();
  for (const r of frontLoaded) r.report(receivedPath, approvedPath);
  const handled = reporter.report(receivedPath, approvedPath);
  if (log) withIndent(log, 6).write(`reporter ${reporter.name}: ${handled ? 'handled' : 'not handled'}`);

  throw new ApprovalMismatchError({
    kind: outcome,
    receivedPath,
    approvedPath,
    reporterName: reporter.name,
    reporterHandled: handled,
  });
}
