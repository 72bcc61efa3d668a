// approvals/components/writers.ts
import * as path from 'node:path';

import fs from 'fs-extra';

import { DEFAULT_EXTENSION } from './constants.ts';
import { normalizeExtension } from './namers.ts';

export type Payload = string | Uint8Array;

/** Produces the received payload of one verification, plus its file extension. */
export interface ApprovalWriter {
  readonly kind: 'approval-writer';
  readonly fileExtension: string;
  payload(): Payload;
  /** Set when the payload is a file that already exists on disk. */
  readonly existingFile?: string;
}

export function isApprovalWriter(value: unknown): value is ApprovalWriter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'approval-writer'
  );
}

export function createStringWriter(text: string, extension = DEFAULT_EXTENSION): ApprovalWriter {
  return {
    kind: 'approval-writer',
    fileExtension: normalizeExtension(extension),
    payload: () => text,
  };
}

export function createBinaryWriter(bytes: Uint8Array, extension: string): ApprovalWriter {
  return {
    kind: 'approval-writer',
    fileExtension: normalizeExtension(extension),
    payload: () => bytes,
  };
}

/**
 * Wrap a file that already exists. The payload is read when the approver asks
 * for it: as text when `encoding` is given (so it can be scrubbed), else as bytes.
 */
export function createExistingFileWriter(
  filePath: string,
  opts: { encoding?: BufferEncoding } = {},
): ApprovalWriter {
  const existingFile = path.resolve(filePath);
  return {
    kind: 'approval-writer',
    fileExtension: path.extname(existingFile),
    existingFile,
    payload: () =>
      opts.encoding ? fs.readFileSync(existingFile, opts.encoding) : fs.readFileSync(existingFile),
  };
}

export function toBytes(payload: Payload): Buffer {
  return typeof payload === 'string'
    ? Buffer.from(payload, 'utf8')
    : Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
}

/**
 * Write a payload through an explicitly opened descriptor that is closed on
 * every exit path; any stale content is truncated.
 */
export function writePayload(filePath: string, payload: Payload): void {
  fs.ensureDirSync(path.dirname(filePath));
  const bytes = toBytes(payload);
  const fd = fs.openSync(filePath, 'w');
  try {
    let offset = 0;
    while (offset < bytes.length) {
      offset += fs.writeSync(fd, bytes, offset, bytes.length - offset);
    }
  } finally {
    fs.closeSync(fd);
  }
}
