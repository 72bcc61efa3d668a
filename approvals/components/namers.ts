// approvals/components/namers.ts
import * as path from 'node:path';

import type { TestIdentity } from './test-identity.ts';
import { sanitizeFileName } from './format.ts';
import {
  APPROVED_INFIX,
  RECEIVED_INFIX,
  SCRUBBED_INFIX,
  TEST_NAME_SEPARATOR,
} from './constants.ts';

export interface ApprovalNamer {
  approvedPath(identity: TestIdentity, extension: string): string;
  receivedPath(identity: TestIdentity, extension: string): string;
}

/** ".txt" and "txt" both mean ".txt"; "" means no extension. */
export function normalizeExtension(extension: string): string {
  if (!extension) return '';
  return extension.startsWith('.') ? extension : `.${extension}`;
}

/**
 * `<source stem>.<describe>.<test>[.<discriminator>]`
 * e.g. "/repo/test/math.test.ts", "math > adds" → "math.test.math.adds"
 */
export function approvalBaseName(identity: TestIdentity): string {
  const file = path.basename(identity.sourceFile);
  const stem = file.slice(0, file.length - path.extname(file).length);
  const parts = [stem, ...identity.testName.split(TEST_NAME_SEPARATOR).map(sanitizeFileName)];
  if (identity.discriminator) parts.push(sanitizeFileName(identity.discriminator));
  return parts.join('.');
}

export type DefaultNamerOptions = {
  /** Read on every call, so a changed subdirectory policy applies immediately. */
  subdirectory?: () => string;
};

/** Approved/received files beside the test file, or in a subdirectory of its folder. */
export function createDefaultNamer(opts: DefaultNamerOptions = {}): ApprovalNamer {
  const directoryFor = (identity: TestIdentity) => {
    const base = path.dirname(identity.sourceFile);
    const sub = opts.subdirectory?.() ?? '';
    return sub ? path.join(base, sub) : base;
  };

  const fileFor = (identity: TestIdentity, infix: string, extension: string) =>
    path.join(
      directoryFor(identity),
      `${approvalBaseName(identity)}${infix}${normalizeExtension(extension)}`,
    );

  return {
    approvedPath: (identity, extension) => fileFor(identity, APPROVED_INFIX, extension),
    receivedPath: (identity, extension) => fileFor(identity, RECEIVED_INFIX, extension),
  };
}

export function createSubdirectoryNamer(subdirectory: string): ApprovalNamer {
  return createDefaultNamer({ subdirectory: () => subdirectory });
}

/**
 * True for files this library writes as the received side. Anything else is
 * a user's file verified in place, which must be copied, never moved.
 */
export function isReceivedFile(filePath: string): boolean {
  const name = path.basename(filePath);
  return name.includes(`${RECEIVED_INFIX}.`) || name.endsWith(RECEIVED_INFIX);
}

/** `<dir>/<stem>.scrubbed.received<ext>` next to an existing file. */
export function scrubbedCopyPath(filePath: string): string {
  const ext = path.extname(filePath);
  const stem = path.basename(filePath, ext);
  return path.join(path.dirname(filePath), `${stem}${SCRUBBED_INFIX}${RECEIVED_INFIX}${ext}`);
}

export type ExistingFileNamerOptions = {
  /** Namer for the approved side. */
  base: ApprovalNamer;
  /** When the file is scrubbed, the received side is a scrubbed copy, not the file itself. */
  scrubbed: boolean;
};

/** The user's file is the received side; the approved side is named as usual. */
export function createExistingFileNamer(
  filePath: string,
  opts: ExistingFileNamerOptions,
): ApprovalNamer {
  const received = path.resolve(opts.scrubbed ? scrubbedCopyPath(filePath) : filePath);
  return {
    approvedPath: (identity, extension) => opts.base.approvedPath(identity, extension),
    receivedPath: () => received,
  };
}
