// approvals/approvals.ts
import { verifyWithApprover, type ApprovalPaths } from './components/approver.ts';
import type { Disposer } from './components/config-stack.ts';
import { DEFAULT_SUBDIRECTORY, JSON_EXTENSION } from './components/constants.ts';
import {
  pushDefaultNamer,
  pushDefaultReporter,
  pushFrontLoadedReporter,
  pushSubdirectory,
} from './components/defaults.ts';
import {
  captureMessage,
  formatAll,
  formatCombinations,
  messageText,
} from './components/formatters.ts';
import { approvalLoggerFromEnv } from './components/logger.ts';
import { createExistingFileNamer, type ApprovalNamer } from './components/namers.ts';
import { Options } from './components/options.ts';
import type { Reporter } from './components/reporters.ts';
import { captureTestIdentity } from './components/test-identity.ts';
import type { ToString } from './components/to-string.ts';
import {
  createExistingFileWriter,
  createStringWriter,
  isApprovalWriter,
  type ApprovalWriter,
} from './components/writers.ts';

function approve(
  writer: ApprovalWriter,
  options: Options,
  namer: ApprovalNamer = options.namer,
): ApprovalPaths {
  return verifyWithApprover({
    namer,
    writer,
    reporter: options.reporter,
    identity: captureTestIdentity(options.testSource),
    scrubber: options.scrubber,
    log: approvalLoggerFromEnv(),
  });
}

/** Verify text, a writer, or any value converted through the options' toString. */
export function verify(writer: ApprovalWriter, options?: Options): ApprovalPaths;
export function verify(value: unknown, options?: Options): ApprovalPaths;
export function verify(subject: unknown, options: Options = new Options()): ApprovalPaths {
  if (isApprovalWriter(subject)) return approve(subject, options);
  const text = typeof subject === 'string' ? subject : options.toText(subject);
  return approve(createStringWriter(text, options.fileExtension), options);
}

/** Verify a value converted by an explicit converter. */
export function verifyWith<T>(
  value: T,
  converter: ToString<T>,
  options: Options = new Options(),
): ApprovalPaths {
  return approve(createStringWriter(converter(value), options.fileExtension), options);
}

/** Verify the message `fn` throws, or `*** no exception thrown ***`. */
export function verifyExceptionMessage(
  fn: () => unknown,
  options: Options = new Options(),
): ApprovalPaths {
  return verify(messageText(captureMessage(fn)), options);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/** Verify a sequence as one artifact: `<header>\n\n\n[0] = …\n[1] = …\n`. */
export function verifyAll<T>(
  header: string,
  items: Iterable<T>,
  converter?: ToString<T>,
  options?: Options,
): ApprovalPaths;
export function verifyAll<T>(items: Iterable<T>, options?: Options): ApprovalPaths;
export function verifyAll(
  first: string | Iterable<unknown>,
  second?: Iterable<unknown> | Options,
  converter?: ToString,
  options?: Options,
): ApprovalPaths {
  if (typeof first === 'string' && isIterable(second)) {
    const opts = options ?? new Options();
    return verify(formatAll(first, second, converter ?? opts.toText), opts);
  }
  const opts = second instanceof Options ? second : new Options();
  return verify(formatAll('', first, opts.toText), opts);
}

/** Verify a file that already exists; it is the received side. */
export function verifyExistingFile(filePath: string, options: Options = new Options()): ApprovalPaths {
  const scrubbed = options.scrubber !== undefined;
  const writer = createExistingFileWriter(filePath, scrubbed ? { encoding: 'utf8' } : {});
  const namer = createExistingFileNamer(filePath, { base: options.namer, scrubbed });
  return approve(writer, options, namer);
}

/** Verify a value as 2-space JSON in a `.json` file. */
export function verifyAsJson(value: unknown, options: Options = new Options()): ApprovalPaths {
  const text = `${JSON.stringify(value, null, 2)}\n`;
  return verify(createStringWriter(text, JSON_EXTENSION), options);
}

/** Verify `fn` over every combination of the inputs, one line per call. */
export function verifyAllCombinations<A>(
  fn: (a: A) => unknown,
  inputs: [Iterable<A>],
  options?: Options,
): ApprovalPaths;
export function verifyAllCombinations<A, B>(
  fn: (a: A, b: B) => unknown,
  inputs: [Iterable<A>, Iterable<B>],
  options?: Options,
): ApprovalPaths;
export function verifyAllCombinations<A, B, C>(
  fn: (a: A, b: B, c: C) => unknown,
  inputs: [Iterable<A>, Iterable<B>, Iterable<C>],
  options?: Options,
): ApprovalPaths;
export function verifyAllCombinations<A, B, C, D>(
  fn: (a: A, b: B, c: C, d: D) => unknown,
  inputs: [Iterable<A>, Iterable<B>, Iterable<C>, Iterable<D>],
  options?: Options,
): ApprovalPaths;
export function verifyAllCombinations(
  fn: (...args: unknown[]) => unknown,
  inputs: Iterable<unknown>[],
  options: Options = new Options(),
): ApprovalPaths {
  return verify(formatCombinations(fn, inputs, options.toText), options);
}

/** Put approved/received files in `<test dir>/<subdirectory>/` until disposed. */
export function useApprovalsSubdirectory(subdirectory = DEFAULT_SUBDIRECTORY): Disposer {
  return pushSubdirectory(subdirectory);
}

export function useAsDefaultReporter(reporter: Reporter): Disposer {
  return pushDefaultReporter(reporter);
}

export function useAsFrontLoadedReporter(reporter: Reporter): Disposer {
  return pushFrontLoadedReporter(reporter);
}

export function useAsDefaultNamer(namer: ApprovalNamer): Disposer {
  return pushDefaultNamer(namer);
}
