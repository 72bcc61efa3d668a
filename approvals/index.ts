// approvals/index.ts
export {
  verify,
  verifyWith,
  verifyAll,
  verifyAllCombinations,
  verifyAsJson,
  verifyExceptionMessage,
  verifyExistingFile,
  useApprovalsSubdirectory,
  useAsDefaultNamer,
  useAsDefaultReporter,
  useAsFrontLoadedReporter,
} from './approvals.ts';

export { Options } from './components/options.ts';
export { withDisposer, configurationDepth, type Disposer } from './components/config-stack.ts';
export {
  getDefaultNamer,
  getDefaultReporter,
  getFrontLoadedReporters,
  getSubdirectory,
} from './components/defaults.ts';

export {
  ApprovalMismatchError,
  DisposerLeakError,
  DisposerOrderError,
  TestIdentityError,
  type MismatchKind,
} from './components/errors.ts';

export {
  approvalBaseName,
  createDefaultNamer,
  createExistingFileNamer,
  createSubdirectoryNamer,
  type ApprovalNamer,
} from './components/namers.ts';
export { captureTestIdentity, type TestIdentity, type TestSource } from './components/test-identity.ts';

export {
  createAutoApproveIfMissingReporter,
  createAutoApproveReporter,
  createCiReporter,
  createCombinationReporter,
  createConsoleReporter,
  createDefaultReporter,
  createDiffReporter,
  createDiffToolReporter,
  createFirstWorkingReporter,
  createLoggingReporter,
  createQuietReporter,
  type Reporter,
} from './components/reporters.ts';
export { KNOWN_DIFF_TOOLS, type DiffTool } from './components/diff-tools.ts';

export {
  combineScrubbers,
  createIsoDateScrubber,
  createLinesScrubber,
  createRegexScrubber,
  doNothing,
  scrubGuids,
  scrubLineEndings,
  type Scrubber,
} from './components/scrubbers.ts';

export {
  createBinaryWriter,
  createExistingFileWriter,
  createStringWriter,
  type ApprovalWriter,
} from './components/writers.ts';
export { defaultToString, type ToString } from './components/to-string.ts';
export { captureMessage, type CapturedMessage } from './components/formatters.ts';
export type { ApprovalPaths } from './components/approver.ts';

export {
  approveFailedComparisons,
  findUnverifiedApprovedFiles,
  readFailedComparisons,
  type FailedComparison,
} from './components/approval-log.ts';
export { createLogger } from './components/logger.ts';
export type { Logger } from './types/logger.ts';
