// approvals/components/constants.ts

// File naming
export const APPROVED_INFIX = '.approved';
export const RECEIVED_INFIX = '.received';
export const SCRUBBED_INFIX = '.scrubbed';
export const DEFAULT_EXTENSION = '.txt';
export const JSON_EXTENSION = '.json';
export const DEFAULT_SUBDIRECTORY = 'approval_tests';

/** Vitest joins describe/test names with this separator in `currentTestName`. */
export const TEST_NAME_SEPARATOR = ' > ';

export const NO_EXCEPTION_SENTINEL = '*** no exception thrown ***';

// Run logs (approved files seen, failed comparisons)
export const TEMP_DIR_NAME = '.approval_tests_temp';
export const APPROVED_LOG_FILE = '.approved_files.log';
export const FAILED_LOG_FILE = '.failed_comparison.log';
export const FAILED_LOG_SEPARATOR = ' -> ';

// Verification log
export const LOGS_DIR = 'logs';
export const LOG_FILE_NAME = 'approvals.log';

// Environment variable names
export const ENV_REPORTER = 'APPROVALS_REPORTER';
export const ENV_SUBDIRECTORY = 'APPROVALS_SUBDIRECTORY';
export const ENV_TEMP_DIR = 'APPROVALS_TEMP_DIR';
export const ENV_LOG_DIR = 'APPROVALS_LOG_DIR';
export const ENV_LOG_STAMP = 'APPROVALS_LOG_STAMP';

/** Any of these set (and not "false"/"0") means we are on a build server. */
export const CI_ENV_VARS: readonly string[] = [
  'CI',
  'CONTINUOUS_INTEGRATION',
  'GITHUB_ACTIONS',
  'GITLAB_CI',
  'TF_BUILD',
  'JENKINS_URL',
  'TEAMCITY_VERSION',
  'APPVEYOR',
  'TRAVIS',
  'CIRCLECI',
  'GO_SERVER_URL',
];
