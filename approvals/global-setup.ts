// approvals/global-setup.ts
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { readFailedComparisons, resetRunLogs, tempDir } from './components/approval-log.ts';
import { ENV_LOG_DIR, ENV_LOG_STAMP } from './components/constants.ts';
import { plural } from './components/format.ts';
import { approvalLoggerFromEnv, buildLogRoot, makeLogStamp } from './components/logger.ts';

// Helper to always print a pointer to this run’s logs
function printLogsPointer(logDir: string) {
  const abs = path.resolve(logDir);
  console.log(`\n📝 Approval logs for this run: ${abs}`);
  console.log(`   ${pathToFileURL(abs).toString()}\n`);
}

/**
 * Vitest globalSetup: stamp the run, point the verification logger at
 * logs/<stamp> (unless APPROVALS_LOG_DIR is already set) and forget the
 * previous run's approved/failed logs. Workers inherit the environment.
 */
export default function globalSetup(): () => void {
  const stamp = process.env[ENV_LOG_STAMP] || makeLogStamp();
  process.env[ENV_LOG_STAMP] = stamp;
  const logDir = process.env[ENV_LOG_DIR] || buildLogRoot(stamp);
  process.env[ENV_LOG_DIR] = logDir;

  const log = approvalLoggerFromEnv();
  log?.step('Approvals: reset run logs', `temp=${tempDir()}`);
  resetRunLogs();
  log?.pass('run logs cleared');

  // Anchor: verification steps from the workers follow this one
  log?.step('Run Tests');

  return () => {
    const failed = readFailedComparisons();
    log?.step('Approvals: summary');
    if (failed.length) log?.fail(plural(failed.length, 'failed comparison'));
    else log?.pass('no failed comparisons');
    printLogsPointer(logDir);
  };
}
