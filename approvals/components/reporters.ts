// approvals/components/reporters.ts
import * as path from 'node:path';

import fs from 'fs-extra';

import type { Logger } from '../types/logger.ts';
import { ICON } from '../types/ui.ts';
import { approveCommand, isCiEnvironment, type EnvLike } from './ci.ts';
import { ENV_REPORTER } from './constants.ts';
import { KNOWN_DIFF_TOOLS, launchDiffTool, resolveCommand, type DiffTool } from './diff-tools.ts';
import { renderBox } from './format.ts';
import { approvalLoggerFromEnv } from './logger.ts';

/**
 * Invoked with (received, approved) when a verification fails.
 * Returns true when it handled the situation (launched a tool, approved the
 * file, …). The verification fails either way.
 */
export interface Reporter {
  readonly name: string;
  report(receivedPath: string, approvedPath: string): boolean;
}

/** Does nothing and says it handled it. */
export function createQuietReporter(): Reporter {
  return { name: 'quiet', report: () => true };
}

/** Try reporters in order; stop at the first that handles the failure. */
export function createFirstWorkingReporter(
  reporters: readonly Reporter[],
  name = `first-working(${reporters.map((r) => r.name).join(', ')})`,
): Reporter {
  return {
    name,
    report(receivedPath, approvedPath) {
      for (const r of reporters) {
        if (r.report(receivedPath, approvedPath)) return true;
      }
      return false;
    },
  };
}

/** Run every reporter; handled when any of them handled it. */
export function createCombinationReporter(reporters: readonly Reporter[]): Reporter {
  return {
    name: `combination(${reporters.map((r) => r.name).join(', ')})`,
    report(receivedPath, approvedPath) {
      let handled = false;
      for (const r of reporters) {
        handled = r.report(receivedPath, approvedPath) || handled;
      }
      return handled;
    },
  };
}

/** Create an empty approved file so a diff tool can open both sides. */
export function ensureApprovedFileExists(approvedPath: string): void {
  if (!fs.pathExistsSync(approvedPath)) fs.outputFileSync(approvedPath, '');
}

export type DiffLauncher = (
  tool: DiffTool,
  executable: string,
  receivedPath: string,
  approvedPath: string,
) => void;

export type DiffReporterDeps = {
  resolveCommand?: (command: string) => string | undefined;
  launch?: DiffLauncher;
  platform?: NodeJS.Platform;
};

const defaultLauncher: DiffLauncher = (tool, executable, receivedPath, approvedPath) =>
  launchDiffTool(tool, executable, receivedPath, approvedPath, approvalLoggerFromEnv());

/** Launch one external diff tool; not handled when the tool is not installed here. */
export function createDiffToolReporter(tool: DiffTool, deps: DiffReporterDeps = {}): Reporter {
  const platform = deps.platform ?? process.platform;
  const lookup = deps.resolveCommand ?? ((command: string) => resolveCommand(command));
  const launch = deps.launch ?? defaultLauncher;

  return {
    name: tool.name,
    report(receivedPath, approvedPath) {
      if (tool.platforms && !tool.platforms.includes(platform)) return false;
      const executable = lookup(tool.command);
      if (!executable) return false;

      ensureApprovedFileExists(approvedPath);
      launch(tool, executable, receivedPath, approvedPath);
      return true;
    },
  };
}

/** The first installed diff tool of `tools`. */
export function createDiffReporter(
  tools: readonly DiffTool[] = KNOWN_DIFF_TOOLS,
  deps: DiffReporterDeps = {},
): Reporter {
  return createFirstWorkingReporter(
    tools.map((t) => createDiffToolReporter(t, deps)),
    'diff',
  );
}

/** Handles (by doing nothing) on a build server, so no tool is launched there. */
export function createCiReporter(env: EnvLike = process.env): Reporter {
  return { name: 'ci', report: () => isCiEnvironment(env) };
}

export type ConsoleReporterOptions = {
  write?: (line: string) => void;
  platform?: NodeJS.Platform;
  /** Box width; longer lines are wrapped. */
  width?: number;
};

/** Print both paths, the received text and the command that approves it. */
export function createConsoleReporter(opts: ConsoleReporterOptions = {}): Reporter {
  const write = opts.write ?? ((line: string) => console.log(line));
  const platform = opts.platform ?? process.platform;

  return {
    name: 'console',
    report(receivedPath, approvedPath) {
      const received = fs.readFileSync(receivedPath, 'utf8');
      const lines = [
        `received: ${receivedPath}`,
        `approved: ${approvedPath}`,
        '',
        ...received.replace(/\n$/, '').split('\n'),
        '',
        `approve: ${approveCommand(receivedPath, approvedPath, platform)}`,
      ];
      const title = `${ICON.fail} approval mismatch`;
      for (const l of renderBox(title, lines, path.basename(approvedPath), opts.width)) write(l);
      return true;
    },
  };
}

/** Copy received over approved. The current run still fails; the next one passes. */
export function createAutoApproveReporter(): Reporter {
  return {
    name: 'auto-approve',
    report(receivedPath, approvedPath) {
      fs.copySync(receivedPath, approvedPath, { overwrite: true });
      return true;
    },
  };
}

/** Like auto-approve, but only seeds approved files that do not exist yet. */
export function createAutoApproveIfMissingReporter(): Reporter {
  const approve = createAutoApproveReporter();
  return {
    name: 'auto-approve-missing',
    report(receivedPath, approvedPath) {
      if (fs.pathExistsSync(approvedPath)) return false;
      return approve.report(receivedPath, approvedPath);
    },
  };
}

/** Record the mismatch in the verification log; never handles it. */
export function createLoggingReporter(log: Logger): Reporter {
  return {
    name: 'log',
    report(receivedPath, approvedPath) {
      log.fail(`mismatch: ${path.basename(approvedPath)}`);
      log.write(`received=${receivedPath}`);
      log.write(`approved=${approvedPath}`);
      return false;
    },
  };
}

const NAMED_REPORTERS: Record<string, () => Reporter> = {
  quiet: createQuietReporter,
  console: () => createConsoleReporter(),
  diff: () => createDiffReporter(),
  'auto-approve': createAutoApproveReporter,
  'auto-approve-missing': createAutoApproveIfMissingReporter,
};

/**
 * The reporter named by APPROVALS_REPORTER, or: nothing on CI, else the first
 * installed diff tool, else quiet.
 */
export function createDefaultReporter(env: EnvLike = process.env): Reporter {
  const requested = (env[ENV_REPORTER] ?? '').trim();
  if (requested) {
    const make = Object.hasOwn(NAMED_REPORTERS, requested) ? NAMED_REPORTERS[requested] : undefined;
    if (!make) {
      const known = Object.keys(NAMED_REPORTERS).join(', ');
      throw new Error(`${ENV_REPORTER}="${requested}" is not a reporter (known: ${known})`);
    }
    return make();
  }
  return createFirstWorkingReporter(
    [createCiReporter(env), createDiffReporter(), createQuietReporter()],
    'default',
  );
}
