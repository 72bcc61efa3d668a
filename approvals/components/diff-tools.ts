// approvals/components/diff-tools.ts
import * as path from 'node:path';

import fs from 'fs-extra';
import { execa, execaSync } from 'execa';

import type { Logger } from '../types/logger.ts';
import { errorMessage } from './errors.ts';

export type DiffTool = {
  name: string;
  /** Executable name (looked up on PATH) or absolute path. */
  command: string;
  args: (receivedPath: string, approvedPath: string) => string[];
  /** Wait for the tool to exit before the test fails. Default false. */
  blocking?: boolean;
  /** Restrict to these platforms. Default: any. */
  platforms?: readonly NodeJS.Platform[];
};

const receivedThenApproved = (r: string, a: string) => [r, a];

export const KNOWN_DIFF_TOOLS: readonly DiffTool[] = [
  { name: 'beyond-compare', command: 'bcompare', args: receivedThenApproved },
  { name: 'p4merge', command: 'p4merge', args: receivedThenApproved },
  { name: 'diffmerge', command: 'diffmerge', args: (r, a) => ['--nosplash', r, a] },
  { name: 'kdiff3', command: 'kdiff3', args: (r, a) => [r, a, '-m'] },
  { name: 'meld', command: 'meld', args: receivedThenApproved },
  { name: 'tkdiff', command: 'tkdiff', args: receivedThenApproved, platforms: ['linux', 'darwin'] },
  {
    name: 'winmerge',
    command: 'WinMergeU',
    args: (r, a) => ['/u', '/e', r, a],
    platforms: ['win32'],
  },
  { name: 'vscode', command: 'code', args: (r, a) => ['-d', r, a] },
];

export type CommandLookupEnv = {
  PATH?: string;
  PATHEXT?: string;
};

/**
 * Resolve a command to an executable on disk, or undefined when it is not
 * installed. Absolute paths are checked as is.
 */
export function resolveCommand(
  command: string,
  env: CommandLookupEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string | undefined {
  if (path.isAbsolute(command)) {
    return fs.pathExistsSync(command) ? command : undefined;
  }

  const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
  const pathExt = (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean);
  const exts = platform === 'win32' ? ['', ...pathExt] : [''];

  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = path.join(dir, command + ext);
      if (fs.pathExistsSync(candidate)) return candidate;
    }
  }
  return undefined;
}

function writeArgs(log: Logger | undefined, args: string[], argsWrapWidth = 100) {
  const single = JSON.stringify(args);
  if (single.length <= argsWrapWidth) {
    log?.write(`args=${single}`);
    return;
  }

  log?.write('args=[');
  args.forEach((a, i) => {
    const isLast = i === args.length - 1;
    // indent inner lines +2 relative to the logger’s default indent
    log?.write(`  ${JSON.stringify(a)}${isLast ? '' : ','}`, '+2');
  });
  log?.write(']');
}

/**
 * Launch a diff tool on the two files. Blocking tools are awaited
 * synchronously; others are started detached and left running. The tool's
 * exit status is never inspected; a detached tool that fails is only logged.
 */
export function launchDiffTool(
  tool: DiffTool,
  executable: string,
  receivedPath: string,
  approvedPath: string,
  log?: Logger,
): void {
  const args = tool.args(receivedPath, approvedPath);
  log?.write(`cmd=${executable}`);
  writeArgs(log, args);

  if (tool.blocking) {
    execaSync(executable, args, { windowsHide: true, reject: false, stdio: 'ignore' });
    return;
  }

  const child = execa(executable, args, {
    detached: true,
    stdio: 'ignore',
    windowsHide: true,
  });
  child.unref();
  void child.catch((err: unknown) => log?.warn(`${tool.name}: ${errorMessage(err)}`));
}
