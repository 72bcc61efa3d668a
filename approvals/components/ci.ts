// approvals/components/ci.ts
import { CI_ENV_VARS } from './constants.ts';
import { isReceivedFile } from './namers.ts';

export type EnvLike = Record<string, string | undefined>;

/** True on a build server: any known CI variable is set to something other than false/0. */
export function isCiEnvironment(env: EnvLike = process.env): boolean {
  return CI_ENV_VARS.some((name) => {
    const v = (env[name] ?? '').trim().toLowerCase();
    return v !== '' && v !== 'false' && v !== '0';
  });
}

/**
 * Shell command that accepts a received file as the new approved baseline.
 * A file verified in place is copied so the user's file stays where it is.
 */
export function approveCommand(
  receivedPath: string,
  approvedPath: string,
  platform: NodeJS.Platform = process.platform,
): string {
  const move = isReceivedFile(receivedPath);
  if (platform === 'win32') {
    return `${move ? 'move' : 'copy'} /Y "${receivedPath}" "${approvedPath}"`;
  }
  return `${move ? 'mv' : 'cp'} -f "${receivedPath}" "${approvedPath}"`;
}
