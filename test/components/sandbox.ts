// test/components/sandbox.ts
import * as os from 'node:os';
import * as path from 'node:path';

import fs from 'fs-extra';

export type Sandbox = {
  root: string;
  path: (...segments: string[]) => string;
  write: (rel: string, content: string | Uint8Array) => string;
  read: (rel: string) => string;
  exists: (rel: string) => boolean;
  cleanup: () => void;
};

/** A throwaway directory under the OS temp dir. */
export function createSandbox(prefix = 'approvals-'): Sandbox {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const abs = (...segments: string[]) => path.join(root, ...segments);

  return {
    root,
    path: abs,
    write: (rel, content) => {
      const p = abs(rel);
      fs.outputFileSync(p, content);
      return p;
    },
    read: (rel) => fs.readFileSync(abs(rel), 'utf8'),
    exists: (rel) => fs.pathExistsSync(abs(rel)),
    cleanup: () => fs.removeSync(root),
  };
}
