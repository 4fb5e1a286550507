import { stat } from 'node:fs/promises';
import * as path from 'node:path';

import { DEFAULT_CLONESIFT_RC_BASENAME } from '../clonesift-config.loader';

interface ResolveProjectRootResult {
  readonly rootAbs: string;
  readonly reason: 'config-file' | 'git-work-tree' | 'start-dir';
}

const exists = async (entryAbs: string): Promise<boolean> => {
  try {
    await stat(entryAbs);

    return true;
  } catch {
    return false;
  }
};

const resolveParent = (dirAbs: string): string | null => {
  const parent = path.dirname(dirAbs);

  return parent === dirAbs ? null : parent;
};

/**
 * Walks upward from `startDirAbs` to the nearest directory holding a
 * `.clonesiftrc.jsonc` or a `.git` entry. Falls back to the start directory.
 */
const resolveProjectRoot = async (startDirAbs: string = process.cwd()): Promise<ResolveProjectRootResult> => {
  const start = path.resolve(startDirAbs);
  let current: string | null = start;

  while (current !== null) {
    if (await exists(path.join(current, DEFAULT_CLONESIFT_RC_BASENAME))) {
      return { rootAbs: current, reason: 'config-file' };
    }

    if (await exists(path.join(current, '.git'))) {
      return { rootAbs: current, reason: 'git-work-tree' };
    }

    current = resolveParent(current);
  }

  return { rootAbs: start, reason: 'start-dir' };
};

export { resolveProjectRoot };
export type { ResolveProjectRootResult };
