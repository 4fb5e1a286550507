import { spawnSync } from 'node:child_process';
import { readdir, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import * as path from 'node:path';

import type { Lexer, LexerRegistry } from './ports/lexer';

import { ConfigError } from './engine/errors';
import { compileFnmatch } from './shared/fnmatch';

const SKIPPED_DIRS: ReadonlySet<string> = new Set(['node_modules', '.git']);

export interface DirectoryEntry {
  readonly name: string;
  isDirectory(): boolean;
  isFile(): boolean;
}

export interface DiscoveryOptions {
  readonly ignore: ReadonlyArray<string>;
  readonly languages: ReadonlyArray<string>;
  readonly lexers: LexerRegistry;
  readonly readDirectory?: (dirAbs: string) => Promise<ReadonlyArray<DirectoryEntry>>;
}

export interface UnreadablePath {
  readonly entryPath: string;
  readonly message: string;
}

export interface DiscoveryResult {
  /** Absolute, de-duplicated, sorted. Position in this list is the file id. */
  readonly files: string[];
  /** Targets that do not exist. */
  readonly missing: string[];
  /** Targets that exist but cannot be inspected, and directories whose listing failed mid-walk. */
  readonly unreadable: UnreadablePath[];
}

const readDirectoryEntries = (dirAbs: string): Promise<ReadonlyArray<DirectoryEntry>> => readdir(dirAbs, { withFileTypes: true });

const uniqueSorted = (values: ReadonlyArray<string>): string[] =>
  Array.from(new Set(values)).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const normalizePath = (value: string): string => value.replaceAll('\\', '/');

const runGitLsFiles = (cwd: string): string[] | null => {
  const result = spawnSync('git', ['ls-files'], { cwd, encoding: 'utf8' });

  if (result.error !== undefined || result.status !== 0) {
    return null;
  }

  return result.stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
};

const walkDir = async (
  dirAbs: string,
  readDirectory: (dirAbs: string) => Promise<ReadonlyArray<DirectoryEntry>>,
  unreadable: UnreadablePath[],
): Promise<string[]> => {
  const out: string[] = [];
  const pending = [dirAbs];

  while (pending.length > 0) {
    const current = pending.pop();

    if (current === undefined) {
      break;
    }

    let entries: ReadonlyArray<DirectoryEntry>;

    try {
      entries = await readDirectory(current);
    } catch (error) {
      unreadable.push({ entryPath: current, message: errorMessage(error) });

      continue;
    }

    for (const entry of entries) {
      const entryAbs = path.join(current, entry.name);

      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) {
          pending.push(entryAbs);
        }
      } else if (entry.isFile()) {
        out.push(entryAbs);
      }
    }
  }

  return out;
};

const isUnderSkippedDir = (filePath: string): boolean => {
  return normalizePath(filePath)
    .split('/')
    .some(segment => SKIPPED_DIRS.has(segment));
};

const createIgnoreMatcher = (patterns: ReadonlyArray<string>): ((fileAbs: string, rootAbs: string) => boolean) => {
  const compiled = patterns.map(pattern => {
    try {
      return compileFnmatch(pattern);
    } catch (error) {
      throw new ConfigError(
        `[clonesift] Invalid ignore pattern ${JSON.stringify(pattern)}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  });

  return (fileAbs, rootAbs) => {
    if (compiled.length === 0) {
      return false;
    }

    const candidates = [normalizePath(path.relative(rootAbs, fileAbs)), path.basename(fileAbs)];

    return compiled.some(regex => candidates.some(candidate => regex.test(candidate)));
  };
};

const matchesLanguage = (lexer: Lexer | null, languages: ReadonlySet<string>): boolean => {
  if (languages.size === 0) {
    return true;
  }

  if (lexer === null) {
    return false;
  }

  return [lexer.id, ...lexer.aliases].some(name => languages.has(name.toLowerCase()));
};

/**
 * Expands targets to the files a scan reads. Directories contribute files a
 * lexer claims; a file named explicitly is kept even without a lexer so the
 * scan can report it as skipped. No targets means the project root, through
 * `git ls-files` when it is a work tree.
 */
export const discoverFiles = async (
  rootAbs: string,
  targets: ReadonlyArray<string>,
  options: DiscoveryOptions,
): Promise<DiscoveryResult> => {
  const isIgnored = createIgnoreMatcher(options.ignore);
  const languages = new Set(options.languages.map(language => language.trim().toLowerCase()));
  const readDirectory = options.readDirectory ?? readDirectoryEntries;
  const files: string[] = [];
  const missing: string[] = [];
  const unreadable: UnreadablePath[] = [];

  const consider = (fileAbs: string, explicit: boolean): void => {
    if (isUnderSkippedDir(path.relative(rootAbs, fileAbs)) || isIgnored(fileAbs, rootAbs)) {
      return;
    }

    const lexer = options.lexers.forFile(fileAbs);

    if (lexer === null && !explicit) {
      return;
    }

    if (!matchesLanguage(lexer, languages)) {
      return;
    }

    files.push(fileAbs);
  };

  if (targets.length === 0) {
    const tracked = runGitLsFiles(rootAbs);
    const candidates = tracked !== null ? tracked.map(filePath => path.resolve(rootAbs, filePath)) : await walkDir(rootAbs, readDirectory, unreadable);

    for (const candidate of candidates) {
      consider(candidate, false);
    }

    return { files: uniqueSorted(files), missing, unreadable };
  }

  for (const raw of targets) {
    const abs = path.resolve(rootAbs, raw);

    let info: Stats;

    try {
      info = await stat(abs);
    } catch (error) {
      if (isNotFound(error)) {
        missing.push(abs);
      } else {
        unreadable.push({ entryPath: abs, message: errorMessage(error) });
      }

      continue;
    }

    if (info.isDirectory()) {
      for (const fileAbs of await walkDir(abs, readDirectory, unreadable)) {
        consider(fileAbs, false);
      }
    } else if (info.isFile()) {
      consider(abs, true);
    }
  }

  return { files: uniqueSorted(files), missing: uniqueSorted(missing), unreadable };
};
