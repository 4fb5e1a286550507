import { readFile } from 'node:fs/promises';
import * as path from 'node:path';

import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';

import { CloneSiftConfigSchema, type CloneSiftConfig } from './clonesift-config';
import { ConfigError } from './engine/errors';

export const DEFAULT_CLONESIFT_RC_BASENAME = '.clonesiftrc.jsonc';

export const resolveDefaultCloneSiftRcPath = (rootAbs: string): string => path.join(rootAbs, DEFAULT_CLONESIFT_RC_BASENAME);

const isMissingFile = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
};

const describeParseErrors = (raw: string, errors: ReadonlyArray<ParseError>): string => {
  return errors
    .map(error => {
      const before = raw.slice(0, error.offset);
      const line = before.split('\n').length;

      return `${printParseErrorCode(error.error)} at line ${line}`;
    })
    .join('\n');
};

export const parseCloneSiftConfigText = (raw: string, sourceLabel: string): CloneSiftConfig => {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(raw, errors, { allowTrailingComma: true, allowEmptyContent: true, disallowComments: false });

  if (errors.length > 0) {
    throw new ConfigError(`[clonesift] Failed to parse config: ${sourceLabel}\n${describeParseErrors(raw, errors)}`);
  }

  const validated = CloneSiftConfigSchema.safeParse(parsed ?? {});

  if (!validated.success) {
    throw new ConfigError(`[clonesift] Invalid config: ${sourceLabel}\n${validated.error.message}`);
  }

  return validated.data;
};

/**
 * Loads `.clonesiftrc.jsonc` from the project root, or `configPath` when given.
 * A missing default file is not an error; a missing explicit file is.
 */
export const loadCloneSiftConfigFile = async (params: {
  readonly rootAbs: string;
  readonly configPath?: string | undefined;
}): Promise<{ config: CloneSiftConfig | null; resolvedPath: string; exists: boolean }> => {
  const explicit = params.configPath !== undefined;
  const resolvedPath = explicit ? path.resolve(params.configPath ?? '') : resolveDefaultCloneSiftRcPath(params.rootAbs);
  let raw: string;

  try {
    raw = await readFile(resolvedPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error) && !explicit) {
      return { config: null, resolvedPath, exists: false };
    }

    const message = error instanceof Error ? error.message : String(error);

    throw new ConfigError(`[clonesift] Failed to read config: ${resolvedPath}\n${message}`);
  }

  return { config: parseCloneSiftConfigText(raw, resolvedPath), resolvedPath, exists: true };
};
