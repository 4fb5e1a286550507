import * as path from 'node:path';

import type { CloneSiftLogLevel } from './clonesift-config';
import type { CloneSiftCliExplicitFlags, CloneSiftCliOptions } from './interfaces';
import type { NormalizationLevel, OutputFormat } from './types';

import { ConfigError } from './engine/errors';

export const DEFAULT_K = 5;
export const DEFAULT_WINDOW = 4;
export const DEFAULT_MIN_TOKENS = 50;
export const DEFAULT_NORMALIZE: NormalizationLevel = 0;
export const DEFAULT_GAP_TOLERANCE = 0;
export const DEFAULT_FAMILY_SIZE = 3;

const parseLogLevel = (value: string): CloneSiftLogLevel => {
  if (value === 'error' || value === 'warn' || value === 'info' || value === 'debug' || value === 'trace') {
    return value;
  }

  throw new ConfigError(`[clonesift] Invalid --log-level: ${value}. Expected error|warn|info|debug|trace`);
};

const parseInteger = (value: string, label: string, min: number): number => {
  const parsed = Number(value.trim());

  if (value.trim().length === 0 || !Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`[clonesift] Invalid ${label}: ${value}. Expected an integer ≥ ${min}`);
  }

  return parsed;
};

const parseNormalize = (value: string): NormalizationLevel => {
  const trimmed = value.trim();

  if (trimmed === '0' || trimmed === '1' || trimmed === '2') {
    return trimmed === '0' ? 0 : trimmed === '1' ? 1 : 2;
  }

  throw new ConfigError(`[clonesift] Invalid --normalize: ${value}. Expected 0|1|2`);
};

const parseOutputFormat = (value: string): OutputFormat => {
  if (value === 'text' || value === 'json') {
    return value;
  }

  throw new ConfigError(`[clonesift] Invalid --format: ${value}. Expected text|json`);
};

const parseLanguages = (value: string): string[] => {
  const selections = value
    .split(',')
    .map(entry => entry.trim().toLowerCase())
    .filter(entry => entry.length > 0);

  if (selections.length === 0) {
    throw new ConfigError('[clonesift] Missing value for --languages');
  }

  return selections;
};

const normalizeTarget = (raw: string): string => {
  const trimmed = raw.trim();

  if (trimmed.length === 0) {
    throw new ConfigError('[clonesift] Empty target path');
  }

  return path.resolve(trimmed);
};

type ExplicitMutable = { -readonly [K in keyof CloneSiftCliExplicitFlags]: CloneSiftCliExplicitFlags[K] };

const parseArgs = (argv: readonly string[]): CloneSiftCliOptions => {
  const targets: string[] = [];
  const suppress: string[] = [];
  const ignore: string[] = [];
  const languages: string[] = [];
  let format: OutputFormat = 'text';
  let minTokens = DEFAULT_MIN_TOKENS;
  let k = DEFAULT_K;
  let window = DEFAULT_WINDOW;
  let normalize: NormalizationLevel = DEFAULT_NORMALIZE;
  let gapTolerance = DEFAULT_GAP_TOLERANCE;
  let minFamilySize = DEFAULT_FAMILY_SIZE;
  let concurrency: number | undefined;
  let exitOnFindings = true;
  let help = false;
  let version = false;
  let configPath: string | undefined;
  let logLevel: CloneSiftLogLevel | undefined;
  let logStack: boolean | undefined;

  const explicit: ExplicitMutable = {
    format: false,
    minTokens: false,
    k: false,
    window: false,
    normalize: false,
    gapTolerance: false,
    minFamilySize: false,
    languages: false,
    exitOnFindings: false,
    configPath: false,
    logLevel: false,
    logStack: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (typeof arg !== 'string') {
      continue;
    }

    // `--flag=value` is accepted as well as `--flag value`.
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string => {
      if (inline !== undefined) {
        return inline;
      }

      const value = argv[i + 1];

      if (typeof value !== 'string') {
        throw new ConfigError(`[clonesift] Missing value for ${flag}`);
      }

      i += 1;

      return value;
    };

    switch (flag) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--version':
      case '-v':
        version = true;
        break;
      case '--format':
        format = parseOutputFormat(takeValue());
        explicit.format = true;
        break;
      case '--min-tokens':
        minTokens = parseInteger(takeValue(), '--min-tokens', 1);
        explicit.minTokens = true;
        break;
      case '--k-gram-size':
        k = parseInteger(takeValue(), '--k-gram-size', 1);
        explicit.k = true;
        break;
      case '--window-size':
        window = parseInteger(takeValue(), '--window-size', 1);
        explicit.window = true;
        break;
      case '--normalize':
        normalize = parseNormalize(takeValue());
        explicit.normalize = true;
        break;
      case '--gap-tolerance':
        gapTolerance = parseInteger(takeValue(), '--gap-tolerance', 0);
        explicit.gapTolerance = true;
        break;
      case '--suppress': {
        const pattern = takeValue();

        if (pattern.length === 0) {
          throw new ConfigError('[clonesift] Missing value for --suppress');
        }

        suppress.push(pattern);
        break;
      }
      case '--min-family-size':
        minFamilySize = parseInteger(takeValue(), '--min-family-size', 2);
        explicit.minFamilySize = true;
        break;
      case '--ignore':
        ignore.push(takeValue());
        break;
      case '--languages':
        languages.push(...parseLanguages(takeValue()));
        explicit.languages = true;
        break;
      case '--concurrency':
        concurrency = parseInteger(takeValue(), '--concurrency', 1);
        break;
      case '--no-exit':
        exitOnFindings = false;
        explicit.exitOnFindings = true;
        break;
      case '--config':
        configPath = path.resolve(takeValue());
        explicit.configPath = true;
        break;
      case '--log-level':
        logLevel = parseLogLevel(takeValue());
        explicit.logLevel = true;
        break;
      case '--log-stack':
        logStack = true;
        explicit.logStack = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new ConfigError(`[clonesift] Unknown option: ${arg}`);
        }

        targets.push(normalizeTarget(arg));
    }
  }

  return {
    targets,
    format,
    minTokens,
    k,
    window,
    normalize,
    gapTolerance,
    suppress,
    minFamilySize,
    ignore,
    languages: [...new Set(languages)],
    exitOnFindings,
    help,
    version,
    ...(concurrency !== undefined ? { concurrency } : {}),
    ...(configPath !== undefined ? { configPath } : {}),
    ...(logLevel !== undefined ? { logLevel } : {}),
    ...(logStack !== undefined ? { logStack } : {}),
    explicit: { ...explicit },
  };
};

export { parseArgs };
