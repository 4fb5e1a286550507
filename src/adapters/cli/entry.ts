import { availableParallelism } from 'node:os';

import type { CloneSiftConfig } from '../../clonesift-config';
import type { CloneSiftCliOptions, ScanOptions } from '../../interfaces';
import type { CloneSiftLogger } from '../../ports/logger';
import type { LexerRegistry } from '../../ports/lexer';
import type { CloneSiftReport, OutputFormat } from '../../types';

import { parseArgs } from '../../arg-parse';
import { scanUseCase } from '../../application/scan/scan.usecase';
import { loadCloneSiftConfigFile } from '../../clonesift-config.loader';
import { ConfigError, InvalidSuppressionPatternError } from '../../engine/errors';
import { createPrettyConsoleLogger } from '../../infrastructure/logging/pretty-console-logger';
import { formatReport } from '../../report';
import { resolveProjectRoot } from '../../shared/root-resolver';
import { computeToolVersion } from '../../tool-version';

export const EXIT_CLEAN = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_FATAL = 2;

export interface CliIo {
  readonly cwd?: string;
  readonly stdout?: (text: string) => void;
  readonly createLogger?: (options: CloneSiftCliOptions) => CloneSiftLogger;
  readonly lexers?: LexerRegistry;
  readonly color?: boolean;
}

interface ResolvedCli {
  readonly scan: ScanOptions;
  readonly format: OutputFormat;
  readonly exitOnFindings: boolean;
}

const printHelp = (write: (text: string) => void): void => {
  const lines = [
    'clonesift - copy-paste detector for any language',
    '',
    'Usage:',
    '  clonesift [paths...] [options]',
    '',
    'Defaults:',
    '  - Without paths, the project root is scanned (git-tracked files inside a work tree).',
    '  - Settings come from CLI flags, then <root>/.clonesiftrc.jsonc, then built-in defaults.',
    '',
    'Options:',
    '  --min-tokens <n>         Minimum clone length in tokens (default: 50)',
    '  --k-gram-size <n>        Tokens per fingerprinted k-gram (default: 5)',
    '  --window-size <n>        Winnowing window (default: 4)',
    '  --normalize <0|1|2>      0 exact, 1 identifiers, 2 identifiers and literals (default: 0)',
    '  --gap-tolerance <n>      Merge matches separated by up to n tokens (default: 0)',
    '  --suppress <glob>        Suppress clones whose context matches (repeatable)',
    '  --min-family-size <n>    Locations a clone family needs for sibling suppression (default: 3)',
    '  --ignore <glob>          Skip matching paths (repeatable)',
    '  --languages <list>       Comma-separated language ids or aliases',
    '  --concurrency <n>        Files processed at once (default: available parallelism)',
    '  --format text|json       Output format (default: text)',
    '  --config <path>          Config file path (default: <root>/.clonesiftrc.jsonc)',
    '  --log-level <level>      error|warn|info|debug|trace (default: warn)',
    '  --log-stack              Print stack traces with logged errors',
    '  --no-exit                Exit 0 even when clones are found',
    '  -v, --version            Print the version',
    '  -h, --help               Show this help',
  ];

  write(lines.join('\n'));
};

const mergeList = (fromConfig: ReadonlyArray<string> | undefined, fromCli: ReadonlyArray<string>): string[] => {
  return [...new Set([...(fromConfig ?? []), ...fromCli])];
};

const resolveOptions = (options: CloneSiftCliOptions, config: CloneSiftConfig | null, rootAbs: string): ResolvedCli => {
  const explicit = options.explicit;
  const detection = config?.detection;
  const suppression = config?.suppression;
  const discovery = config?.discovery;
  const output = config?.output;
  const pick = <T>(isExplicit: boolean | undefined, cliValue: T, configValue: T | undefined): T =>
    isExplicit === true || configValue === undefined ? cliValue : configValue;

  return {
    scan: {
      rootAbs,
      targets: options.targets,
      k: pick(explicit?.k, options.k, detection?.k),
      window: pick(explicit?.window, options.window, detection?.window),
      minTokens: pick(explicit?.minTokens, options.minTokens, detection?.minTokens),
      normalize: pick(explicit?.normalize, options.normalize, detection?.normalize),
      gapTolerance: pick(explicit?.gapTolerance, options.gapTolerance, detection?.gapTolerance),
      suppressionPatterns: mergeList(suppression?.patterns, options.suppress),
      minFamilySize: pick(explicit?.minFamilySize, options.minFamilySize, suppression?.minFamilySize),
      ignore: mergeList(discovery?.ignore, options.ignore),
      languages: pick(explicit?.languages, options.languages, discovery?.languages),
      concurrency: options.concurrency ?? availableParallelism(),
    },
    format: pick(explicit?.format, options.format, output?.format),
    exitOnFindings: pick(explicit?.exitOnFindings, options.exitOnFindings, output?.exitOnFindings),
  };
};

const defaultLogger = (options: CloneSiftCliOptions): CloneSiftLogger => {
  return createPrettyConsoleLogger({ level: options.logLevel ?? 'warn', includeStack: options.logStack ?? false });
};

const isFatalConfiguration = (error: unknown): boolean => {
  return error instanceof ConfigError || error instanceof InvalidSuppressionPatternError;
};

/**
 * Exit status: 0 no clones reported, 1 clones reported (unless --no-exit),
 * 2 unusable configuration or an unexpected failure.
 */
const runCli = async (argv: readonly string[], io: CliIo = {}): Promise<number> => {
  const write = io.stdout ?? ((text: string) => console.log(text));
  let options: CloneSiftCliOptions;

  try {
    options = parseArgs(argv);
  } catch (error) {
    createPrettyConsoleLogger({ level: 'error' }).error(error instanceof Error ? error.message : String(error));

    return EXIT_FATAL;
  }

  if (options.help) {
    printHelp(write);

    return EXIT_CLEAN;
  }

  if (options.version) {
    write(computeToolVersion());

    return EXIT_CLEAN;
  }

  let logger = (io.createLogger ?? defaultLogger)(options);
  let resolved: ResolvedCli;
  let report: CloneSiftReport;

  try {
    const { rootAbs, reason } = await resolveProjectRoot(io.cwd);
    const loaded = await loadCloneSiftConfigFile({ rootAbs, configPath: options.configPath });
    const configLevel = loaded.config?.logging?.level;

    if (options.explicit?.logLevel !== true && configLevel !== undefined) {
      logger = (io.createLogger ?? defaultLogger)({ ...options, logLevel: configLevel });
    }

    logger.debug('Project root resolved', { rootAbs, reason });
    logger.debug(loaded.exists ? 'Config loaded' : 'No config file, using defaults', { path: loaded.resolvedPath });

    resolved = resolveOptions(options, loaded.config, rootAbs);
    report = await scanUseCase(resolved.scan, { logger, ...(io.lexers !== undefined ? { lexers: io.lexers } : {}) });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);

    if (isFatalConfiguration(error)) {
      logger.error(message);
    } else {
      logger.error(`[clonesift] Failed: ${message}`, {}, error);
    }

    return EXIT_FATAL;
  }

  write(formatReport(report, resolved.format, { rootAbs: resolved.scan.rootAbs, ...(io.color !== undefined ? { color: io.color } : {}) }));

  if (report.groups.length > 0 && resolved.exitOnFindings) {
    return EXIT_FINDINGS;
  }

  return EXIT_CLEAN;
};

export { resolveOptions, runCli };
