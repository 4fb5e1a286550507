import { readFile } from 'node:fs/promises';

import type { NormalizedStream } from '../../engine/types';
import type { ScanDependencies, ScanOptions } from '../../interfaces';
import type { CloneSiftLogger } from '../../ports/logger';
import type { LexerRegistry } from '../../ports/lexer';
import type { CloneSiftReport, NormalizationLevel, SkippedFile } from '../../types';

import { assembleClones } from '../../engine/clone-assembler';
import { toReportedGroup } from '../../engine/clone-metrics';
import { createCorpusIndexBuilder } from '../../engine/corpus-index';
import { ConfigError } from '../../engine/errors';
import {
  fingerprintTask,
  type FingerprintEnvironment,
  type FingerprintTask,
  type FingerprintTaskResult,
} from '../../engine/file-fingerprinter';
import { createTokenHasher } from '../../engine/hasher';
import { runWithConcurrency } from '../../engine/promise-pool';
import { detectionThreshold } from '../../engine/winnowing';
import { compileSuppressionRules, splitLines, suppressClones, type SuppressionRule } from '../../features/suppression';
import { createDefaultLexerRegistry } from '../../infrastructure/lexers/lexer-registry';
import { discoverFiles } from '../../target-discovery';
import { runFingerprintPool } from '../../workers/fingerprint-pool';

export interface DetectionSettings {
  readonly k: number;
  readonly window: number;
  readonly minTokens: number;
  readonly normalize: NormalizationLevel;
  readonly gapTolerance: number;
  readonly suppressionPatterns: ReadonlyArray<string>;
  readonly minFamilySize: number;
  readonly concurrency: number;
}

const nowMs = (): number => performance.now();

const elapsed = (start: number): number => Math.round(nowMs() - start);

const readUtf8 = (filePath: string): Promise<string> => readFile(filePath, 'utf8');

const requirePositiveInt = (value: number, label: string, min = 1): void => {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`[clonesift] Invalid ${label}: ${value}. Expected an integer ≥ ${min}`);
  }
};

/**
 * Configuration checks that must fail before any file is read. Returns the
 * compiled suppression rules.
 */
export const validateDetectionSettings = (settings: DetectionSettings, logger: CloneSiftLogger): SuppressionRule[] => {
  requirePositiveInt(settings.k, 'k');
  requirePositiveInt(settings.window, 'window');
  requirePositiveInt(settings.minTokens, 'minTokens');
  requirePositiveInt(settings.gapTolerance, 'gapTolerance', 0);
  requirePositiveInt(settings.minFamilySize, 'minFamilySize', 2);

  const rules = compileSuppressionRules(settings.suppressionPatterns);
  const threshold = detectionThreshold(settings.k, settings.window);

  if (settings.minTokens < threshold) {
    logger.warn('minTokens is below the detection threshold; shorter clones may be missed', {
      minTokens: settings.minTokens,
      threshold,
    });
  }

  if (settings.window > settings.k && settings.gapTolerance < settings.window - settings.k) {
    logger.warn('window exceeds k; fingerprints may leave gaps that split one clone into several', {
      k: settings.k,
      window: settings.window,
      gapTolerance: settings.gapTolerance,
    });
  }

  return rules;
};

const fingerprintAll = async (
  filePaths: ReadonlyArray<string>,
  settings: DetectionSettings,
  deps: ScanDependencies,
  useWorkers: boolean,
): Promise<Array<FingerprintTaskResult | undefined>> => {
  const tasks: FingerprintTask[] = filePaths.map((filePath, fileId) => ({ fileId, filePath }));
  const environment: FingerprintEnvironment = {
    readSource: deps.readSource ?? readUtf8,
    lexers: deps.lexers ?? createDefaultLexerRegistry(),
    params: { k: settings.k, window: settings.window, level: settings.normalize, hashToken: createTokenHasher() },
  };

  // Worker threads build their own default lexers and read from disk; injected ones stay in this thread.
  if (useWorkers && settings.concurrency > 1 && tasks.length > 1) {
    return runFingerprintPool(tasks, {
      size: settings.concurrency,
      settings: { k: settings.k, window: settings.window, level: settings.normalize },
      logger: deps.logger,
      fallback: environment,
    });
  }

  const results = new Array<FingerprintTaskResult | undefined>(tasks.length);

  await runWithConcurrency(tasks, settings.concurrency, async (task, index) => {
    results[index] = await fingerprintTask(task, environment);

    deps.logger.trace('File fingerprinted', { file: task.filePath });
  });

  return results;
};

const runDetection = async (
  filePaths: ReadonlyArray<string>,
  settings: DetectionSettings,
  rules: ReadonlyArray<SuppressionRule>,
  deps: ScanDependencies,
  useWorkers: boolean,
): Promise<CloneSiftReport> => {
  const logger = deps.logger;
  const timings: Record<string, number> = {};

  logger.info(`Fingerprinting ${filePaths.length} files`, {
    k: settings.k,
    window: settings.window,
    normalize: settings.normalize,
  });

  const tFingerprint0 = nowMs();
  const outcomes = await fingerprintAll(filePaths, settings, deps, useWorkers);

  timings['fingerprint'] = elapsed(tFingerprint0);

  logger.debug('Fingerprinting finished', { durationMs: timings['fingerprint'] });

  // Single writer: fold per-file results in file-id order after the barrier.
  const tIndex0 = nowMs();
  const builder = createCorpusIndexBuilder();
  const streams = new Map<number, NormalizedStream>();
  const rawSources = new Map<number, ReadonlyArray<string>>();
  const skippedFiles: SkippedFile[] = [];
  let filesFingerprinted = 0;

  outcomes.forEach((outcome, fileId) => {
    if (outcome === undefined) {
      return;
    }

    if (!outcome.ok) {
      skippedFiles.push(outcome.skipped);
      logger.warn(`Skipped ${outcome.skipped.filePath}`, { reason: outcome.skipped.reason, detail: outcome.skipped.message });

      return;
    }

    filesFingerprinted += 1;

    // A file shorter than minTokens cannot hold either side of a reportable clone.
    if (outcome.stream.tokens.length < settings.minTokens) {
      logger.trace('File below minTokens, not indexed', { file: outcome.stream.filePath, tokens: outcome.stream.tokens.length });

      return;
    }

    streams.set(fileId, outcome.stream);
    rawSources.set(fileId, splitLines(outcome.sourceText));
    builder.add(outcome.fingerprints);
  });

  const index = builder.freeze();

  timings['index'] = elapsed(tIndex0);

  logger.debug('Corpus index built', {
    fingerprints: index.stats.fingerprints,
    distinctHashes: index.stats.distinctHashes,
    collisionBuckets: index.stats.collisionBuckets,
    largestBucket: index.stats.largestBucket?.hash,
    largestBucketSize: index.stats.largestBucket?.occurrences,
    durationMs: timings['index'],
  });

  const tAssemble0 = nowMs();
  const groups = assembleClones(index, streams, { minTokens: settings.minTokens, gapTolerance: settings.gapTolerance }).map(
    group => toReportedGroup(group, streams),
  );

  timings['assemble'] = elapsed(tAssemble0);

  logger.debug('Clone groups assembled', { groups: groups.length, durationMs: timings['assemble'] });

  const tSuppress0 = nowMs();
  const suppression = suppressClones(groups, rules, rawSources, { minFamilySize: settings.minFamilySize });

  timings['suppress'] = elapsed(tSuppress0);

  logger.debug('Suppression applied', {
    kept: suppression.kept.length,
    byRule: suppression.suppressedByRule,
    byFamily: suppression.suppressedByFamily,
    durationMs: timings['suppress'],
  });

  return {
    normalize: settings.normalize,
    groups: suppression.kept,
    suppressed: { byRule: suppression.suppressedByRule, byFamily: suppression.suppressedByFamily },
    skippedFiles,
    stats: {
      filesScanned: filePaths.length,
      filesFingerprinted,
      fingerprints: index.stats.fingerprints,
      collisionBuckets: index.stats.collisionBuckets,
    },
    timings,
  };
};

/**
 * Runs the detection pipeline over `filePaths`, whose order fixes the file
 * ids. Per-file failures become skipped files; configuration problems throw
 * before the first read.
 */
export const detectClones = async (
  filePaths: ReadonlyArray<string>,
  settings: DetectionSettings,
  deps: ScanDependencies,
): Promise<CloneSiftReport> => {
  const rules = validateDetectionSettings(settings, deps.logger);

  return runDetection(filePaths, settings, rules, deps, deps.lexers === undefined && deps.readSource === undefined);
};

const assertKnownLanguages = (languages: ReadonlyArray<string>, lexers: LexerRegistry): void => {
  const unknown = languages.filter(language => lexers.byLanguage(language) === null);

  if (unknown.length > 0) {
    const known = lexers.lexers.map(lexer => lexer.id).join('|');

    throw new ConfigError(`[clonesift] Unknown language: ${unknown.join(', ')}. Expected ${known}`);
  }
};

const scanUseCase = async (options: ScanOptions, deps: ScanDependencies): Promise<CloneSiftReport> => {
  const logger = deps.logger;
  const lexers = deps.lexers ?? createDefaultLexerRegistry();
  const settings: DetectionSettings = {
    k: options.k,
    window: options.window,
    minTokens: options.minTokens,
    normalize: options.normalize,
    gapTolerance: options.gapTolerance,
    suppressionPatterns: options.suppressionPatterns,
    minFamilySize: options.minFamilySize,
    concurrency: options.concurrency,
  };

  // Fail on configuration before touching the filesystem.
  const rules = validateDetectionSettings(settings, logger);
  assertKnownLanguages(options.languages, lexers);

  const tDiscover0 = nowMs();
  const discovery = await discoverFiles(options.rootAbs, options.targets, {
    ignore: options.ignore,
    languages: options.languages,
    lexers,
  });
  const discoverMs = elapsed(tDiscover0);

  for (const missing of discovery.missing) {
    logger.warn(`Target not found: ${missing}`);
  }

  for (const entry of discovery.unreadable) {
    logger.warn(`Could not read ${entry.entryPath}`, { detail: entry.message });
  }

  logger.info(`Discovered ${discovery.files.length} files`, { durationMs: discoverMs });

  const report = await runDetection(
    discovery.files,
    settings,
    rules,
    { ...deps, lexers },
    deps.lexers === undefined && deps.readSource === undefined,
  );

  logger.info('Analysis complete', { groups: report.groups.length, skipped: report.skippedFiles.length });

  return { ...report, timings: { discover: discoverMs, ...report.timings } };
};

export { scanUseCase };
