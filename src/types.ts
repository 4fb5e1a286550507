export type OutputFormat = 'text' | 'json';

export type { CloneSiftConfig } from './clonesift-config';

export type NormalizationLevel = 0 | 1 | 2;

export type CloneType = 'type-1' | 'type-2';

/** Half-open `[start, end)` range of token indices in a normalized stream. */
export interface TokenRange {
  readonly start: number;
  readonly end: number;
}

/** Inclusive, 1-based line range. */
export interface LineRange {
  readonly start: number;
  readonly end: number;
}

export interface CloneOccurrence {
  readonly fileId: number;
  readonly filePath: string;
  readonly tokenRange: TokenRange;
  readonly lineRange: LineRange;
}

/**
 * Two occurrences whose normalized token spans are identical (or, with a
 * non-zero gap tolerance, aligned on the same diagonal). Both spans always
 * hold `tokenCount` tokens.
 */
export interface CloneGroup {
  readonly occurrenceA: CloneOccurrence;
  readonly occurrenceB: CloneOccurrence;
  readonly tokenCount: number;
}

export interface ReportedCloneGroup extends CloneGroup {
  readonly lineCount: number;
  readonly similarity: number;
  readonly cloneType: CloneType;
}

export interface CloneReport {
  readonly fileA: string;
  readonly fileB: string;
  readonly groups: ReadonlyArray<ReportedCloneGroup>;
  readonly totalClonedLines: number;
}

export type SkipReason = 'unlexable' | 'unsupported-token-kind';

export interface SkippedFile {
  readonly filePath: string;
  readonly reason: SkipReason;
  readonly message: string;
}

export interface SuppressionSummary {
  readonly byRule: number;
  readonly byFamily: number;
}

export interface ScanStats {
  readonly filesScanned: number;
  readonly filesFingerprinted: number;
  readonly fingerprints: number;
  readonly collisionBuckets: number;
}

export interface CloneSiftReport {
  readonly normalize: NormalizationLevel;
  readonly groups: ReadonlyArray<ReportedCloneGroup>;
  readonly suppressed: SuppressionSummary;
  readonly skippedFiles: ReadonlyArray<SkippedFile>;
  readonly stats: ScanStats;
  readonly timings?: Readonly<Record<string, number>>;
}
