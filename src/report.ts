import * as path from 'node:path';
import { table as renderTable } from 'table';

import type { CloneReport, CloneSiftReport, OutputFormat, ReportedCloneGroup } from './types';

export interface FormatReportOptions {
  /** Paths are printed relative to this directory when given. */
  readonly rootAbs?: string;
  readonly color?: boolean;
}

// ── Color helpers (stdout TTY-aware) ────────────────────────────────
const isStdoutTty = (): boolean => {
  return Boolean(process.stdout.isTTY) && process.env['NO_COLOR'] === undefined;
};

const A = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
} as const;

const THIN = '┄'.repeat(60);

const formatNumber = (value: number): string => {
  return new Intl.NumberFormat('en-US').format(value);
};

const formatDuration = (ms: number | undefined): string => {
  if (ms === undefined || !Number.isFinite(ms)) {
    return '—';
  }

  if (ms >= 1000) {
    return `${(ms / 1000).toFixed(2).replace(/\.?0+$/, '')}s`;
  }

  return `${Math.round(ms)}ms`;
};

const sumTimingsMs = (timings: Readonly<Record<string, number>> | undefined): number | undefined => {
  if (timings === undefined) {
    return undefined;
  }

  const values = Object.values(timings).filter(value => Number.isFinite(value));

  return values.length > 0 ? values.reduce((total, value) => total + value, 0) : undefined;
};

/** Percent shown never rounds a near clone up to 100. */
const formatSimilarity = (similarity: number): string => `${Math.floor(similarity * 100)}%`;

/**
 * Buckets groups per file pair. Pairs keep the order of their first group,
 * which the assembler already sorts by file id.
 */
export const buildCloneReports = (groups: ReadonlyArray<ReportedCloneGroup>): CloneReport[] => {
  const pairs = new Map<string, { fileA: string; fileB: string; groups: ReportedCloneGroup[] }>();

  for (const group of groups) {
    const key = `${group.occurrenceA.fileId}:${group.occurrenceB.fileId}`;
    const pair = pairs.get(key);

    if (pair) {
      pair.groups.push(group);
    } else {
      pairs.set(key, { fileA: group.occurrenceA.filePath, fileB: group.occurrenceB.filePath, groups: [group] });
    }
  }

  return [...pairs.values()].map(pair => ({
    fileA: pair.fileA,
    fileB: pair.fileB,
    groups: pair.groups,
    totalClonedLines: pair.groups.reduce((total, group) => total + group.lineCount, 0),
  }));
};

const formatJson = (report: CloneSiftReport, display: (filePath: string) => string): string => {
  const cloneReports = buildCloneReports(report.groups);
  const payload = {
    cloneReports: cloneReports.map(pair => ({
      fileA: display(pair.fileA),
      fileB: display(pair.fileB),
      totalClonedLines: pair.totalClonedLines,
      groups: pair.groups.map(group => ({
        linesA: [group.occurrenceA.lineRange.start, group.occurrenceA.lineRange.end],
        linesB: [group.occurrenceB.lineRange.start, group.occurrenceB.lineRange.end],
        tokensA: [group.occurrenceA.tokenRange.start, group.occurrenceA.tokenRange.end],
        tokensB: [group.occurrenceB.tokenRange.start, group.occurrenceB.tokenRange.end],
        lineCount: group.lineCount,
        tokenCount: group.tokenCount,
        similarity: group.similarity,
        cloneType: group.cloneType,
      })),
    })),
    totalPairs: cloneReports.length,
    totalGroups: report.groups.length,
    normalize: report.normalize,
    suppressed: report.suppressed,
    skippedFiles: report.skippedFiles.map(skipped => ({ ...skipped, filePath: display(skipped.filePath) })),
    stats: report.stats,
  };

  return JSON.stringify(payload, null, 2);
};

const formatText = (report: CloneSiftReport, display: (filePath: string) => string, useColor: boolean): string => {
  const cc = (text: string, code: string): string => (useColor ? `${code}${text}${A.reset}` : text);
  const cloneReports = buildCloneReports(report.groups);
  const lines: string[] = [];

  if (cloneReports.length === 0) {
    lines.push(cc('No clones detected.', A.green));
  } else {
    lines.push(`Found potential clones in ${cloneReports.length} file pair(s):`, '');

    for (const pair of cloneReports) {
      lines.push(`  ${cc(display(pair.fileA), A.cyan)}  <->  ${cc(display(pair.fileB), A.cyan)}`);

      for (const group of pair.groups) {
        const a = group.occurrenceA.lineRange;
        const b = group.occurrenceB.lineRange;

        lines.push(
          `    Lines ${a.start}-${a.end} <-> Lines ${b.start}-${b.end} ` +
            `(${group.lineCount} lines, ${group.tokenCount} tokens, ${formatSimilarity(group.similarity)} similar)`,
        );
      }

      lines.push(`    Total cloned lines: ${pair.totalClonedLines}`, '');
    }
  }

  const summary = renderTable(
    [
      ['Files', 'Pairs', 'Groups', 'Suppressed (rule)', 'Suppressed (family)', 'Skipped', 'Time'],
      [
        formatNumber(report.stats.filesScanned),
        formatNumber(cloneReports.length),
        formatNumber(report.groups.length),
        formatNumber(report.suppressed.byRule),
        formatNumber(report.suppressed.byFamily),
        formatNumber(report.skippedFiles.length),
        formatDuration(sumTimingsMs(report.timings)),
      ],
    ],
    {
      drawVerticalLine: () => false,
      drawHorizontalLine: () => true,
      columnDefault: { alignment: 'right', paddingLeft: 1, paddingRight: 1 },
    },
  );

  lines.push(cc(THIN, A.dim), ...summary.trimEnd().split('\n').map(line => `  ${line}`));

  if (report.skippedFiles.length > 0) {
    lines.push('', cc(`Skipped ${report.skippedFiles.length} file(s):`, `${A.bold}${A.yellow}`));

    for (const skipped of report.skippedFiles) {
      lines.push(`  ${display(skipped.filePath)}: ${skipped.reason} (${skipped.message})`);
    }
  }

  return lines.join('\n');
};

const formatReport = (report: CloneSiftReport, format: OutputFormat, options: FormatReportOptions = {}): string => {
  const rootAbs = options.rootAbs;
  const display = (filePath: string): string => {
    if (rootAbs === undefined) {
      return filePath;
    }

    const relative = path.relative(rootAbs, filePath);

    return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative) ? relative : filePath;
  };

  if (format === 'json') {
    return formatJson(report, display);
  }

  return formatText(report, display, options.color ?? isStdoutTty());
};

export { formatReport };
