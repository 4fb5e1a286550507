import { describe, expect, it } from 'vitest';

import type { CloneSiftReport, ReportedCloneGroup } from './types';

import { buildCloneReports, formatReport } from './report';

const ROOT = '/work/proj';

const group = (
  fileA: [number, string],
  fileB: [number, string],
  linesA: [number, number],
  linesB: [number, number],
  similarity = 1,
): ReportedCloneGroup => ({
  occurrenceA: {
    fileId: fileA[0],
    filePath: `${ROOT}/${fileA[1]}`,
    tokenRange: { start: 10, end: 70 },
    lineRange: { start: linesA[0], end: linesA[1] },
  },
  occurrenceB: {
    fileId: fileB[0],
    filePath: `${ROOT}/${fileB[1]}`,
    tokenRange: { start: 0, end: 60 },
    lineRange: { start: linesB[0], end: linesB[1] },
  },
  tokenCount: 60,
  lineCount: Math.max(linesA[1] - linesA[0] + 1, linesB[1] - linesB[0] + 1),
  similarity,
  cloneType: similarity >= 1 ? 'type-1' : 'type-2',
});

const reportOf = (groups: ReportedCloneGroup[], overrides: Partial<CloneSiftReport> = {}): CloneSiftReport => ({
  normalize: 1,
  groups,
  suppressed: { byRule: 2, byFamily: 1 },
  skippedFiles: [],
  stats: { filesScanned: 3, filesFingerprinted: 3, fingerprints: 120, collisionBuckets: 4 },
  timings: { fingerprint: 12, assemble: 3 },
  ...overrides,
});

describe('buildCloneReports', () => {
  it('should bucket groups per file pair and total their lines', () => {
    // Arrange
    const groups = [
      group([0, 'a.py'], [1, 'b.py'], [3, 10], [5, 12]),
      group([0, 'a.py'], [1, 'b.py'], [20, 23], [30, 33]),
      group([0, 'a.py'], [2, 'c.py'], [3, 10], [1, 8]),
    ];

    // Act
    const reports = buildCloneReports(groups);

    // Assert
    expect(reports.map(report => [report.fileA, report.fileB, report.groups.length, report.totalClonedLines])).toEqual([
      [`${ROOT}/a.py`, `${ROOT}/b.py`, 2, 12],
      [`${ROOT}/a.py`, `${ROOT}/c.py`, 1, 8],
    ]);
  });
});

describe('formatReport', () => {
  it('should print each pair and group with paths relative to the root', () => {
    // Arrange
    const report = reportOf([group([0, 'a.py'], [1, 'lib/b.py'], [3, 10], [5, 12], 0.75)]);

    // Act
    const lines = formatReport(report, 'text', { rootAbs: ROOT, color: false }).split('\n');

    // Assert
    expect(lines.slice(0, 6)).toEqual([
      'Found potential clones in 1 file pair(s):',
      '',
      '  a.py  <->  lib/b.py',
      '    Lines 3-10 <-> Lines 5-12 (8 lines, 60 tokens, 75% similar)',
      '    Total cloned lines: 8',
      '',
    ]);
    expect(lines[6]).toBe('┄'.repeat(60));
  });

  it('should never round a near-identical clone up to 100%', () => {
    // Arrange
    const report = reportOf([group([0, 'a.py'], [1, 'b.py'], [1, 4], [1, 4], 0.999)]);

    // Act
    const text = formatReport(report, 'text', { color: false });

    // Assert
    expect(text).toContain('(4 lines, 60 tokens, 99% similar)');
  });

  it('should say so when there are no clones', () => {
    // Arrange & Act
    const lines = formatReport(reportOf([]), 'text', { color: false }).split('\n');

    // Assert
    expect(lines[0]).toBe('No clones detected.');
  });

  it('should summarise counts in a table', () => {
    // Arrange & Act
    const text = formatReport(reportOf([]), 'text', { color: false });

    // Assert
    const headerRow = text.split('\n').find(line => line.includes('Files'));
    const valueRow = text.split('\n').find(line => line.includes('15ms'));

    expect(headerRow?.split(/\s+/).filter(cell => cell.length > 0)).toEqual([
      'Files',
      'Pairs',
      'Groups',
      'Suppressed',
      '(rule)',
      'Suppressed',
      '(family)',
      'Skipped',
      'Time',
    ]);
    expect(valueRow?.split(/\s+/).filter(cell => cell.length > 0)).toEqual(['3', '0', '0', '2', '1', '0', '15ms']);
  });

  it('should list skipped files with their reason', () => {
    // Arrange
    const report = reportOf([], {
      skippedFiles: [{ filePath: `${ROOT}/bad.py`, reason: 'unlexable', message: 'Unterminated string """ at 2:0' }],
    });

    // Act
    const lines = formatReport(report, 'text', { rootAbs: ROOT, color: false }).split('\n');

    // Assert
    expect(lines.slice(-2)).toEqual(['Skipped 1 file(s):', '  bad.py: unlexable (Unterminated string """ at 2:0)']);
  });

  it('should colour pair paths when colour is on', () => {
    // Arrange
    const report = reportOf([group([0, 'a.py'], [1, 'b.py'], [1, 4], [1, 4])]);

    // Act
    const lines = formatReport(report, 'text', { rootAbs: ROOT, color: true }).split('\n');

    // Assert
    expect(lines[2]).toBe('  \x1b[36ma.py\x1b[0m  <->  \x1b[36mb.py\x1b[0m');
  });

  it('should keep paths outside the root absolute', () => {
    // Arrange
    const report = reportOf([group([0, 'a.py'], [1, 'b.py'], [1, 4], [1, 4])]);

    // Act
    const lines = formatReport(report, 'text', { rootAbs: '/elsewhere', color: false }).split('\n');

    // Assert
    expect(lines[2]).toBe(`  ${ROOT}/a.py  <->  ${ROOT}/b.py`);
  });

  it('should emit the JSON document', () => {
    // Arrange
    const report = reportOf([group([0, 'a.py'], [1, 'b.py'], [3, 10], [5, 12], 0.75)], {
      skippedFiles: [{ filePath: `${ROOT}/bad.py`, reason: 'unsupported-token-kind', message: 'odd' }],
    });

    // Act
    const parsed: unknown = JSON.parse(formatReport(report, 'json', { rootAbs: ROOT }));

    // Assert
    expect(parsed).toEqual({
      cloneReports: [
        {
          fileA: 'a.py',
          fileB: 'b.py',
          totalClonedLines: 8,
          groups: [
            {
              linesA: [3, 10],
              linesB: [5, 12],
              tokensA: [10, 70],
              tokensB: [0, 60],
              lineCount: 8,
              tokenCount: 60,
              similarity: 0.75,
              cloneType: 'type-2',
            },
          ],
        },
      ],
      totalPairs: 1,
      totalGroups: 1,
      normalize: 1,
      suppressed: { byRule: 2, byFamily: 1 },
      skippedFiles: [{ filePath: 'bad.py', reason: 'unsupported-token-kind', message: 'odd' }],
      stats: { filesScanned: 3, filesFingerprinted: 3, fingerprints: 120, collisionBuckets: 4 },
    });
  });
});
