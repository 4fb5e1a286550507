/**
 * Public API surface for integration tests.
 *
 * Test files under `test/integration/` import through this barrel, never via
 * internal `src/` paths, so internal moves do not ripple into the tests.
 *
 * @module test-api
 */

// ---------------------------------------------------------------------------
// Application: scan
// ---------------------------------------------------------------------------
export { scanUseCase, detectClones } from './application/scan/scan.usecase';

// ---------------------------------------------------------------------------
// Adapters: CLI
// ---------------------------------------------------------------------------
export { runCli, EXIT_CLEAN, EXIT_FATAL, EXIT_FINDINGS } from './adapters/cli/entry';

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------
export { formatReport } from './report';

// ---------------------------------------------------------------------------
// Lexers
// ---------------------------------------------------------------------------
export { createDefaultLexerRegistry } from './infrastructure/lexers/lexer-registry';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------
export type { ScanOptions } from './interfaces';
export type { CloneSiftReport, NormalizationLevel, ReportedCloneGroup } from './types';
export { createCloneSiftLogger, type CloneSiftLogFields, type CloneSiftLogger } from './ports/logger';
export type { CloneSiftLogLevel } from './clonesift-config';
