export class UnlexableFileError extends Error {
  public readonly filePath: string;
  public readonly reason: string;

  public constructor(filePath: string, reason: string) {
    super(`Cannot tokenize ${filePath}: ${reason}`);
    this.name = 'UnlexableFileError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

export class UnsupportedTokenKindError extends Error {
  public readonly filePath: string;
  public readonly kind: string;
  public readonly line: number;
  public readonly column: number;

  public constructor(params: { filePath: string; kind: string; line: number; column: number }) {
    super(`Unsupported token kind '${params.kind}' at ${params.filePath}:${params.line}:${params.column}`);
    this.name = 'UnsupportedTokenKindError';
    this.filePath = params.filePath;
    this.kind = params.kind;
    this.line = params.line;
    this.column = params.column;
  }
}

export class InvalidSuppressionPatternError extends Error {
  public readonly pattern: string;
  public readonly reason: string;

  public constructor(pattern: string, reason: string) {
    super(`[clonesift] Invalid suppression pattern ${JSON.stringify(pattern)}: ${reason}`);
    this.name = 'InvalidSuppressionPatternError';
    this.pattern = pattern;
    this.reason = reason;
  }
}

export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
