import type { CloneSiftLogLevel } from '../../clonesift-config';
import type { CloneSiftLogFields, CloneSiftLogger } from '../../ports/logger';

import { createCloneSiftLogger } from '../../ports/logger';

export interface PrettyConsoleLoggerOptions {
  readonly level: CloneSiftLogLevel;
  readonly includeStack?: boolean;
  readonly useColor?: boolean;
}

const isTty = (): boolean => {
  return Boolean(process.stderr.isTTY) && process.env['NO_COLOR'] === undefined;
};

interface LevelStyle {
  readonly emoji: string;
  readonly color: string;
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m',
} as const;

const c = (text: string, color: string, enabled: boolean): string => {
  if (!enabled) {
    return text;
  }

  return `${color}${text}${ANSI.reset}`;
};

const levelStyle = (level: CloneSiftLogLevel): LevelStyle => {
  switch (level) {
    case 'error':
      return { emoji: '✖', color: ANSI.red };
    case 'warn':
      return { emoji: '▲', color: ANSI.yellow };
    case 'info':
      return { emoji: '●', color: ANSI.cyan };
    case 'debug':
      return { emoji: '◆', color: ANSI.magenta };
    case 'trace':
      return { emoji: '·', color: ANSI.gray };
  }
};

const formatDuration = (ms: number): string => {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  return `${(ms / 1000).toFixed(2)}s`;
};

const formatFields = (fields: CloneSiftLogFields | undefined, useColor: boolean): string => {
  if (!fields) {
    return '';
  }

  const parts: string[] = [];

  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }

    if (key === 'durationMs' && typeof value === 'number') {
      parts.push(c(formatDuration(value), ANSI.dim, useColor));
    } else {
      parts.push(c(`${key}=${String(value)}`, ANSI.dim, useColor));
    }
  }

  if (parts.length === 0) {
    return '';
  }

  return ` ${parts.join(' ')}`;
};

export const createPrettyConsoleLogger = (options: PrettyConsoleLoggerOptions): CloneSiftLogger => {
  const useColor = options.useColor ?? isTty();
  const threshold = options.level;
  const includeStack = options.includeStack ?? false;

  return createCloneSiftLogger(threshold, (level, message, fields, error) => {
    const style = levelStyle(level);
    const dot = c(style.emoji, style.color, useColor);
    const msg = level === 'error' || level === 'warn' ? c(message, style.color, useColor) : message;
    let line = `  ${dot}  ${msg}${formatFields(fields, useColor)}`;

    if (error instanceof Error) {
      line += includeStack && error.stack ? `\n${c(error.stack, ANSI.dim, useColor)}` : c(` (${error.message})`, ANSI.dim, useColor);
    }

    console.error(line);
  });
};
