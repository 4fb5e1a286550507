import type { CloneSiftLogLevel } from '../clonesift-config';

export type CloneSiftLogFields = Record<string, string | number | boolean | null | undefined>;

export interface CloneSiftLogger {
  readonly level: CloneSiftLogLevel;

  log(level: CloneSiftLogLevel, message: string, fields?: CloneSiftLogFields, error?: unknown): void;

  error(message: string, fields?: CloneSiftLogFields, error?: unknown): void;
  warn(message: string, fields?: CloneSiftLogFields, error?: unknown): void;
  info(message: string, fields?: CloneSiftLogFields, error?: unknown): void;
  debug(message: string, fields?: CloneSiftLogFields, error?: unknown): void;
  trace(message: string, fields?: CloneSiftLogFields, error?: unknown): void;
}

/** Receives only the entries that pass the logger's level. */
export type CloneSiftLogSink = (
  level: CloneSiftLogLevel,
  message: string,
  fields: CloneSiftLogFields | undefined,
  error: unknown,
) => void;

const LEVEL_RANK: Record<CloneSiftLogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export const isLogLevelEnabled = (threshold: CloneSiftLogLevel, level: CloneSiftLogLevel): boolean => {
  return LEVEL_RANK[level] <= LEVEL_RANK[threshold];
};

const bindLevels = (
  level: CloneSiftLogLevel,
  log: (level: CloneSiftLogLevel, message: string, fields?: CloneSiftLogFields, error?: unknown) => void,
): CloneSiftLogger => ({
  level,
  log,
  error: (message, fields, error) => log('error', message, fields, error),
  warn: (message, fields, error) => log('warn', message, fields, error),
  info: (message, fields, error) => log('info', message, fields, error),
  debug: (message, fields, error) => log('debug', message, fields, error),
  trace: (message, fields, error) => log('trace', message, fields, error),
});

export const createCloneSiftLogger = (threshold: CloneSiftLogLevel, sink: CloneSiftLogSink): CloneSiftLogger => {
  return bindLevels(threshold, (level, message, fields, error) => {
    if (isLogLevelEnabled(threshold, level)) {
      sink(level, message, fields, error);
    }
  });
};

export const createNoopLogger = (level: CloneSiftLogLevel = 'error'): CloneSiftLogger => {
  return createCloneSiftLogger(level, () => undefined);
};

/** Stamps `base` onto every entry; an entry's own fields win on a shared key. */
export const withLogFields = (logger: CloneSiftLogger, base: CloneSiftLogFields): CloneSiftLogger => {
  return bindLevels(logger.level, (level, message, fields, error) => {
    logger.log(level, message, { ...base, ...fields }, error);
  });
};
