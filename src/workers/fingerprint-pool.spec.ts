import * as path from 'node:path';
import { readFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { FingerprintEnvironment, FingerprintTask } from '../engine/file-fingerprinter';
import type { FingerprintWorkerPort } from './fingerprint-pool';

import {
  createRecordingLogger,
  createTempProject,
  makePythonBlock,
  writeText,
  type TempProject,
} from '../../test/integration/shared/test-kit';
import { fingerprintTask } from '../engine/file-fingerprinter';
import { createTokenHasher } from '../engine/hasher';
import { createDefaultLexerRegistry } from '../infrastructure/lexers/lexer-registry';
import { runFingerprintPool } from './fingerprint-pool';

const SETTINGS = { k: 5, window: 4, level: 0 } as const;

const SOURCES: Record<string, string> = {
  '/virtual/a.py': makePythonBlock('p', 8),
  '/virtual/b.py': makePythonBlock('q', 8),
  '/virtual/c.py': makePythonBlock('p', 8),
  '/virtual/d.py': makePythonBlock('r', 8),
};

const environment: FingerprintEnvironment = {
  readSource: async filePath => {
    const text = SOURCES[filePath];

    if (text === undefined) {
      throw new Error(`ENOENT: ${filePath}`);
    }

    return text;
  },
  lexers: createDefaultLexerRegistry(),
  params: { ...SETTINGS, hashToken: createTokenHasher() },
};

const TASKS: FingerprintTask[] = Object.keys(SOURCES).map((filePath, fileId) => ({ fileId, filePath }));

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Answers like a healthy worker thread would, slower for lower file ids. */
const createInProcessPort = (): FingerprintWorkerPort & { readonly calls: FingerprintTask[] } => {
  const calls: FingerprintTask[] = [];

  return {
    calls,
    request: async task => {
      calls.push(task);
      await sleep((TASKS.length - task.fileId) * 3);

      return fingerprintTask(task, environment);
    },
    terminate: vi.fn(async () => undefined),
  };
};

describe('runFingerprintPool', () => {
  it('should store results by task position whatever order workers finish in', async () => {
    // Arrange
    const logger = createRecordingLogger();
    const ports = [createInProcessPort(), createInProcessPort()];
    let spawned = 0;
    const spawn = (): FingerprintWorkerPort => {
      const port = ports[spawned];

      spawned += 1;

      if (port === undefined) {
        throw new Error('too many spawns');
      }

      return port;
    };

    // Act
    const results = await runFingerprintPool(TASKS, { size: 2, settings: SETTINGS, logger, fallback: environment, spawn });

    // Assert
    expect(results.map(result => result?.fileId)).toEqual([0, 1, 2, 3]);
    expect(results.every(result => result?.ok === true)).toBe(true);
    expect(ports.flatMap(port => port.calls).length).toBe(4);
    expect(ports.every(port => vi.mocked(port.terminate).mock.calls.length === 1)).toBe(true);
    expect(logger.entries).toContainEqual({ level: 'debug', message: 'Spawned 2 fingerprint workers for 4 files', fields: undefined });
  });

  it('should not start more workers than there are files', async () => {
    // Arrange
    const spawn = vi.fn(() => createInProcessPort());

    // Act
    await runFingerprintPool(TASKS.slice(0, 2), {
      size: 8,
      settings: SETTINGS,
      logger: createRecordingLogger(),
      fallback: environment,
      spawn,
    });

    // Assert
    expect(spawn).toHaveBeenCalledTimes(2);
  });

  it('should finish in process after a reply for another file', async () => {
    // Arrange
    const logger = createRecordingLogger();
    const port: FingerprintWorkerPort = {
      request: vi.fn(async () => fingerprintTask({ fileId: 9, filePath: '/virtual/a.py' }, environment)),
      terminate: vi.fn(async () => undefined),
    };

    // Act
    const results = await runFingerprintPool(TASKS, { size: 1, settings: SETTINGS, logger, fallback: environment, spawn: () => port });

    // Assert
    expect(port.request).toHaveBeenCalledTimes(1);
    expect(results).toEqual(await Promise.all(TASKS.map(task => fingerprintTask(task, environment))));
    expect(logger.entries.filter(entry => entry.level === 'warn')).toEqual([
      {
        level: 'warn',
        message: 'Fingerprint worker failed, continuing in process',
        fields: { worker: 0, file: '/virtual/a.py', detail: 'reply does not match the request' },
      },
    ]);
  });

  it('should finish in process after a worker crash', async () => {
    // Arrange
    const logger = createRecordingLogger();
    const port: FingerprintWorkerPort = {
      request: vi.fn(async () => {
        throw new Error('Fingerprint worker exited with code 1');
      }),
      terminate: vi.fn(async () => undefined),
    };

    // Act
    const results = await runFingerprintPool(TASKS, { size: 1, settings: SETTINGS, logger, fallback: environment, spawn: () => port });

    // Assert
    expect(results.map(result => result?.ok)).toEqual([true, true, true, true]);
    expect(port.terminate).toHaveBeenCalledTimes(1);
    expect(logger.entries).toContainEqual({
      level: 'warn',
      message: 'Fingerprint worker failed, continuing in process',
      fields: { worker: 0, file: '/virtual/a.py', detail: 'Fingerprint worker exited with code 1' },
    });
  });

  it('should run every task in process when no worker starts', async () => {
    // Arrange
    const logger = createRecordingLogger();
    const spawn = (): FingerprintWorkerPort => {
      throw new Error('no threads');
    };

    // Act
    const results = await runFingerprintPool(TASKS.slice(0, 2), { size: 2, settings: SETTINGS, logger, fallback: environment, spawn });

    // Assert
    expect(results.map(result => result?.fileId)).toEqual([0, 1]);
    expect(logger.entries.filter(entry => entry.level === 'warn')).toEqual([
      { level: 'warn', message: 'Could not start a fingerprint worker', fields: { worker: 0, detail: 'no threads' } },
      { level: 'warn', message: 'Could not start a fingerprint worker', fields: { worker: 1, detail: 'no threads' } },
    ]);
    expect(logger.entries).toContainEqual({ level: 'debug', message: 'Spawned 0 fingerprint workers for 2 files', fields: undefined });
  });
});

describe('spawnFingerprintWorker', () => {
  let project: TempProject;

  beforeEach(async () => {
    project = await createTempProject('clonesift-workers');
  });

  afterEach(async () => {
    await project.dispose();
  });

  it('should give the same results as fingerprinting in this thread', async () => {
    // Arrange
    const sources: Array<[string, string]> = [
      ['one.py', makePythonBlock('p', 10)],
      ['two.py', makePythonBlock('q', 10)],
      ['three.py', 'x = (\n'],
    ];

    for (const [name, text] of sources) {
      await writeText(path.join(project.rootAbs, name), text);
    }

    const tasks = sources.map(([name], fileId) => ({ fileId, filePath: path.join(project.rootAbs, name) }));
    const local: FingerprintEnvironment = { ...environment, readSource: filePath => readFile(filePath, 'utf8') };

    // Act
    const results = await runFingerprintPool(tasks, { size: 2, settings: SETTINGS, logger: createRecordingLogger(), fallback: local });

    // Assert
    expect(results).toEqual(await Promise.all(tasks.map(task => fingerprintTask(task, local))));
  }, 20_000);
});
