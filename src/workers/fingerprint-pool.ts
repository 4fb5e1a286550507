import { Worker } from 'node:worker_threads';

import type { CloneSiftLogger } from '../ports/logger';
import type { FingerprintRequest, FingerprintWorkerSettings } from './fingerprint-protocol';

import {
  fingerprintTask,
  isFingerprintTaskResult,
  type FingerprintEnvironment,
  type FingerprintTask,
  type FingerprintTaskResult,
} from '../engine/file-fingerprinter';
import { withLogFields } from '../ports/logger';
import { FingerprintReplySchema } from './fingerprint-protocol';

/** One worker thread as the pool sees it: request in, unchecked reply out. */
export interface FingerprintWorkerPort {
  request(task: FingerprintTask): Promise<unknown>;
  terminate(): Promise<void>;
}

export interface FingerprintPoolOptions {
  readonly size: number;
  readonly settings: FingerprintWorkerSettings;
  readonly logger: CloneSiftLogger;
  /** Runs tasks in this thread once a worker has failed. */
  readonly fallback: FingerprintEnvironment;
  readonly spawn?: (settings: FingerprintWorkerSettings) => FingerprintWorkerPort;
}

const WORKER_URL = new URL('./fingerprint-worker.ts', import.meta.url);

/** Workers load TypeScript sources; preload tsx unless the host already did. */
const workerExecArgv = (): string[] => {
  return process.execArgv.some(arg => arg.includes('tsx')) ? [...process.execArgv] : [...process.execArgv, '--import', 'tsx'];
};

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

export const spawnFingerprintWorker = (settings: FingerprintWorkerSettings): FingerprintWorkerPort => {
  const worker = new Worker(WORKER_URL, { workerData: settings, execArgv: workerExecArgv() });
  const pending = new Map<number, { resolve: (value: unknown) => void; reject: (error: Error) => void }>();
  let failure: Error | null = null;
  let nextRequestId = 1;

  const failAll = (error: Error): void => {
    failure ??= error;

    for (const entry of pending.values()) {
      entry.reject(error);
    }

    pending.clear();
  };

  worker.on('message', (data: unknown) => {
    const reply = FingerprintReplySchema.safeParse(data);

    if (!reply.success) {
      failAll(new Error(`Malformed fingerprint worker reply: ${reply.error.message}`));

      return;
    }

    const entry = pending.get(reply.data.requestId);

    if (entry === undefined) {
      return;
    }

    pending.delete(reply.data.requestId);

    if (reply.data.error !== undefined) {
      entry.reject(new Error(reply.data.error));
    } else {
      entry.resolve(reply.data.result);
    }
  });
  worker.on('error', (error: unknown) => failAll(toError(error)));
  worker.on('exit', (code: number) => failAll(new Error(`Fingerprint worker exited with code ${code}`)));

  return {
    request: task => {
      if (failure !== null) {
        return Promise.reject(failure);
      }

      const requestId = nextRequestId;

      nextRequestId += 1;

      return new Promise<unknown>((resolve, reject) => {
        const payload: FingerprintRequest = { requestId, fileId: task.fileId, filePath: task.filePath };

        pending.set(requestId, { resolve, reject });
        worker.postMessage(payload);
      });
    },
    terminate: async () => {
      await worker.terminate();
    },
  };
};

/**
 * Fingerprints `tasks` on up to `size` worker threads. Results are stored by
 * task position, so completion order never leaks into the output. A worker that
 * fails to start, crashes or answers out of protocol is retired and its runner
 * finishes the remaining tasks in this thread.
 */
export const runFingerprintPool = async (
  tasks: ReadonlyArray<FingerprintTask>,
  options: FingerprintPoolOptions,
): Promise<Array<FingerprintTaskResult | undefined>> => {
  const results = new Array<FingerprintTaskResult | undefined>(tasks.length);
  const size = Math.max(1, Math.min(Math.floor(options.size), tasks.length));
  const spawn = options.spawn ?? spawnFingerprintWorker;
  const ports: FingerprintWorkerPort[] = [];
  let cursor = 0;

  const runner = async (port: FingerprintWorkerPort | null, slot: number): Promise<void> => {
    const logger = withLogFields(options.logger, { worker: slot });
    let healthy = port !== null;

    while (true) {
      const index = cursor;

      cursor += 1;

      const task = tasks[index];

      if (task === undefined) {
        return;
      }

      if (healthy && port !== null) {
        try {
          const reply = await port.request(task);

          if (isFingerprintTaskResult(reply) && reply.fileId === task.fileId) {
            results[index] = reply;

            continue;
          }

          throw new Error('reply does not match the request');
        } catch (error) {
          healthy = false;

          logger.warn('Fingerprint worker failed, continuing in process', {
            file: task.filePath,
            detail: toError(error).message,
          });
        }
      }

      results[index] = await fingerprintTask(task, options.fallback);
    }
  };

  try {
    const slots: Array<FingerprintWorkerPort | null> = [];

    for (let i = 0; i < size; i += 1) {
      try {
        const port = spawn(options.settings);

        ports.push(port);
        slots.push(port);
      } catch (error) {
        options.logger.warn('Could not start a fingerprint worker', { worker: i, detail: toError(error).message });
        slots.push(null);
      }
    }

    options.logger.debug(`Spawned ${ports.length} fingerprint workers for ${tasks.length} files`);

    await Promise.all(slots.map((port, slot) => runner(port, slot)));
  } finally {
    await Promise.all(ports.map(port => port.terminate()));
  }

  return results;
};
