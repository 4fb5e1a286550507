import { readFile } from 'node:fs/promises';
import { parentPort, workerData } from 'node:worker_threads';
import * as z from 'zod';

import { fingerprintTask, type FingerprintEnvironment } from '../engine/file-fingerprinter';
import { createTokenHasher } from '../engine/hasher';
import { createDefaultLexerRegistry } from '../infrastructure/lexers/lexer-registry';
import { FingerprintRequestSchema, FingerprintWorkerSettingsSchema } from './fingerprint-protocol';

const extractRequestId = (data: unknown): number => {
  const parsed = z.object({ requestId: z.number().int() }).safeParse(data);

  return parsed.success ? parsed.data.requestId : 0;
};

if (parentPort === null) {
  throw new Error('fingerprint-worker must be started as a worker thread');
}

const port = parentPort;
const settings = FingerprintWorkerSettingsSchema.parse(workerData);
const environment: FingerprintEnvironment = {
  readSource: filePath => readFile(filePath, 'utf8'),
  lexers: createDefaultLexerRegistry(),
  params: { ...settings, hashToken: createTokenHasher() },
};

port.on('message', (data: unknown) => {
  const request = FingerprintRequestSchema.safeParse(data);

  if (!request.success) {
    port.postMessage({ requestId: extractRequestId(data), error: `invalid request: ${request.error.message}` });

    return;
  }

  const { requestId, fileId, filePath } = request.data;

  void fingerprintTask({ fileId, filePath }, environment).then(
    result => port.postMessage({ requestId, result }),
    (error: unknown) => port.postMessage({ requestId, error: error instanceof Error ? error.message : String(error) }),
  );
});
