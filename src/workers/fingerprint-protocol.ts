import * as z from 'zod';

export const FingerprintWorkerSettingsSchema = z.object({
  k: z.number().int().min(1),
  window: z.number().int().min(1),
  level: z.union([z.literal(0), z.literal(1), z.literal(2)]),
});

export type FingerprintWorkerSettings = z.infer<typeof FingerprintWorkerSettingsSchema>;

export const FingerprintRequestSchema = z.object({
  requestId: z.number().int().min(1),
  fileId: z.number().int().min(0),
  filePath: z.string().min(1),
});

export type FingerprintRequest = z.infer<typeof FingerprintRequestSchema>;

/** Worker reply: `result` on success, `error` when the request itself failed. */
export const FingerprintReplySchema = z.object({
  requestId: z.number().int(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});
