import * as z from 'zod';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

const OUTPUT_FORMATS = ['text', 'json'] as const;

type CloneSiftLogLevel = (typeof LOG_LEVELS)[number];

type CloneSiftOutputFormat = (typeof OUTPUT_FORMATS)[number];

interface CloneSiftDetectionConfig {
  readonly k?: number | undefined;
  readonly window?: number | undefined;
  readonly minTokens?: number | undefined;
  readonly normalize?: 0 | 1 | 2 | undefined;
  readonly gapTolerance?: number | undefined;
}

interface CloneSiftSuppressionConfig {
  readonly patterns?: ReadonlyArray<string> | undefined;
  readonly minFamilySize?: number | undefined;
}

interface CloneSiftDiscoveryConfig {
  readonly ignore?: ReadonlyArray<string> | undefined;
  readonly languages?: ReadonlyArray<string> | undefined;
}

interface CloneSiftOutputConfig {
  readonly format?: CloneSiftOutputFormat | undefined;
  readonly exitOnFindings?: boolean | undefined;
}

interface CloneSiftLoggingConfig {
  readonly level?: CloneSiftLogLevel | undefined;
}

interface CloneSiftConfig {
  readonly $schema?: string | undefined;
  readonly detection?: CloneSiftDetectionConfig | undefined;
  readonly suppression?: CloneSiftSuppressionConfig | undefined;
  readonly discovery?: CloneSiftDiscoveryConfig | undefined;
  readonly output?: CloneSiftOutputConfig | undefined;
  readonly logging?: CloneSiftLoggingConfig | undefined;
}

const positiveInt = () => z.number().int().positive();

const CloneSiftConfigSchema: z.ZodType<CloneSiftConfig> = z
  .object({
    $schema: z.string().optional(),
    detection: z
      .object({
        k: positiveInt().optional(),
        window: positiveInt().optional(),
        minTokens: positiveInt().optional(),
        normalize: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
        gapTolerance: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    suppression: z
      .object({
        patterns: z.array(z.string().min(1)).optional(),
        minFamilySize: z.number().int().min(2).optional(),
      })
      .strict()
      .optional(),
    discovery: z
      .object({
        ignore: z.array(z.string().min(1)).optional(),
        languages: z.array(z.string().min(1)).nonempty().optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        format: z.enum(OUTPUT_FORMATS).optional(),
        exitOnFindings: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type {
  CloneSiftConfig,
  CloneSiftDetectionConfig,
  CloneSiftDiscoveryConfig,
  CloneSiftLoggingConfig,
  CloneSiftLogLevel,
  CloneSiftOutputConfig,
  CloneSiftOutputFormat,
  CloneSiftSuppressionConfig,
};
export { CloneSiftConfigSchema, LOG_LEVELS, OUTPUT_FORMATS };
