import { readFileSync } from 'node:fs';
import * as z from 'zod';

const DelimitedSchema = z
  .object({
    open: z.string().min(1),
    close: z.string().min(1),
  })
  .strict();

const StringDelimiterSchema = z
  .object({
    open: z.string().min(1),
    close: z.string().min(1),
    multiline: z.boolean().default(false),
    escape: z.string().length(1).optional(),
    /** Body is one character or one escape sequence; otherwise the opener is an ordinary token (Rust lifetimes). */
    singleChar: z.boolean().default(false),
  })
  .strict();

const LanguageSpecSchema = z
  .object({
    id: z.string().regex(/^[a-z][a-z0-9+#-]*$/),
    aliases: z.array(z.string().min(1)).default([]),
    extensions: z.array(z.string().regex(/^\.[a-z0-9+_-]+$/)).min(1),
    lineComments: z.array(z.string().min(1)).default([]),
    blockComments: z.array(DelimitedSchema).default([]),
    strings: z.array(StringDelimiterSchema).default([]),
    keywords: z.array(z.string().min(1)).default([]),
    literalWords: z.array(z.string().min(1)).default([]),
    caseInsensitiveKeywords: z.boolean().default(false),
    identifierChars: z.string().default(''),
  })
  .strict();

const LanguageTableSchema = z
  .object({
    operators: z.array(z.string().min(2)),
    languages: z.array(LanguageSpecSchema).min(1),
  })
  .strict()
  .superRefine((table, ctx) => {
    const owners = new Map<string, string>();

    table.languages.forEach((language, index) => {
      for (const extension of language.extensions) {
        const owner = owners.get(extension);

        if (owner !== undefined) {
          ctx.addIssue({
            code: 'custom',
            path: ['languages', index, 'extensions'],
            message: `extension ${extension} is already claimed by ${owner}`,
          });
        }

        owners.set(extension, language.id);
      }
    });
  });

type LanguageSpec = z.infer<typeof LanguageSpecSchema>;
type LanguageTable = z.infer<typeof LanguageTableSchema>;

const LANGUAGE_TABLE_URL = new URL('./languages.json', import.meta.url);

let cached: LanguageTable | null = null;

export const parseLanguageTable = (raw: unknown): LanguageTable => {
  const validated = LanguageTableSchema.safeParse(raw);

  if (!validated.success) {
    throw new Error(`[clonesift] Invalid language table\n${validated.error.message}`);
  }

  return validated.data;
};

/** Reads and validates the bundled language table once per process. */
export const loadLanguageTable = (): LanguageTable => {
  if (cached === null) {
    const parsed: unknown = JSON.parse(readFileSync(LANGUAGE_TABLE_URL, 'utf8'));

    cached = parseLanguageTable(parsed);
  }

  return cached;
};

export type { LanguageSpec, LanguageTable };
