import { z } from 'zod';
import type { VocabItem } from '../domain/vocabulary';
import type { UserStats } from '../domain/stats';
import { INITIAL_INTERVAL_SECONDS } from '../srs/intervals';
import { SchemaValidationError, validateOrThrow } from '../validation/validator';

export const STORAGE_FORMAT_VERSION = 2;

// Dates are stored as ISO strings.
const StoredDateSchema = z.coerce.date();

const StoredVersionSchema = z.number().int().min(1).max(STORAGE_FORMAT_VERSION);

// Fields added in version 2 default here when an older blob lacks them.
const StoredVocabItemSchema = z.object({
  id: z.string().min(1),
  word: z.string().min(1),
  partOfSpeech: z.string(),
  meaning: z.string(),
  meaningLocalized: z.string(),
  example: z.string(),
  originalWord: z.string(),
  context: z.string(),
  level: z.string(),
  addedAt: StoredDateSchema,
  nextReviewAt: StoredDateSchema,
  lastReviewedAt: StoredDateSchema.nullable().default(null),
  reviewIntervalSeconds: z.number().positive().default(INITIAL_INTERVAL_SECONDS),
  mastered: z.boolean(),
});

const StoredVocabBankSchema = z.union([
  z.object({ version: StoredVersionSchema, items: z.array(StoredVocabItemSchema) }),
  z.array(StoredVocabItemSchema).transform((items) => ({ version: 1, items })),
]);

const StoredStatsFieldsSchema = z.object({
  streak: z.number().int().nonnegative(),
  totalScore: z.number().nonnegative(),
  sentenceCount: z.number().int().nonnegative(),
  lastActiveDate: StoredDateSchema.nullable().default(null),
});

const StoredStatsSchema = z.union([
  z.object({ version: StoredVersionSchema, stats: StoredStatsFieldsSchema }),
  StoredStatsFieldsSchema.transform((stats) => ({ version: 1, stats })),
]);

function parseBlob(blob: Buffer): unknown {
  try {
    return JSON.parse(blob.toString('utf8'));
  } catch (error) {
    throw new SchemaValidationError([
      {
        field: '',
        message: `Blob is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        code: 'invalid_json',
      },
    ]);
  }
}

function toBlob(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value), 'utf8');
}

export function encodeVocabBank(items: readonly VocabItem[]): Buffer {
  return toBlob({ version: STORAGE_FORMAT_VERSION, items });
}

export function decodeVocabBank(blob: Buffer): VocabItem[] {
  return validateOrThrow(StoredVocabBankSchema, parseBlob(blob)).items;
}

export function encodeStats(stats: UserStats): Buffer {
  return toBlob({ version: STORAGE_FORMAT_VERSION, stats });
}

export function decodeStats(blob: Buffer): UserStats {
  return validateOrThrow(StoredStatsSchema, parseBlob(blob)).stats;
}
