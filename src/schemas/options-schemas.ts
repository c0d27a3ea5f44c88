import { z } from 'zod';
import type { Tokenizer } from '../chunking/types';

export const UNIT_SCHEMA = z.enum(['char', 'word', 'token']);

export const KEEP_SIDE_SCHEMA = z.enum(['preceding', 'following']);

// Size budget; overlap must leave room for new content in every chunk
export const CHUNK_SIZE_SCHEMA = z.object({
  maxChunkSize: z.number().int().positive(),
  overlapSize: z.number().int().nonnegative(),
}).refine((size) => size.overlapSize < size.maxChunkSize, {
  message: 'overlapSize must be smaller than maxChunkSize',
  path: ['overlapSize'],
});

// Options shared by runtime calls and profile files
export const CHUNK_OPTION_FIELDS = {
  unit: UNIT_SCHEMA.optional(),
  markdownAware: z.boolean().default(false),
  regexPattern: z.union([z.string(), z.instanceof(RegExp)]).optional(),
  regexKeep: KEEP_SIDE_SCHEMA.default('following'),
  sentenceAbbreviations: z.array(z.string().min(1)).optional(),
  splitOversizedFences: z.boolean().default(false),
  semanticWindow: z.number().int().positive().default(2),
  topicShiftThreshold: z.number().min(0).max(1).default(0.8),
};

// ConfigMap accepted by chunk(); unknown keys are rejected
export const CHUNK_OPTIONS_SCHEMA = z.object({
  ...CHUNK_OPTION_FIELDS,
  tokenizer: z.custom<Tokenizer>((value) => typeof value === 'function', {
    message: 'tokenizer must be a function',
  }).optional(),
}).strict();

// Inferred types
export type ValidatedChunkOptions = z.infer<typeof CHUNK_OPTIONS_SCHEMA>;
export type ChunkSize = z.infer<typeof CHUNK_SIZE_SCHEMA>;
