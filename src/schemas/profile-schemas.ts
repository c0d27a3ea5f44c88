import { z } from 'zod';
import { CHUNK_OPTION_FIELDS } from './options-schemas';

// A named chunking profile; tokenizers are supplied at run time
export const PROFILE_SCHEMA = z.object({
  strategy: z.string().min(1),
  maxChunkSize: z.number().int().positive(),
  overlapSize: z.number().int().nonnegative().default(0),
  description: z.string().optional(),
  ...CHUNK_OPTION_FIELDS,
  regexPattern: z.string().min(1).optional(),
}).strict();

export const PROFILE_FILE_SCHEMA = z.object({
  profiles: z.record(z.string(), PROFILE_SCHEMA),
});

// Inferred types
export type ChunkingProfile = z.infer<typeof PROFILE_SCHEMA>;
export type ProfileFile = z.infer<typeof PROFILE_FILE_SCHEMA>;
