import { z } from 'zod'

export const CHECKPOINT_FORMAT_VERSION = 1

export const VersionRecordSchema = z.object({
  version: z.string(),
  publishedAt: z.string(),
  description: z.string(),
  author: z.string(),
  dependencies: z.number().int().nonnegative(),
})

export const ResolvedResultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('found'),
    versions: z.array(VersionRecordSchema),
  }),
  z.object({
    status: z.literal('failed'),
    error: z.string(),
  }),
])

export const CheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_FORMAT_VERSION),
  packages: z.array(z.string()),
  scanned: z.array(z.string()),
  results: z.record(
    z.string(), // Package name
    ResolvedResultSchema,
  ),
  updatedAt: z.string(),
})

export type Checkpoint = z.infer<typeof CheckpointSchema>
