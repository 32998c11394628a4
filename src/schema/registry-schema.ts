import { z } from 'zod'

/**
 * The parts of a registry packument the scanner reads. Everything else in
 * the document is passed through untouched.
 */
export const PackageMetadataSchema = z
  .object({
    name: z.string().optional(),
    time: z.record(z.string(), z.unknown()).optional(),
    versions: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough()

export type PackageMetadata = z.infer<typeof PackageMetadataSchema>
