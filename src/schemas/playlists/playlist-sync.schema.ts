import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import { z } from 'zod'

const ReplicaListSchema = z.array(z.string().min(1)).min(1)

export const TrackSummarySchema = z.object({
  title: z.string(),
  artist: z.string(),
  attributedReplica: z.string(),
  timestamp: z.string().nullable(),
})

export const ReplicaFailureSchema = z.object({
  replicaId: z.string(),
  phase: z.enum(['read', 'write']),
  message: z.string(),
})

export const SyncResultSchema = z.object({
  policy: z.enum([
    'incremental-capped',
    'full-replace',
    'broadcast',
    'rating-snapshot',
  ]),
  playlistName: z.string(),
  total: z.number().int(),
  added: z.number().int(),
  replicasUpdated: z.number().int(),
  tracks: z.array(TrackSummarySchema),
  failures: z.array(ReplicaFailureSchema),
})

export const RecentRavesBodySchema = z
  .object({
    playlistName: z.string().min(1).optional(),
    contributors: ReplicaListSchema.optional(),
    maxSongs: z.number().int().positive().optional(),
    minRating: z.number().min(0).max(10).optional(),
  })
  .optional()

export const JamJarBodySchema = z
  .object({
    playlistName: z.string().min(1).optional(),
    members: ReplicaListSchema.optional(),
  })
  .optional()

export const StaffPicksBodySchema = z
  .object({
    playlistName: z.string().min(1).optional(),
    curators: ReplicaListSchema.optional(),
  })
  .optional()

export const TopRatedBodySchema = z
  .object({
    playlistName: z.string().min(1).optional(),
    minRating: z.number().min(0).max(10).optional(),
  })
  .optional()

export type SyncResultResponse = z.infer<typeof SyncResultSchema>

// Re-export shared schemas
export { ErrorSchema }
