import { z } from 'zod'

/**
 * Response shapes of the Plex Media Server and plex.tv endpoints used by the
 * catalog client. Unknown fields are stripped.
 */

const EpochSecondsSchema = z
  .number()
  .transform((seconds) => new Date(seconds * 1000))

export const PlexIdentitySchema = z.object({
  MediaContainer: z.object({
    machineIdentifier: z.string().min(1),
    version: z.string().optional(),
  }),
})

export const PlexSectionsSchema = z.object({
  MediaContainer: z.object({
    Directory: z
      .array(
        z.object({
          key: z.coerce.string(),
          type: z.string(),
          title: z.string(),
        }),
      )
      .default([]),
  }),
})

export const PlexTrackSchema = z.object({
  ratingKey: z.coerce.string(),
  title: z.string(),
  grandparentTitle: z.string().optional(),
  originalTitle: z.string().optional(),
  userRating: z.number().optional(),
  lastRatedAt: EpochSecondsSchema.optional(),
  addedAt: EpochSecondsSchema.optional(),
  playlistItemID: z.coerce.string().optional(),
})

export const PlexTrackContainerSchema = z.object({
  MediaContainer: z.object({
    size: z.number().optional(),
    totalSize: z.number().optional(),
    Metadata: z.array(PlexTrackSchema).default([]),
  }),
})

export const PlexPlaylistSchema = z.object({
  ratingKey: z.coerce.string(),
  title: z.string(),
  playlistType: z.string().optional(),
  smart: z.union([z.boolean(), z.number()]).optional(),
})

export const PlexPlaylistContainerSchema = z.object({
  MediaContainer: z.object({
    Metadata: z.array(PlexPlaylistSchema).default([]),
  }),
})

export const PlexResourceSchema = z.object({
  name: z.string(),
  clientIdentifier: z.string(),
  provides: z.string(),
  accessToken: z.string().nullish(),
})

export const PlexResourcesSchema = z.array(PlexResourceSchema)

/** A `<User>` element of the plex.tv home users XML, attributes unprefixed */
export const PlexHomeUserSchema = z.object({
  id: z.coerce.string(),
  title: z.string(),
  username: z.string().optional(),
  admin: z.coerce.string().optional(),
})

export const PlexHomeUsersSchema = z.object({
  MediaContainer: z.object({
    User: z.array(PlexHomeUserSchema).default([]),
  }),
})

/** Body of the plex.tv home user switch response */
export const PlexSwitchUserSchema = z.object({
  user: z
    .object({
      authenticationToken: z.string().optional(),
      authToken: z.string().optional(),
    })
    .refine((user) => Boolean(user.authToken || user.authenticationToken), {
      message: 'Switch response carries no token',
    }),
})

export type PlexTrack = z.infer<typeof PlexTrackSchema>
export type PlexPlaylist = z.infer<typeof PlexPlaylistSchema>
export type PlexResource = z.infer<typeof PlexResourceSchema>
export type PlexHomeUser = z.infer<typeof PlexHomeUserSchema>
