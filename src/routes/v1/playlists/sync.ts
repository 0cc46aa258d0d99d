import {
  ErrorSchema,
  JamJarBodySchema,
  RecentRavesBodySchema,
  StaffPicksBodySchema,
  SyncResultSchema,
  TopRatedBodySchema,
} from '@schemas/playlists/playlist-sync.schema.js'
import type { SyncResult } from '@root/types/playlist-sync.types.js'
import { CatalogUnavailableError } from '@utils/catalog-errors.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyReply, FastifyRequest } from 'fastify'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const responses = {
  200: SyncResultSchema,
  500: ErrorSchema,
  503: ErrorSchema,
}

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  /**
   * Runs one sync and maps an escaping error to an HTTP error. Replica
   * failures never escape; they are part of the 200 result.
   */
  const runSync = async (
    request: FastifyRequest,
    reply: FastifyReply,
    label: string,
    run: (signal: AbortSignal) => Promise<SyncResult>,
  ) => {
    // Stop between replicas once the client has gone away
    const controller = new AbortController()
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort()
    }
    reply.raw.once('close', onClose)

    try {
      return await run(controller.signal)
    } catch (err) {
      logRouteError(fastify.log, request, err, {
        message: `Failed to run ${label}`,
      })
      if (err instanceof CatalogUnavailableError) {
        return reply.serviceUnavailable(err.message)
      }
      return reply.internalServerError(`Unable to run ${label}`)
    } finally {
      reply.raw.off('close', onClose)
    }
  }

  fastify.post(
    '/recent-raves/sync',
    {
      schema: {
        summary: 'Update Recent Raves',
        operationId: 'syncRecentRaves',
        description:
          "Append the contributors' newest top-rated tracks to each contributor's playlist, capped",
        body: RecentRavesBodySchema,
        response: responses,
        tags: ['Playlists'],
      },
    },
    async (request, reply) =>
      runSync(request, reply, 'Recent Raves update', (signal) =>
        fastify.playlistSync.updateRecentRaves({ ...request.body, signal }),
      ),
  )

  fastify.post(
    '/jam-jar/sync',
    {
      schema: {
        summary: 'Sync Jam Jar',
        operationId: 'syncJamJar',
        description:
          "Merge every member's playlist and replace each member's copy with the result",
        body: JamJarBodySchema,
        response: responses,
        tags: ['Playlists'],
      },
    },
    async (request, reply) =>
      runSync(request, reply, 'Jam Jar sync', (signal) =>
        fastify.playlistSync.syncJamJar({ ...request.body, signal }),
      ),
  )

  fastify.post(
    '/staff-picks/sync',
    {
      schema: {
        summary: 'Sync Staff Picks',
        operationId: 'syncStaffPicks',
        description:
          "Merge the curators' playlists and replace every user's copy with the result",
        body: StaffPicksBodySchema,
        response: responses,
        tags: ['Playlists'],
      },
    },
    async (request, reply) =>
      runSync(request, reply, 'Staff Picks sync', (signal) =>
        fastify.playlistSync.syncStaffPicks({ ...request.body, signal }),
      ),
  )

  fastify.post(
    '/top-rated/sync',
    {
      schema: {
        summary: 'Sync Top Rated',
        operationId: 'syncTopRated',
        description:
          "Replace the server owner's playlist with every track at or above the rating threshold",
        body: TopRatedBodySchema,
        response: responses,
        tags: ['Playlists'],
      },
    },
    async (request, reply) =>
      runSync(request, reply, 'Top Rated sync', (signal) =>
        fastify.playlistSync.syncTopRated({ ...request.body, signal }),
      ),
  )
}

export default plugin
