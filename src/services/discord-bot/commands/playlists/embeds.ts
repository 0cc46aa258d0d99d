/**
 * Embed formatting for playlist sync results
 */

import type {
  SyncResult,
  TrackSummary,
} from '@root/types/playlist-sync.types.js'
import { EmbedBuilder } from 'discord.js'

export const TRACKS_PER_FIELD = 10
export const MAX_LISTED_TRACKS = 50

export const EMBED_COLORS = {
  updated: 0x57f287,
  upToDate: 0x3498db,
  merged: 0x9b59b6,
  broadcast: 0xf1c40f,
  snapshot: 0xe67e22,
} as const

/**
 * Shortens a value longer than `max` to `max - 2` characters plus '..'
 */
export function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 2)}..` : value
}

export function formatTrackLine(track: TrackSummary, position: number): string {
  const title = truncate(track.title, 32)
  const artist = truncate(track.artist, 20)
  const who = track.attributedReplica.slice(0, 8)
  return `\`${String(position).padStart(2)}.\` **${title}** - ${artist} (${who})`
}

/**
 * Track lines grouped into embed fields of ten, listing at most fifty tracks
 */
export function buildTrackFields(
  tracks: readonly TrackSummary[],
): { name: string; value: string; inline: boolean }[] {
  const listed = tracks.slice(0, MAX_LISTED_TRACKS)
  const fields: { name: string; value: string; inline: boolean }[] = []

  for (let start = 0; start < listed.length; start += TRACKS_PER_FIELD) {
    const chunk = listed.slice(start, start + TRACKS_PER_FIELD)
    fields.push({
      name: `Tracks ${start + 1}-${start + chunk.length}`,
      value: chunk
        .map((track, index) => formatTrackLine(track, start + index + 1))
        .join('\n'),
      inline: false,
    })
  }

  if (tracks.length > MAX_LISTED_TRACKS) {
    fields.push({
      name: '...',
      value: `And ${tracks.length - MAX_LISTED_TRACKS} more tracks`,
      inline: false,
    })
  }

  return fields
}

function heading(result: SyncResult): {
  title: string
  color: number
  description?: string
} {
  switch (result.policy) {
    case 'incremental-capped':
      return result.added > 0
        ? {
            title: `${result.playlistName} Updated (+${result.added} new)`,
            color: EMBED_COLORS.updated,
          }
        : {
            title: `${result.playlistName} (up to date)`,
            color: EMBED_COLORS.upToDate,
          }
    case 'full-replace':
      return {
        title: `${result.playlistName} Synced`,
        color: EMBED_COLORS.merged,
        description: `Merged playlist across ${result.replicasUpdated} members`,
      }
    case 'broadcast':
      return {
        title: `${result.playlistName} Synced`,
        color: EMBED_COLORS.broadcast,
        description: `Pushed to ${result.replicasUpdated} users`,
      }
    case 'rating-snapshot':
      return {
        title: `${result.playlistName} Synced`,
        color: EMBED_COLORS.snapshot,
      }
  }
}

/**
 * Message shown instead of an embed when the merge came out empty
 */
export function emptyResultMessage(result: SyncResult): string {
  switch (result.policy) {
    case 'incremental-capped':
      return '⚠️ No 5-star tracks found from contributors.'
    case 'full-replace':
      return `${result.playlistName} is empty. Add some tracks and sync again.`
    case 'broadcast':
      return `No tracks found in any curator's ${result.playlistName}.`
    case 'rating-snapshot':
      return `No tracks are rated highly enough for ${result.playlistName}.`
  }
}

export function buildSyncEmbed(result: SyncResult): EmbedBuilder {
  const { title, color, description } = heading(result)

  const embed = new EmbedBuilder()
    .setTitle(title)
    .setColor(color)
    .addFields(buildTrackFields(result.tracks))

  if (description) {
    embed.setDescription(description)
  }

  if (result.failures.length > 0) {
    embed.addFields({
      name: 'Skipped',
      value: result.failures
        .map((failure) => `${failure.replicaId} (${failure.phase})`)
        .join(', '),
      inline: false,
    })
  }

  const footer =
    result.policy === 'incremental-capped'
      ? `${result.total} tracks total • 5-star ratings only`
      : `${result.total} tracks total`

  return embed.setFooter({ text: footer })
}
