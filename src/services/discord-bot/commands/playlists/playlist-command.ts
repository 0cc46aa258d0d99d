/**
 * Playlist Commands
 *
 * Slash commands that run one playlist reconciliation each:
 * /recent-raves update, /jam-jar sync, /staff-picks sync, /top-rated sync.
 * Syncs touch every replica in turn, so the reply is deferred first.
 */

import type { SyncResult } from '@root/types/playlist-sync.types.js'
import type { PlaylistSyncService } from '@services/playlist-sync.service.js'
import { CatalogUnavailableError, errorMessage } from '@utils/catalog-errors.js'
import {
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
  SlashCommandBuilder,
} from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'
import { buildSyncEmbed, emptyResultMessage } from './embeds.js'

export interface PlaylistCommandDeps {
  playlistSync: PlaylistSyncService
  log: FastifyBaseLogger
}

export interface PlaylistCommand {
  data: {
    name: string
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody
  }
  execute(
    interaction: ChatInputCommandInteraction,
    deps: PlaylistCommandDeps,
  ): Promise<void>
}

/**
 * Runs a sync and edits the deferred reply with its outcome
 */
export async function replyWithSync(
  interaction: ChatInputCommandInteraction,
  label: string,
  run: () => Promise<SyncResult>,
  log: FastifyBaseLogger,
): Promise<void> {
  await interaction.deferReply()

  try {
    const result = await run()

    if (result.total === 0) {
      await interaction.editReply({ content: emptyResultMessage(result) })
      return
    }

    await interaction.editReply({ embeds: [buildSyncEmbed(result)] })
  } catch (error) {
    log.error({ error, userId: interaction.user.id }, `${label} failed`)

    const content =
      error instanceof CatalogUnavailableError
        ? '❌ The Plex server is unreachable. Try again later.'
        : `❌ ${label} failed: ${errorMessage(error)}`

    await interaction.editReply({ content })
  }
}

function createPlaylistCommand(options: {
  name: string
  description: string
  subcommand: string
  subcommandDescription: string
  label: string
  run: (playlistSync: PlaylistSyncService) => Promise<SyncResult>
}): PlaylistCommand {
  return {
    data: new SlashCommandBuilder()
      .setName(options.name)
      .setDescription(options.description)
      .addSubcommand((subcommand) =>
        subcommand
          .setName(options.subcommand)
          .setDescription(options.subcommandDescription),
      ),

    async execute(interaction, deps) {
      const subcommand = interaction.options.getSubcommand()
      if (subcommand !== options.subcommand) {
        await interaction.reply({
          content: `Usage: \`/${options.name} ${options.subcommand}\``,
        })
        return
      }

      deps.log.info(
        { userId: interaction.user.id },
        `Running /${options.name} ${options.subcommand}`,
      )

      await replyWithSync(
        interaction,
        options.label,
        () => options.run(deps.playlistSync),
        deps.log,
      )
    },
  }
}

export const recentRavesCommand = createPlaylistCommand({
  name: 'recent-raves',
  description: "Manages the shared 'Recent Raves' playlist",
  subcommand: 'update',
  subcommandDescription:
    "Adds the contributors' latest 5-star tracks to their playlists",
  label: 'Recent Raves update',
  run: (playlistSync) => playlistSync.updateRecentRaves(),
})

export const jamJarCommand = createPlaylistCommand({
  name: 'jam-jar',
  description: "Manages the shared 'Jam Jar' collaborative playlist",
  subcommand: 'sync',
  subcommandDescription: 'Merges every member playlist and pushes it to all',
  label: 'Jam Jar sync',
  run: (playlistSync) => playlistSync.syncJamJar(),
})

export const staffPicksCommand = createPlaylistCommand({
  name: 'staff-picks',
  description: "Manages the 'Staff Picks' playlist",
  subcommand: 'sync',
  subcommandDescription: 'Pushes the curators picks to every user',
  label: 'Staff Picks sync',
  run: (playlistSync) => playlistSync.syncStaffPicks(),
})

export const topRatedCommand = createPlaylistCommand({
  name: 'top-rated',
  description: "Manages the 'Top Rated' playlist",
  subcommand: 'sync',
  subcommandDescription: 'Rebuilds the playlist from 4+ star tracks',
  label: 'Top Rated sync',
  run: (playlistSync) => playlistSync.syncTopRated(),
})

export const playlistCommands: PlaylistCommand[] = [
  recentRavesCommand,
  jamJarCommand,
  staffPicksCommand,
  topRatedCommand,
]
