import {
  jamJarCommand,
  playlistCommands,
  recentRavesCommand,
} from '@services/discord-bot/commands/playlists/playlist-command.js'
import type { PlaylistSyncService } from '@services/playlist-sync.service.js'
import type { SyncResult } from '@root/types/playlist-sync.types.js'
import { CatalogUnavailableError } from '@utils/catalog-errors.js'
import { type ChatInputCommandInteraction, EmbedBuilder } from 'discord.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'

function createInteraction(subcommand: string) {
  const interaction = {
    user: { id: 'discord-user-1' },
    options: { getSubcommand: vi.fn(() => subcommand) },
    deferReply: vi.fn(async () => undefined),
    editReply: vi.fn(async (_payload: unknown) => undefined),
    reply: vi.fn(async (_payload: unknown) => undefined),
  }
  return {
    interaction,
    typed: interaction as unknown as ChatInputCommandInteraction,
  }
}

function createDeps(syncJamJar: () => Promise<SyncResult>) {
  return {
    playlistSync: { syncJamJar: vi.fn(syncJamJar) } as unknown as PlaylistSyncService,
    log: createMockLogger(),
  }
}

const jamJarResult: SyncResult = {
  policy: 'full-replace',
  playlistName: 'Jam Jar',
  total: 1,
  added: 2,
  replicasUpdated: 2,
  tracks: [
    { title: 'Song', artist: 'Band', attributedReplica: 'alice', timestamp: null },
  ],
  failures: [],
}

describe('playlist commands', () => {
  it('should register one command per policy with its subcommand', () => {
    expect(playlistCommands.map((command) => command.data.name)).toEqual([
      'recent-raves',
      'jam-jar',
      'staff-picks',
      'top-rated',
    ])
    expect(recentRavesCommand.data.toJSON().options?.[0]?.name).toBe('update')
  })

  it('should defer, sync and reply with an embed', async () => {
    const { interaction, typed } = createInteraction('sync')
    const deps = createDeps(async () => jamJarResult)

    await jamJarCommand.execute(typed, deps)

    expect(interaction.deferReply).toHaveBeenCalledOnce()
    expect(interaction.editReply).toHaveBeenCalledWith({
      embeds: [expect.any(EmbedBuilder)],
    })
  })

  it('should reply with a message for an empty merge', async () => {
    const { interaction, typed } = createInteraction('sync')
    const deps = createDeps(async () => ({
      ...jamJarResult,
      total: 0,
      added: 0,
      replicasUpdated: 0,
      tracks: [],
    }))

    await jamJarCommand.execute(typed, deps)

    expect(interaction.editReply).toHaveBeenCalledWith({
      content: 'Jam Jar is empty. Add some tracks and sync again.',
    })
  })

  it('should report an unreachable Plex server', async () => {
    const { interaction, typed } = createInteraction('sync')
    const deps = createDeps(async () => {
      throw new CatalogUnavailableError('Plex server is unreachable')
    })

    await jamJarCommand.execute(typed, deps)

    expect(interaction.editReply).toHaveBeenCalledWith({
      content: '❌ The Plex server is unreachable. Try again later.',
    })
    expect(deps.log.error).toHaveBeenCalled()
  })

  it('should report other failures with their message', async () => {
    const { interaction, typed } = createInteraction('sync')
    const deps = createDeps(async () => {
      throw new Error('boom')
    })

    await jamJarCommand.execute(typed, deps)

    expect(interaction.editReply).toHaveBeenCalledWith({
      content: '❌ Jam Jar sync failed: boom',
    })
  })

  it('should show usage for an unknown subcommand without syncing', async () => {
    const { interaction, typed } = createInteraction('purge')
    const deps = createDeps(async () => jamJarResult)

    await jamJarCommand.execute(typed, deps)

    expect(interaction.reply).toHaveBeenCalledWith({
      content: 'Usage: `/jam-jar sync`',
    })
    expect(interaction.deferReply).not.toHaveBeenCalled()
  })
})
