/**
 * Discord Command Registry
 *
 * Manages slash command registration and storage.
 */

import {
  type ChatInputCommandInteraction,
  REST,
  Routes,
} from 'discord.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  type PlaylistCommand,
  playlistCommands,
} from './commands/playlists/playlist-command.js'

type CommandHandler = (
  interaction: ChatInputCommandInteraction,
) => Promise<void>

export interface Command {
  data: PlaylistCommand['data']
  execute: CommandHandler
}

export interface CommandRegistryCreateDeps {
  log: FastifyBaseLogger
  fastify: FastifyInstance
}

export interface CommandRegistryDeps extends CommandRegistryCreateDeps {
  config: {
    discordBotToken: string
    discordClientId: string
  }
}

/**
 * Creates the command registry with the playlist commands bound to the
 * playlist sync service.
 */
export function createCommandRegistry(
  deps: CommandRegistryCreateDeps,
): Map<string, Command> {
  const { log, fastify } = deps
  const commands = new Map<string, Command>()

  log.debug('Initializing Discord bot commands')

  for (const command of playlistCommands) {
    commands.set(command.data.name, {
      data: command.data,
      execute: async (interaction) => {
        log.debug(
          { userId: interaction.user.id },
          `Executing ${command.data.name} command`,
        )
        await command.execute(interaction, {
          playlistSync: fastify.playlistSync,
          log,
        })
      },
    })
  }

  log.debug(`Initialized ${commands.size} Discord bot commands`)
  return commands
}

/**
 * Registers commands with the Discord API globally.
 */
export async function registerCommandsWithDiscord(
  commands: Map<string, Command>,
  deps: CommandRegistryDeps,
): Promise<boolean> {
  const { log, config } = deps

  log.debug('Registering Discord application commands globally')

  try {
    const rest = new REST().setToken(config.discordBotToken)

    const commandsData = Array.from(commands.values()).map((cmd) =>
      cmd.data.toJSON(),
    )

    await rest.put(Routes.applicationCommands(config.discordClientId), {
      body: commandsData,
    })

    log.debug('Successfully registered global application commands')
    return true
  } catch (error) {
    log.error({ error }, 'Failed to register global commands')
    return false
  }
}
