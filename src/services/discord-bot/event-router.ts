/**
 * Discord Event Router
 *
 * Routes slash command interactions to the registered commands.
 */

import {
  type Client,
  Events,
  type Interaction,
  type InteractionReplyOptions,
  MessageFlags,
} from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'
import type { Command } from './command-registry.js'

export interface EventRouterDeps {
  log: FastifyBaseLogger
  commands: Map<string, Command>
  onBotReady: () => void
}

/**
 * Sets up all event handlers on the Discord bot client.
 */
export function setupBotEventHandlers(
  client: Client,
  deps: EventRouterDeps,
): void {
  const { log, commands, onBotReady } = deps

  client.once(Events.ClientReady, (readyClient) => {
    onBotReady()
    log.info({ botUsername: readyClient.user.username }, 'Discord bot is ready')
  })

  client.on(Events.Error, (error) => {
    log.error({ error }, 'Discord bot error occurred')
  })

  client.on(Events.InteractionCreate, async (interaction) => {
    await handleInteraction(interaction, { log, commands })
  })
}

/**
 * Routes an interaction to its command. Errors are logged and answered,
 * never rethrown into the client's event emitter.
 */
export async function handleInteraction(
  interaction: Interaction,
  deps: Pick<EventRouterDeps, 'log' | 'commands'>,
): Promise<void> {
  const { log, commands } = deps

  try {
    if (!interaction.isChatInputCommand()) return

    const command = commands.get(interaction.commandName)
    if (!command) {
      log.warn({ command: interaction.commandName }, 'Unknown command received')
      await interaction.reply({
        content: 'Unknown command',
        flags: MessageFlags.Ephemeral,
      })
      return
    }

    await command.execute(interaction)
  } catch (error) {
    log.error({ error }, 'Error handling interaction')
    await sendErrorReply(interaction, log)
  }
}

/**
 * Sends an error reply to an interaction.
 */
async function sendErrorReply(
  interaction: Interaction,
  log: FastifyBaseLogger,
): Promise<void> {
  if (!interaction.isRepliable()) return

  const errorMessage: InteractionReplyOptions = {
    content: 'An error occurred while processing your request.',
    flags: MessageFlags.Ephemeral,
  }

  try {
    if (interaction.replied || interaction.deferred) {
      await interaction.followUp(errorMessage)
    } else {
      await interaction.reply(errorMessage)
    }
  } catch (replyError) {
    log.error({ error: replyError }, 'Error sending error reply')
  }
}
