/**
 * Discord Bot Service
 *
 * Manages the Discord bot lifecycle (start, stop, status).
 * Coordinates command registry and event routing.
 */

import { createServiceLogger } from '@utils/logger.js'
import { Client, GatewayIntentBits } from 'discord.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  type Command,
  createCommandRegistry,
  registerCommandsWithDiscord,
} from './command-registry.js'
import { setupBotEventHandlers } from './event-router.js'

type BotStatus = 'stopped' | 'starting' | 'running' | 'stopping'

export class DiscordBotService {
  private readonly log: FastifyBaseLogger
  private botClient: Client | null = null
  private botStatus: BotStatus = 'stopped'
  private readonly commands: Map<string, Command>

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'DISCORD')
    this.log.debug('Initializing Discord bot service')

    this.commands = createCommandRegistry({
      log: this.log,
      fastify: this.fastify,
    })
  }

  private get config() {
    return this.fastify.config
  }

  /**
   * Check if Discord bot config is present.
   */
  get hasBotConfig(): boolean {
    return Boolean(this.config.discordBotToken && this.config.discordClientId)
  }

  /**
   * Starts the Discord bot.
   */
  async startBot(): Promise<boolean> {
    if (this.botStatus !== 'stopped') {
      this.log.warn(`Cannot start bot: current status is ${this.botStatus}`)
      return false
    }

    if (!this.hasBotConfig) {
      this.log.warn('Missing required Discord bot config: discordBotToken, discordClientId')
      return false
    }

    const botConfig = {
      discordBotToken: this.config.discordBotToken,
      discordClientId: this.config.discordClientId,
    }

    try {
      const commandsRegistered = await registerCommandsWithDiscord(
        this.commands,
        { log: this.log, fastify: this.fastify, config: botConfig },
      )

      if (!commandsRegistered) {
        this.log.error('Failed to register commands during bot startup')
        return false
      }

      this.botStatus = 'starting'
      this.log.debug('Initializing Discord bot client')

      this.botClient = new Client({
        intents: [GatewayIntentBits.Guilds],
      })

      setupBotEventHandlers(this.botClient, {
        log: this.log,
        commands: this.commands,
        onBotReady: () => {
          this.botStatus = 'running'
        },
      })

      await this.botClient.login(botConfig.discordBotToken)
      this.log.info('Discord bot started successfully')
      return true
    } catch (error) {
      this.log.error({ error }, 'Failed to start Discord bot')
      this.botStatus = 'stopped'
      this.botClient = null
      return false
    }
  }

  /**
   * Stops the Discord bot.
   */
  async stopBot(): Promise<boolean> {
    if (this.botStatus !== 'running' && this.botStatus !== 'starting') {
      return false
    }

    try {
      this.log.info('Stopping Discord bot')
      this.botStatus = 'stopping'

      if (this.botClient) {
        await this.botClient.destroy()
        this.botClient = null
      }

      this.botStatus = 'stopped'
      this.log.info('Discord bot stopped successfully')
      return true
    } catch (error) {
      this.log.error({ error }, 'Error stopping Discord bot')
      this.botStatus = 'stopped'
      this.botClient = null
      return false
    }
  }
}
