/**
 * Discord Bot Plugin
 *
 * Registers the DiscordBotService and starts the bot once the server is ready
 */

import { DiscordBotService } from '@services/discord-bot/bot.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    discordBot: DiscordBotService
  }
}

export default fp(
  async function discordBot(fastify: FastifyInstance) {
    const service = new DiscordBotService(fastify.log, fastify)

    fastify.decorate('discordBot', service)

    fastify.addHook('onReady', async () => {
      if (!service.hasBotConfig) {
        fastify.log.info('Discord bot not configured - slash commands disabled')
        return
      }

      // Login can take a while; don't hold up server startup
      void service.startBot()
    })

    fastify.addHook('onClose', async () => {
      await service.stopBot()
    })
  },
  {
    name: 'discord-bot',
    dependencies: ['config', 'playlist-sync'],
  },
)
