import { Bot } from 'grammy';
import { autoRetry } from '@grammyjs/auto-retry';
import type { Config } from '../config.js';
import { handleDl, handleStart, type BotServices } from './handlers/command.handler.js';
import { handleMessage } from './handlers/message.handler.js';

export function createBot(config: Pick<Config, 'TELEGRAM_TOKEN'>, services: BotServices): Bot {
  const bot = new Bot(config.TELEGRAM_TOKEN);

  // Auto-retry on transient network errors (ECONNRESET, socket hang up, etc.)
  // Also handles 429 rate limits by respecting Telegram's retry_after
  bot.api.config.use(autoRetry({
    maxRetryAttempts: 5,
    maxDelaySeconds: 60,
    rethrowInternalServerErrors: false,
  }));

  // Register command menu for autocomplete (non-blocking)
  const commandList = [
    { command: 'start', description: '🚀 Show help and getting started' },
    { command: 'help', description: '❓ How to use this bot' },
    { command: 'dl', description: '📥 Download a video from a URL' },
  ];

  bot.api.setMyCommands(commandList).then(() => {
    console.log('📋 Command menu registered');
  }).catch((err: unknown) => {
    console.warn('⚠️ Failed to register commands:', err instanceof Error ? err.message : err);
  });

  bot.command(['start', 'help'], (ctx) => handleStart(ctx, services));
  bot.command('dl', (ctx) => handleDl(ctx, services));

  // Any other text containing a link
  bot.on('message:text', (ctx) => handleMessage(ctx, services));

  // Error handler
  bot.catch((err) => {
    console.error('[bot] Error while handling update:', err.error);
  });

  return bot;
}
