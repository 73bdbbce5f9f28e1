import { Bot } from 'grammy';
import { autoRetry } from '@grammyjs/auto-retry';
import type { Config } from '../config.js';
import { Dispatcher } from '../core/dispatcher.js';
import { TaskTracker } from '../core/task-tracker.js';
import { sanitizeError } from '../utils/sanitize.js';
import { buildCommandRegistry, type BotServices } from './commands/index.js';
import type { CommandContext } from './context.js';
import { createAuthMiddleware } from './middleware/auth.middleware.js';
import { staleFilterMiddleware } from './middleware/stale-filter.js';

export interface BotRuntime {
  bot: Bot;
  tracker: TaskTracker;
  dispatcher: Dispatcher<CommandContext>;
}

export async function createBot(config: Config, services: BotServices): Promise<BotRuntime> {
  const bot = new Bot(config.TELEGRAM_BOT_TOKEN);

  // Auto-retry on transient network errors (ECONNRESET, socket hang up, etc.)
  // Also handles 429 rate limits by respecting Telegram's retry_after
  bot.api.config.use(autoRetry({
    maxRetryAttempts: 5,
    maxDelaySeconds: 60,
    rethrowInternalServerErrors: false,
  }));

  // Fetches the bot username so `/cmd@OtherBot` is not taken for ours
  await bot.init();

  const registry = buildCommandRegistry(config, services, bot.botInfo.username);
  const tracker = new TaskTracker();
  const dispatcher = new Dispatcher<CommandContext>({
    registry,
    tracker,
    getText: (ctx) => ctx.message?.text,
    getEventId: (ctx) => ctx.update.update_id,
  });

  // Register command menu for autocomplete (non-blocking)
  bot.api.setMyCommands(registry.menu()).then(() => {
    console.log('[Bot] Command menu registered');
  }).catch((err: unknown) => {
    console.warn('[Bot] Failed to register commands:', sanitizeError(err));
  });

  bot.use(staleFilterMiddleware);
  bot.use(createAuthMiddleware(config.ALLOWED_USER_IDS));

  // Handlers run as tracked tasks; the update loop moves on immediately
  bot.on('message:text', (ctx) => {
    dispatcher.onEvent(ctx);
  });

  bot.catch((err) => {
    console.error('[Bot] Error while handling update', err.ctx.update.update_id, sanitizeError(err.error));
  });

  return { bot, tracker, dispatcher };
}
