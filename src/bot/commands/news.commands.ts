import { commandWithArgs, type CommandRegistry } from '../../core/command-registry.js';
import { InvalidDateError, NewsFetchError, parseNewsDate, type NewsClient } from '../../news/unwire.js';
import { sendChunked } from '../../telegram/message-sender.js';
import type { BotCommandHandler, CommandContext } from '../context.js';
import { withErrorReply } from '../handlers/errors.js';

export const INVALID_DATE_MESSAGE =
  '❌ Invalid date format... Please use YYYY-MM-DD, e.g. /unwire 2025-01-31';

export interface NewsCommandDeps {
  news: NewsClient;
  maxMessageLength: number;
}

export function createNewsHandlers(deps: NewsCommandDeps) {
  const handleUnwire: BotCommandHandler = async (ctx, { args, signal }) => {
    let date: string | undefined;
    if (args) {
      try {
        date = parseNewsDate(args);
      } catch (error) {
        if (error instanceof InvalidDateError) {
          await ctx.reply(INVALID_DATE_MESSAGE);
          return;
        }
        throw error;
      }
    }

    await ctx.replyWithChatAction('typing');

    let text: string;
    try {
      text = await deps.news.fetchNews(date, signal);
    } catch (error) {
      if (error instanceof NewsFetchError) {
        console.warn(`[News] Fetch failed: ${error.message}`);
        await ctx.reply(`❌ Failed to fetch news: ${error.message}`);
        return;
      }
      throw error;
    }

    await sendChunked(ctx, text, deps.maxMessageLength);
  };

  return { handleUnwire };
}

export function registerNewsCommands(registry: CommandRegistry<CommandContext>, deps: NewsCommandDeps): void {
  const { handleUnwire } = createNewsHandlers(deps);
  registry.register(commandWithArgs('unwire'), withErrorReply(handleUnwire), {
    description: '📰 unwire.hk headlines [YYYY-MM-DD]',
  });
}
