import { CommandRegistry, command } from '../../core/command-registry.js';
import type { Config } from '../../config.js';
import type { LlmProvider } from '../../llm/providers.js';
import type { NewsClient } from '../../news/unwire.js';
import type { CommandContext } from '../context.js';
import { withErrorReply } from '../handlers/errors.js';
import { registerBasicCommands } from './basic.commands.js';
import { registerLlmCommands } from './llm.commands.js';
import { registerNewsCommands } from './news.commands.js';

export interface BotServices {
  llm?: LlmProvider;
  news: NewsClient;
}

/**
 * Build the command table. Registration order is match order.
 */
export function buildCommandRegistry(
  config: Config,
  services: BotServices,
  botUsername?: string
): CommandRegistry<CommandContext> {
  const registry = new CommandRegistry<CommandContext>(botUsername);

  registerBasicCommands(registry, { config, llmProviderName: services.llm?.name });
  registerNewsCommands(registry, { news: services.news, maxMessageLength: config.TELEGRAM_MAX_LENGTH });
  registerLlmCommands(registry, { llm: services.llm, maxMessageLength: config.TELEGRAM_MAX_LENGTH });

  registry.register(
    command('help'),
    withErrorReply(async (ctx) => {
      const lines = registry.menu().map((item) => `/${item.command} — ${item.description}`);
      await ctx.reply(`Available commands:\n\n${lines.join('\n')}`);
    }),
    { description: '📜 List all commands' }
  );

  return registry;
}
