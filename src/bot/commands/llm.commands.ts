import { commandWithArgs, type CommandRegistry } from '../../core/command-registry.js';
import type { LlmProvider } from '../../llm/providers.js';
import { sendChunked } from '../../telegram/message-sender.js';
import type { BotCommandHandler, CommandContext } from '../context.js';
import { withErrorReply } from '../handlers/errors.js';

export const ASK_USAGE_MESSAGE = 'Usage: /ask <question>';
export const NO_PROVIDER_MESSAGE = '⚠️ No LLM provider is configured.';

export interface LlmCommandDeps {
  llm?: LlmProvider;
  maxMessageLength: number;
}

export function createLlmHandlers(deps: LlmCommandDeps) {
  const handleAsk: BotCommandHandler = async (ctx, { args, signal }) => {
    if (!args) {
      await ctx.reply(ASK_USAGE_MESSAGE);
      return;
    }

    if (!deps.llm) {
      await ctx.reply(NO_PROVIDER_MESSAGE);
      return;
    }

    await ctx.replyWithChatAction('typing');
    const answer = await deps.llm.complete(args, signal);
    await sendChunked(ctx, answer, deps.maxMessageLength);
  };

  return { handleAsk };
}

export function registerLlmCommands(registry: CommandRegistry<CommandContext>, deps: LlmCommandDeps): void {
  const { handleAsk } = createLlmHandlers(deps);
  registry.register(commandWithArgs('ask'), withErrorReply(handleAsk), { description: '🤖 Ask the language model' });
}
