import type { CommandHandler } from '../core/command-registry.js';

export interface ReplyOptions {
  link_preview_options?: { is_disabled?: boolean };
}

/**
 * The slice of grammy's `Context` that command handlers use. Kept structural
 * so handlers can be exercised without a live bot.
 */
export interface CommandContext {
  readonly update: { update_id: number };
  readonly chat?: { id: number };
  readonly from?: { id: number };
  readonly message?: { message_id: number; date: number; text?: string };
  readonly api: {
    editMessageText(chatId: number, messageId: number, text: string): Promise<unknown>;
  };
  reply(text: string, other?: ReplyOptions): Promise<{ message_id: number }>;
  replyWithChatAction(action: 'typing'): Promise<unknown>;
}

export type BotCommandHandler = CommandHandler<CommandContext>;
