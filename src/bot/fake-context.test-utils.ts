import { vi } from 'vitest';
import type { CommandInvocation } from '../core/command-registry.js';
import type { CommandContext, ReplyOptions } from './context.js';

/** In-process stand-in for a grammy context, recording every outbound call. */
export function createFakeContext(text: string, options: { chatId?: number; updateId?: number } = {}) {
  const reply = vi.fn(async (_text: string, _other?: ReplyOptions) => ({ message_id: 77 }));
  const replyWithChatAction = vi.fn(async (_action: 'typing') => true);
  const editMessageText = vi.fn(async (_chatId: number, _messageId: number, _text: string) => true);

  const ctx: CommandContext = {
    update: { update_id: options.updateId ?? 1 },
    chat: { id: options.chatId ?? 555 },
    from: { id: 42 },
    message: { message_id: 10, date: 0, text },
    api: { editMessageText },
    reply,
    replyWithChatAction,
  };

  return { ctx, reply, replyWithChatAction, editMessageText };
}

export function invocation(command: string, args = '', signal: AbortSignal = new AbortController().signal): CommandInvocation {
  return { command, args, signal };
}
