import type { NextFunction } from 'grammy';
import type { CommandContext } from '../context.js';

export const UNAUTHORIZED_MESSAGE = '⛔ You are not authorized to use this bot.';

export type AuthContext = Pick<CommandContext, 'from' | 'reply'>;

/**
 * Restrict the bot to `allowedUserIds`. An empty list lets everyone through.
 */
export function createAuthMiddleware(allowedUserIds: readonly number[]) {
  return async (ctx: AuthContext, next: NextFunction): Promise<void> => {
    if (allowedUserIds.length === 0) {
      await next();
      return;
    }

    const userId = ctx.from?.id;

    if (!userId) {
      console.log('[Auth] Rejected: No user ID in context');
      return;
    }

    if (!allowedUserIds.includes(userId)) {
      console.log(`[Auth] Rejected: Unauthorized user ${userId}`);
      await ctx.reply(UNAUTHORIZED_MESSAGE);
      return;
    }

    await next();
  };
}
