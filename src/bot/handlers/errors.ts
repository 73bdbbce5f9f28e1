import { GrammyError } from 'grammy';
import { setTimeout as sleep } from 'timers/promises';
import type { CommandInvocation } from '../../core/command-registry.js';
import type { BotCommandHandler, CommandContext } from '../context.js';
import { sanitizeError } from '../../utils/sanitize.js';

export const GENERIC_FAILURE_MESSAGE = '❌ Sorry, something went wrong. Please try again later.';
export const RATE_LIMIT_MESSAGE = '⏳ Telegram is rate limiting this bot. Please try again in a moment.';

const MAX_RATE_LIMIT_WAIT_SECONDS = 60;

function isRateLimit(error: unknown): error is GrammyError {
  return error instanceof GrammyError && error.error_code === 429;
}

function isAbort(error: unknown, signal: AbortSignal): boolean {
  return signal.aborted || (error instanceof Error && error.name === 'AbortError');
}

async function handleRateLimit(
  ctx: CommandContext,
  error: GrammyError,
  invocation: CommandInvocation
): Promise<void> {
  const retryAfter = Math.min(error.parameters.retry_after ?? 1, MAX_RATE_LIMIT_WAIT_SECONDS);
  console.warn(`[Command] /${invocation.command} rate limited, backing off ${retryAfter}s`);

  await sleep(retryAfter * 1000, undefined, { signal: invocation.signal });
  await ctx.reply(RATE_LIMIT_MESSAGE);
}

/**
 * Contain a handler's failures at its own boundary: the user sees one short
 * message and the error goes to the log.
 */
export async function handleCommandError(
  ctx: CommandContext,
  error: unknown,
  invocation: CommandInvocation
): Promise<void> {
  if (isAbort(error, invocation.signal)) {
    console.log(`[Command] /${invocation.command} cancelled`);
    return;
  }

  try {
    if (isRateLimit(error)) {
      await handleRateLimit(ctx, error, invocation);
      return;
    }

    console.error(`[Command] /${invocation.command} failed:`, sanitizeError(error));
    await ctx.reply(GENERIC_FAILURE_MESSAGE);
  } catch (replyError) {
    if (isAbort(replyError, invocation.signal)) {
      console.log(`[Command] /${invocation.command} cancelled while reporting an error`);
      return;
    }
    console.error(`[Command] Could not report failure of /${invocation.command}:`, sanitizeError(replyError));
  }
}

export function withErrorReply(handler: BotCommandHandler): BotCommandHandler {
  return async (ctx, invocation) => {
    try {
      await handler(ctx, invocation);
    } catch (error) {
      await handleCommandError(ctx, error, invocation);
    }
  };
}
