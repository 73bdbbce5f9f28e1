import type { Context, NextFunction } from 'grammy';

const BOT_START_TIME = Date.now();
const STALE_THRESHOLD = 30000; // 30 seconds

export function isStaleMessage(messageDate: number, startTime: number = BOT_START_TIME): boolean {
  // messageDate is Unix timestamp in seconds, convert to ms
  const messageDateMs = messageDate * 1000;

  // Ignore messages sent before bot started (minus threshold)
  return messageDateMs < startTime - STALE_THRESHOLD;
}

/** Drop the backlog of commands queued while the bot was offline. */
export async function staleFilterMiddleware(ctx: Context, next: NextFunction): Promise<void> {
  const date = ctx.message?.date;
  if (date !== undefined && isStaleMessage(date)) {
    console.log(`[Bot] Ignoring stale message ${ctx.message?.message_id} from before startup`);
    return;
  }
  await next();
}

export function formatUptime(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;

  if (hours < 24) {
    return `${hours}h ${remainingMinutes}m`;
  }

  const days = Math.floor(hours / 24);
  const remainingHours = hours % 24;

  return `${days}d ${remainingHours}h`;
}

export function getUptimeFormatted(): string {
  return formatUptime(Math.floor((Date.now() - BOT_START_TIME) / 1000));
}
