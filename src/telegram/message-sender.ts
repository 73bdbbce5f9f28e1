import type { CommandContext } from '../bot/context.js';

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split text into Telegram-sized parts. Prefers a paragraph break, then a
 * newline, then a space, as long as it falls in the second half of the chunk.
 */
export function splitMessage(text: string, maxLength: number): string[] {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }
  if (text.length <= maxLength) {
    return [text];
  }

  const parts: string[] = [];
  let remaining = text;

  while (remaining.length > maxLength) {
    const chunk = remaining.substring(0, maxLength);
    let splitIndex = maxLength;

    const paragraphBreak = chunk.lastIndexOf('\n\n');
    if (paragraphBreak > maxLength / 2) {
      splitIndex = paragraphBreak + 2;
    } else {
      const newlineBreak = chunk.lastIndexOf('\n');
      if (newlineBreak > maxLength / 2) {
        splitIndex = newlineBreak + 1;
      } else {
        const spaceBreak = chunk.lastIndexOf(' ');
        if (spaceBreak > maxLength / 2) {
          splitIndex = spaceBreak + 1;
        } else if (splitIndex > 1 && isHighSurrogate(remaining.charCodeAt(splitIndex - 1))) {
          // keep surrogate pairs together
          splitIndex -= 1;
        }
      }
    }

    parts.push(remaining.substring(0, splitIndex).trimEnd());
    remaining = remaining.substring(splitIndex);
  }

  if (remaining.length > 0) {
    parts.push(remaining);
  }

  return parts;
}

/** Reply with `text`, one message per part, in order. */
export async function sendChunked(ctx: CommandContext, text: string, maxLength: number): Promise<void> {
  for (const part of splitMessage(text, maxLength)) {
    await ctx.reply(part, { link_preview_options: { is_disabled: true } });
  }
}
