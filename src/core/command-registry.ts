/**
 * Ordered command table. Entries are matched in registration order and the
 * first matcher that accepts the text wins.
 */

export type CommandMatcher =
  | { kind: 'command'; name: string; allowArgs: boolean }
  | { kind: 'regex'; regex: RegExp };

export interface CommandInvocation {
  /** Command name for `command` matchers, regex source otherwise. */
  command: string;
  args: string;
  signal: AbortSignal;
}

export type CommandHandler<E> = (event: E, invocation: CommandInvocation) => Promise<void>;

export interface CommandMatch<E> {
  handler: CommandHandler<E>;
  command: string;
  args: string;
}

export interface RegisterOptions {
  /** Shown in the Telegram command menu. Entries without one stay hidden. */
  description?: string;
}

interface CommandEntry<E> {
  key: string;
  matcher: CommandMatcher;
  handler: CommandHandler<E>;
  description?: string;
}

export class DuplicatePatternError extends Error {
  constructor(public readonly key: string) {
    super(`Command pattern already registered: ${key}`);
    this.name = 'DuplicatePatternError';
  }
}

// Telegram only accepts these in setMyCommands
const MENU_COMMAND_RE = /^[a-z0-9_]{1,32}$/;

/** `/name` with no trailing arguments. */
export function command(name: string): CommandMatcher {
  return { kind: 'command', name, allowArgs: false };
}

/** `/name` optionally followed by argument text. */
export function commandWithArgs(name: string): CommandMatcher {
  return { kind: 'command', name, allowArgs: true };
}

export function pattern(regex: RegExp): CommandMatcher {
  return { kind: 'regex', regex };
}

function matcherKey(matcher: CommandMatcher): string {
  switch (matcher.kind) {
    case 'command':
      return `command:${matcher.name}`;
    case 'regex':
      return `regex:/${matcher.regex.source}/${matcher.regex.flags}`;
  }
}

export class CommandRegistry<E> {
  private entries: CommandEntry<E>[] = [];
  private keys: Set<string> = new Set();

  constructor(private readonly botUsername?: string) {}

  register(matcher: CommandMatcher, handler: CommandHandler<E>, options: RegisterOptions = {}): void {
    const key = matcherKey(matcher);
    if (this.keys.has(key)) {
      throw new DuplicatePatternError(key);
    }
    this.keys.add(key);
    this.entries.push({ key, matcher, handler, description: options.description });
  }

  match(text: string): CommandMatch<E> | undefined {
    const trimmed = text.trim();
    const parsed = this.parseSlashCommand(trimmed);

    for (const entry of this.entries) {
      const { matcher } = entry;
      if (matcher.kind === 'command') {
        if (!parsed || parsed.name !== matcher.name) continue;
        if (!matcher.allowArgs && parsed.args.length > 0) continue;
        return { handler: entry.handler, command: matcher.name, args: parsed.args };
      }

      // Global or sticky regexes keep lastIndex between calls
      matcher.regex.lastIndex = 0;
      if (matcher.regex.test(trimmed)) {
        return { handler: entry.handler, command: matcher.regex.source, args: parsed?.args ?? '' };
      }
    }

    return undefined;
  }

  menu(): Array<{ command: string; description: string }> {
    const items: Array<{ command: string; description: string }> = [];
    for (const entry of this.entries) {
      if (entry.matcher.kind !== 'command' || !entry.description) continue;
      if (!MENU_COMMAND_RE.test(entry.matcher.name)) continue;
      items.push({ command: entry.matcher.name, description: entry.description });
    }
    return items;
  }

  get size(): number {
    return this.entries.length;
  }

  private parseSlashCommand(trimmed: string): { name: string; args: string } | null {
    if (!trimmed.startsWith('/')) return null;

    const firstSpace = trimmed.search(/\s/);
    const token = firstSpace === -1 ? trimmed.slice(1) : trimmed.slice(1, firstSpace);
    const args = firstSpace === -1 ? '' : trimmed.slice(firstSpace + 1).trim();

    const at = token.indexOf('@');
    if (at === -1) {
      return token ? { name: token, args } : null;
    }

    const name = token.slice(0, at);
    const target = token.slice(at + 1);
    if (!name) return null;
    if (this.botUsername && target.toLowerCase() !== this.botUsername.toLowerCase()) {
      return null;
    }
    return { name, args };
  }
}
