import { describe, expect, it, vi } from 'vitest';
import {
  CommandRegistry,
  DuplicatePatternError,
  command,
  commandWithArgs,
  pattern,
} from './command-registry.js';

type Event = { text: string };

const noop = async () => {};

describe('CommandRegistry', () => {
  it('matches an exact command and rejects trailing arguments', () => {
    const registry = new CommandRegistry<Event>();
    const handler = vi.fn(noop);
    registry.register(command('ping'), handler);

    expect(registry.match('/ping')?.handler).toBe(handler);
    expect(registry.match('  /ping  ')?.handler).toBe(handler);
    expect(registry.match('/ping now')).toBeUndefined();
    expect(registry.match('/pingx')).toBeUndefined();
    expect(registry.match('ping')).toBeUndefined();
  });

  it('passes argument text for commands that take arguments', () => {
    const registry = new CommandRegistry<Event>();
    registry.register(commandWithArgs('unwire'), noop);

    expect(registry.match('/unwire')).toMatchObject({ command: 'unwire', args: '' });
    expect(registry.match('/unwire   2025-01-31 ')).toMatchObject({ command: 'unwire', args: '2025-01-31' });
  });

  it('treats /.env as its own command name', () => {
    const registry = new CommandRegistry<Event>();
    const env = vi.fn(noop);
    const dotenv = vi.fn(noop);
    registry.register(command('env'), env);
    registry.register(command('.env'), dotenv);

    expect(registry.match('/.env')?.handler).toBe(dotenv);
    expect(registry.match('/env')?.handler).toBe(env);
  });

  it('honours @username only for this bot', () => {
    const registry = new CommandRegistry<Event>('MyBot');
    registry.register(command('ping'), noop);

    expect(registry.match('/ping@mybot')).toBeDefined();
    expect(registry.match('/ping@OtherBot')).toBeUndefined();
  });

  it('lets the first registered matcher win on overlap', () => {
    const registry = new CommandRegistry<Event>();
    const first = vi.fn(noop);
    const second = vi.fn(noop);
    registry.register(pattern(/^\/env/), first);
    registry.register(command('env'), second);

    expect(registry.match('/env')?.handler).toBe(first);
  });

  it('resets lastIndex on global regexes between matches', () => {
    const registry = new CommandRegistry<Event>();
    registry.register(pattern(/^\/hello/g), noop);

    expect(registry.match('/hello')).toBeDefined();
    expect(registry.match('/hello')).toBeDefined();
  });

  it('rejects duplicate patterns', () => {
    const registry = new CommandRegistry<Event>();
    registry.register(command('ping'), noop);

    expect(() => registry.register(commandWithArgs('ping'), noop)).toThrow(DuplicatePatternError);
    registry.register(pattern(/^\/a$/), noop);
    expect(() => registry.register(pattern(/^\/a$/), noop)).toThrow('Command pattern already registered: regex:/^\\/a$/');
    expect(registry.size).toBe(2);
  });

  it('lists only described, menu-safe commands', () => {
    const registry = new CommandRegistry<Event>();
    registry.register(command('ping'), noop, { description: 'Ping' });
    registry.register(command('.env'), noop, { description: 'Env' });
    registry.register(command('hidden'), noop);
    registry.register(pattern(/^\/x/), noop, { description: 'X' });

    expect(registry.menu()).toEqual([{ command: 'ping', description: 'Ping' }]);
  });
});
