import { afterEach, describe, expect, it, vi } from 'vitest';
import { CommandRegistry, command, commandWithArgs } from './command-registry.js';
import { Dispatcher } from './dispatcher.js';
import { TaskTracker } from './task-tracker.js';

interface FakeEvent {
  id: number;
  text?: string;
}

function setup() {
  const registry = new CommandRegistry<FakeEvent>();
  const tracker = new TaskTracker({ now: () => 42_000 });
  const dispatcher = new Dispatcher<FakeEvent>({
    registry,
    tracker,
    getText: (event) => event.text,
    getEventId: (event) => event.id,
  });
  return { registry, tracker, dispatcher };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Dispatcher', () => {
  it('spawns the matched handler with its invocation and returns immediately', async () => {
    const { registry, tracker, dispatcher } = setup();
    const handler = vi.fn(async () => {});
    registry.register(commandWithArgs('unwire'), handler);

    const event = { id: 9, text: '/unwire 2025-01-31' };
    const handle = dispatcher.onEvent(event);

    expect(handle?.id).toBe('9_42');
    expect(handler).not.toHaveBeenCalled();
    expect(tracker.size).toBe(1);

    await handle?.done;
    expect(handler).toHaveBeenCalledWith(event, {
      command: 'unwire',
      args: '2025-01-31',
      signal: expect.any(AbortSignal),
    });
    expect(tracker.size).toBe(0);
  });

  it('ignores unmatched text and events without text', () => {
    const { registry, tracker, dispatcher } = setup();
    const handler = vi.fn(async () => {});
    registry.register(command('ping'), handler);

    expect(dispatcher.onEvent({ id: 1, text: 'hello' })).toBeUndefined();
    expect(dispatcher.onEvent({ id: 2, text: '/unknown' })).toBeUndefined();
    expect(dispatcher.onEvent({ id: 3 })).toBeUndefined();
    expect(tracker.size).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('drops a redelivered event while the first one is still running', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { registry, tracker, dispatcher } = setup();
    registry.register(command('ping'), () => new Promise<void>(() => {}));

    expect(dispatcher.onEvent({ id: 5, text: '/ping' })).toBeDefined();
    expect(dispatcher.onEvent({ id: 5, text: '/ping' })).toBeUndefined();
    expect(tracker.size).toBe(1);
    expect(warn).toHaveBeenCalledWith('[Dispatch] Dropping redelivered event 5 (/ping)');
  });

  it('lets handlers finish out of order and leaves nothing tracked', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { registry, tracker, dispatcher } = setup();
    const finished: string[] = [];
    const releases = new Map<string, () => void>();

    registry.register(commandWithArgs('job'), (_event, { args }) => {
      if (args === 'fail') {
        return Promise.reject(new Error('job failed'));
      }
      return new Promise<void>((resolve) => {
        releases.set(args, () => {
          finished.push(args);
          resolve();
        });
      });
    });

    const handles = [
      dispatcher.onEvent({ id: 1, text: '/job a' }),
      dispatcher.onEvent({ id: 2, text: '/job fail' }),
      dispatcher.onEvent({ id: 3, text: '/job b' }),
    ];
    expect(tracker.size).toBe(3);
    await Promise.resolve();

    releases.get('b')?.();
    releases.get('a')?.();
    await Promise.all(handles.map((handle) => handle?.done));

    expect(finished).toEqual(['b', 'a']);
    expect(tracker.size).toBe(0);
  });

  it('settles at zero after cancellation and only grows again for new events', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { registry, tracker, dispatcher } = setup();
    registry.register(commandWithArgs('slow'), () => new Promise<void>(() => {}));

    for (let id = 1; id <= 4; id++) {
      dispatcher.onEvent({ id, text: '/slow' });
    }
    expect(tracker.size).toBe(4);

    await tracker.cancelAll();
    expect(tracker.size).toBe(0);

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(tracker.size).toBe(0);

    dispatcher.onEvent({ id: 5, text: '/slow' });
    expect(tracker.ids()).toEqual(['5_42']);
  });
});
