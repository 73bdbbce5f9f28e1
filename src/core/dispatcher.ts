import type { CommandRegistry } from './command-registry.js';
import { TaskIdCollisionError, type TaskHandle, type TaskTracker } from './task-tracker.js';

export interface DispatcherOptions<E> {
  registry: CommandRegistry<E>;
  tracker: TaskTracker;
  getText: (event: E) => string | undefined;
  /** Identifier unique per inbound event, used to derive task ids. */
  getEventId: (event: E) => string | number | undefined;
}

/**
 * Matches inbound events against the command table and starts the handler as
 * a tracked task. Never waits for the handler to finish.
 */
export class Dispatcher<E> {
  private readonly registry: CommandRegistry<E>;
  private readonly tracker: TaskTracker;
  private readonly getText: (event: E) => string | undefined;
  private readonly getEventId: (event: E) => string | number | undefined;

  constructor(options: DispatcherOptions<E>) {
    this.registry = options.registry;
    this.tracker = options.tracker;
    this.getText = options.getText;
    this.getEventId = options.getEventId;
  }

  onEvent(event: E): TaskHandle | undefined {
    const text = this.getText(event);
    if (!text) return undefined;

    const match = this.registry.match(text);
    if (!match) return undefined;

    const eventId = this.getEventId(event);
    const { handler, command, args } = match;

    try {
      return this.tracker.spawn(
        (signal) => handler(event, { command, args, signal }),
        { eventId }
      );
    } catch (error) {
      if (error instanceof TaskIdCollisionError) {
        console.warn(`[Dispatch] Dropping redelivered event ${String(eventId)} (/${command})`);
        return undefined;
      }
      throw error;
    }
  }
}
