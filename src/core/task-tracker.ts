import { sanitizeError } from '../utils/sanitize.js';

export type TaskState = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export type TaskWork = (signal: AbortSignal) => Promise<void>;

export interface SpawnOptions {
  /** Explicit task id. Generated from `eventId` and the clock when omitted. */
  key?: string;
  eventId?: string | number;
}

export interface TaskHandle {
  readonly id: string;
  readonly state: TaskState;
  readonly signal: AbortSignal;
  /** Resolves once the task reached a terminal state. Never rejects. */
  readonly done: Promise<TaskState>;
  abort(): void;
}

export interface TaskTrackerOptions {
  /** Clock in milliseconds, used for generated ids. */
  now?: () => number;
}

export class TaskIdCollisionError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} is already in flight`);
    this.name = 'TaskIdCollisionError';
  }
}

class TrackedTask implements TaskHandle {
  state: TaskState = 'pending';
  readonly done: Promise<TaskState>;
  private readonly controller = new AbortController();
  private readonly resolveDone: (state: TaskState) => void;
  private settled = false;

  constructor(
    readonly id: string,
    private readonly onSettled: (task: TrackedTask) => void
  ) {
    let resolveDone: (state: TaskState) => void = () => {};
    this.done = new Promise<TaskState>((resolve) => {
      resolveDone = resolve;
    });
    this.resolveDone = resolveDone;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  start(work: TaskWork): void {
    // Work begins on a later microtask so spawn() returns before any handler code runs
    void Promise.resolve()
      .then(() => {
        if (this.settled) return;
        this.state = 'running';
        return work(this.controller.signal);
      })
      .then(
        () => this.settle('completed'),
        (error: unknown) => {
          if (this.settled) return;
          console.error(`[Tasks] Task ${this.id} failed:`, sanitizeError(error));
          this.settle('failed');
        }
      );
  }

  abort(): void {
    if (this.settled) return;
    this.controller.abort();
    this.settle('cancelled');
  }

  private settle(state: TaskState): void {
    if (this.settled) return;
    this.settled = true;
    this.state = state;
    this.onSettled(this);
    this.resolveDone(state);
  }
}

/**
 * Registry of in-flight command executions. Each task removes itself when it
 * completes, fails or is cancelled.
 */
export class TaskTracker {
  private tasks: Map<string, TrackedTask> = new Map();
  private activeTasks: Set<TaskHandle> = new Set();
  private sequence = 0;
  private readonly now: () => number;

  constructor(options: TaskTrackerOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  spawn(work: TaskWork, options: SpawnOptions = {}): TaskHandle {
    const id = options.key ?? this.generateId(options.eventId);
    if (this.tasks.has(id)) {
      throw new TaskIdCollisionError(id);
    }

    const task = new TrackedTask(id, (settled) => this.release(settled));
    this.tasks.set(id, task);
    this.activeTasks.add(task);
    task.start(work);
    return task;
  }

  cancel(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;
    task.abort();
    return true;
  }

  /** Abort every tracked task. Handlers that ignore their signal keep running detached. */
  async cancelAll(): Promise<void> {
    const pending = [...this.activeTasks];
    if (pending.length > 0) {
      console.log(`[Tasks] Cancelling ${pending.length} in-flight task(s)`);
    }
    for (const task of pending) {
      task.abort();
    }
    await Promise.all(pending.map((task) => task.done));
  }

  /**
   * Wait for the tasks tracked right now. Resolves false if some are still
   * running after `timeoutMs`.
   */
  async join(timeoutMs?: number): Promise<boolean> {
    const all = Promise.all([...this.activeTasks].map((task) => task.done)).then(() => true);
    if (timeoutMs === undefined) {
      return all;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([all, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  get size(): number {
    return this.tasks.size;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  get(id: string): TaskHandle | undefined {
    return this.tasks.get(id);
  }

  ids(): string[] {
    return [...this.tasks.keys()];
  }

  private release(task: TrackedTask): void {
    this.activeTasks.delete(task);
    this.tasks.delete(task.id);
  }

  private generateId(eventId: string | number | undefined): string {
    const seconds = Math.floor(this.now() / 1000);
    const source = eventId ?? `local${++this.sequence}`;
    return `${source}_${seconds}`;
  }
}
