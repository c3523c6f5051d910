import loggerModule, { type Logger } from '../logger.js';

type SupervisedTask = {
  name: string;
  controller: AbortController;
  done: Promise<void>;
};

export interface TaskSupervisorOptions {
  logger?: Logger;
}

export type TaskHandle = {
  readonly id: number;
  readonly name: string;
  readonly signal: AbortSignal;
  cancel(reason?: string): void;
  /** Settles once the task has returned, whether it succeeded, failed or was cancelled. */
  readonly done: Promise<void>;
};

export class TaskSupervisor {
  private readonly tasks = new Map<number, SupervisedTask>();
  private readonly logger: Logger;
  private nextId = 1;
  private closed = false;

  constructor(options: TaskSupervisorOptions = {}) {
    this.logger = options.logger ?? loggerModule;
  }

  get size(): number {
    return this.tasks.size;
  }

  names(): string[] {
    return Array.from(this.tasks.values(), task => task.name);
  }

  spawn(name: string, fn: (signal: AbortSignal) => Promise<void>): TaskHandle {
    const id = this.nextId++;
    const controller = new AbortController();
    if (this.closed) {
      controller.abort(new Error('supervisor is shut down'));
    }

    const done = Promise.resolve()
      .then(() => fn(controller.signal))
      .catch((error: unknown) => {
        if (controller.signal.aborted) {
          this.logger.debug({ err: error, task: name }, 'Task ended after cancellation');
        } else {
          this.logger.error({ err: error, task: name }, 'Supervised task failed');
        }
      })
      .finally(() => {
        this.tasks.delete(id);
      });

    this.tasks.set(id, { name, controller, done });
    return {
      id,
      name,
      signal: controller.signal,
      cancel: reason => controller.abort(new Error(reason ?? `task ${name} cancelled`)),
      done
    };
  }

  /** Cancels every running task and waits for all of them to return. */
  async shutdown(): Promise<void> {
    this.closed = true;
    const pending = Array.from(this.tasks.values());
    for (const task of pending) {
      task.controller.abort(new Error('supervisor shutting down'));
    }
    await Promise.all(pending.map(task => task.done));
  }
}

/** Waits `ms`; resolves false instead when the signal aborts first. */
export function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
