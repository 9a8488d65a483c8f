/**
 * Single-consumer event loop over the bridge's readiness sources
 *
 * Each source owns a queue that its adapter pushes into. The loop waits once
 * for any queue to become ready, then drains every source in registration
 * order, handling each event to completion before the next one.
 */

export type DispatchResult = 'continue' | 'shutdown';

export type LoopExit =
  | { reason: 'shutdown'; source: string }
  | { reason: 'error'; source: string; message: string };

/**
 * Wake channel shared by all queues. A wake that arrives while nobody waits
 * is remembered until the next wait.
 */
export class Waker {
  private pending = false;
  private resolveWait: (() => void) | null = null;

  wake(): void {
    const resolve = this.resolveWait;
    if (resolve) {
      this.resolveWait = null;
      resolve();
    } else {
      this.pending = true;
    }
  }

  wait(): Promise<void> {
    if (this.pending) {
      this.pending = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.resolveWait = resolve;
    });
  }
}

export class EventQueue<E> {
  private readonly events: E[] = [];
  private _error: string | null = null;

  constructor(
    readonly name: string,
    private readonly waker: Waker
  ) {}

  get pending(): number {
    return this.events.length;
  }

  /**
   * First error or hangup reported by the source, if any
   */
  get error(): string | null {
    return this._error;
  }

  push(event: E): void {
    this.events.push(event);
    this.waker.wake();
  }

  fail(message: string): void {
    if (this._error === null) {
      this._error = message;
    }
    this.waker.wake();
  }

  shift(): E | undefined {
    return this.events.shift();
  }
}

interface RegisteredSource {
  name: string;
  drain(): Promise<LoopExit | null>;
}

export class EventMultiplexer {
  private readonly waker = new Waker();
  private readonly sources: RegisteredSource[] = [];

  /**
   * @param beforeWait - called before every wait, e.g. to flush queued requests
   */
  constructor(private readonly beforeWait?: () => void) {}

  /**
   * Register a source. Sources are drained in registration order.
   */
  register<E>(
    name: string,
    dispatch: (event: E) => Promise<DispatchResult> | DispatchResult
  ): EventQueue<E> {
    const queue = new EventQueue<E>(name, this.waker);

    this.sources.push({
      name,
      drain: async () => {
        while (queue.pending > 0) {
          const event = queue.shift();
          if (event === undefined) {
            break;
          }

          let result: DispatchResult = 'continue';
          try {
            result = await dispatch(event);
          } catch (error) {
            console.error(`[EventMultiplexer] Failed to handle ${name} event:`, error);
          }
          if (result === 'shutdown') {
            return { reason: 'shutdown', source: name };
          }
        }

        if (queue.error !== null) {
          return { reason: 'error', source: name, message: queue.error };
        }
        return null;
      },
    });

    return queue;
  }

  /**
   * Run until a source requests shutdown or reports an error
   */
  async run(): Promise<LoopExit> {
    for (;;) {
      this.beforeWait?.();
      await this.waker.wait();

      for (const source of this.sources) {
        const exit = await source.drain();
        if (exit) {
          return exit;
        }
      }
    }
  }
}

export function exitCodeFor(exit: LoopExit): number {
  return exit.reason === 'shutdown' ? 0 : 1;
}
