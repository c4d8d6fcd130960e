import v8 from 'v8';
import type { OutputChannel } from './output-channel.js';

type Callback = (...args: unknown[]) => unknown;

/** Thrown by the `process.exit` a file sees; code 0 ends the file as a success. */
export class ProcessExit extends Error {
  constructor(readonly code: number) {
    super(`process.exit(${code}) called`);
  }
}

/**
 * State owned by one file execution: its output channel, the timers it scheduled, the
 * first error thrown from one of its callbacks, and the promises created while it ran.
 * A rejected promise that nothing else subscribed to counts as the file's failure.
 */
export class ExecutionScope {
  private readonly pending = new Map<unknown, () => void>();
  private readonly promises: Array<Promise<unknown>> = [];
  private readonly handled = new WeakSet<Promise<unknown>>();
  private readonly rejections = new Map<Promise<unknown>, unknown>();
  private thrown: { error: unknown } | undefined;
  private exited = false;
  private wake: (() => void) | undefined;
  private stopTracking: (() => void) | undefined;

  constructor(
    readonly channel: OutputChannel,
    private readonly promiseType: PromiseConstructor,
  ) {}

  trackPromises(): void {
    let attaching = false;
    const stop = v8.promiseHooks.createHook({
      init: (promise, parent) => {
        if (attaching) return;
        // `then`, `catch` and `await` all create a child of the promise they subscribe to.
        if (parent) this.handled.add(parent);
        if (!(promise instanceof this.promiseType)) return;
        this.promises.push(promise);
        attaching = true;
        try {
          promise.then(undefined, (reason: unknown) => {
            this.rejections.set(promise, reason);
          });
        } finally {
          attaching = false;
        }
      },
    });
    this.stopTracking = () => stop();
  }

  setTimeout(callback: unknown, delay: unknown, args: unknown[]): NodeJS.Timeout {
    const fn = asCallback(callback);
    const handle = setTimeout(() => {
      this.pending.delete(handle);
      this.invoke(fn, args);
    }, Number(delay ?? 0));
    this.pending.set(handle, () => clearTimeout(handle));
    return handle;
  }

  setInterval(callback: unknown, delay: unknown, args: unknown[]): NodeJS.Timeout {
    const fn = asCallback(callback);
    const handle = setInterval(() => this.invoke(fn, args), Number(delay ?? 0));
    this.pending.set(handle, () => clearInterval(handle));
    return handle;
  }

  setImmediate(callback: unknown, args: unknown[]): NodeJS.Immediate {
    const fn = asCallback(callback);
    const handle = setImmediate(() => {
      this.pending.delete(handle);
      this.invoke(fn, args);
    });
    this.pending.set(handle, () => clearImmediate(handle));
    return handle;
  }

  queueMicrotask(callback: unknown): void {
    const fn = asCallback(callback);
    queueMicrotask(() => this.invoke(fn, []));
  }

  clear(handle: unknown): void {
    const cancel = this.pending.get(handle);
    if (!cancel) return;
    cancel();
    this.pending.delete(handle);
    this.notify();
  }

  /**
   * Waits until the microtasks and timers the file scheduled have run. An interval keeps
   * the file open until it is cleared or a callback throws.
   */
  async settle(): Promise<void> {
    await nextTurn();
    while (this.pending.size > 0) {
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
      await nextTurn();
    }
  }

  /** Records the first uncaught error and cancels everything still scheduled. */
  fail(error: unknown): void {
    if (error instanceof ProcessExit && error.code === 0) {
      this.exited = true;
    } else if (!this.thrown && !this.exited) {
      this.thrown = { error };
    }
    this.cancelTimers();
  }

  close(): void {
    this.stopTracking?.();
    this.stopTracking = undefined;
    this.cancelTimers();
  }

  failure(): { error: unknown } | undefined {
    if (this.thrown) return this.thrown;
    if (this.exited) return undefined;
    const unhandled = this.promises.find(p => this.rejections.has(p) && !this.handled.has(p));
    return unhandled ? { error: this.rejections.get(unhandled) } : undefined;
  }

  private invoke(fn: Callback, args: unknown[]): void {
    try {
      fn(...args);
    } catch (err) {
      this.fail(err);
    } finally {
      this.notify();
    }
  }

  private cancelTimers(): void {
    for (const cancel of this.pending.values()) cancel();
    this.pending.clear();
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }
}

function asCallback(value: unknown): Callback {
  if (typeof value !== 'function') {
    throw new TypeError(`The "callback" argument must be of type function. Received ${typeof value}`);
  }
  const fn = value;
  return (...args) => fn(...args);
}

function nextTurn(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
