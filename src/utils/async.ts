/**
 * Async utilities
 */

import { isAuthError, makeError } from '../errors.ts';

/**
 * Create a deferred promise that can be resolved/rejected externally.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void;
  reject: (reason?: unknown) => void;
}

/** Create a {@link Deferred} promise that can be resolved or rejected externally. */
export function deferred<T>(): Deferred<T> {
  let resolve!: (value: T | PromiseLike<T>) => void;
  let reject!: (reason?: unknown) => void;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

/**
 * Serializes async tasks in call order.
 *
 * Each caller reserves its slot synchronously, before awaiting anything, so
 * tasks run in exactly the order `run()` was called.
 */
export class SerialQueue {
  private _tail: Promise<void> = Promise.resolve();

  async run<R>(task: () => R | Promise<R>): Promise<R> {
    const { resolve, promise: myTurn } = deferred<void>();
    const previous = this._tail;
    this._tail = myTurn;

    await previous;
    try {
      return await task();
    } finally {
      resolve();
    }
  }
}

/**
 * Exclusive-access lock owning a value.
 *
 * The value is only reachable inside {@link Mutex.lock}. Non-fatal
 * {@link AuthError}s pass through and leave the mutex usable. Anything else
 * thrown from a critical section poisons it; every later acquisition then
 * rejects with a `lock` error instead of exposing possibly half-updated state.
 */
export class Mutex<T> {
  private _value: T;
  private _name: string;
  private _queue = new SerialQueue();
  private _poisoned = false;

  constructor(value: T, name = 'state') {
    this._value = value;
    this._name = name;
  }

  get poisoned(): boolean {
    return this._poisoned;
  }

  lock<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
    return this._queue.run(async () => {
      if (this._poisoned) {
        throw makeError(`Cannot unlock ${this._name}`, 'lock');
      }
      try {
        return await fn(this._value);
      } catch (err) {
        if (!isAuthError(err) || err.fatal) {
          this._poisoned = true;
        }
        throw err;
      }
    });
  }
}
