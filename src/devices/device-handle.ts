/**
 * Shared, exclusively-accessed reference to one device implementation.
 *
 * Every capability slot of a `Device` holds the same handle, so a change
 * made through one trait is visible through the identity contract and
 * every other trait.  `use()` grants access for the duration of a single
 * callback; callers queue in FIFO order.
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { Awaitable } from '../traits/common';

const heldHandles = new AsyncLocalStorage<ReadonlySet<object>>();

export class DeviceHandle<T> {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly device: T) {}

  /**
   * Run `fn` with exclusive access to the device.  Acquiring the same
   * handle again from inside `fn` throws instead of deadlocking.
   */
  async use<R>(fn: (device: T) => Awaitable<R>): Promise<R> {
    const held = heldHandles.getStore();
    if (held?.has(this)) {
      throw new Error('Device handle is already held by this call');
    }

    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const next = new Set<object>(held ?? []);
      next.add(this);
      return await heldHandles.run(next, () => fn(this.device));
    } finally {
      release();
    }
  }
}
