/**
 * OperationGuard: preconditions and mutual exclusion for mutating entry points.
 *
 * Checks run in the same order as they are declared on every entry point:
 * positive amount, allow-listed asset, then the lock. Outermost operations
 * queue on a single FIFO lock. An invocation issued from inside a running
 * operation (a collaborator calling back during a call-out) is recognised
 * through AsyncLocalStorage and rejected with ReentrantCall; the running
 * operation is poisoned and aborts with the same code once control returns.
 */

import { AsyncLocalStorage } from 'async_hooks';

import { DscEngineError } from './errors.js';

export interface OperationFrame {
  readonly operation: string;
  reentered: boolean;
}

export class OperationGuard {
  private readonly frames = new AsyncLocalStorage<OperationFrame>();
  private tail: Promise<void> = Promise.resolve();
  private locked = false;
  private queued = 0;

  constructor(private readonly isAllowedToken: (asset: string) => boolean) {}

  requireMoreThanZero(amount: bigint, label = 'amount'): void {
    if (amount <= 0n) {
      throw new DscEngineError('NeedsMoreThanZero', `${label} must be more than zero (got ${amount})`);
    }
  }

  requireAllowedToken(asset: string): void {
    if (!this.isAllowedToken(asset)) {
      throw new DscEngineError('TokenNotAllowed', `Token ${asset} is not allowed as collateral`);
    }
  }

  /**
   * Run `body` holding the exclusive lock. The lock is released on every exit path.
   */
  nonReentrant<T>(operation: string, body: (frame: OperationFrame) => Promise<T>): Promise<T> {
    const active = this.frames.getStore();
    if (active) {
      active.reentered = true;
      return Promise.reject(
        new DscEngineError('ReentrantCall', `${operation} re-entered while ${active.operation} is in flight`)
      );
    }

    this.queued++;
    const frame: OperationFrame = { operation, reentered: false };
    const run = this.tail.then(() => {
      this.queued--;
      return this.frames.run(frame, () => this.hold(frame, body));
    });
    // Keep the chain alive past failures; callers still see `run` reject.
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Throw if a nested call hit the guard while `frame` was running
   */
  assertNotReentered(frame: OperationFrame): void {
    if (frame.reentered) {
      throw new DscEngineError('ReentrantCall', `${frame.operation} was re-entered during an external call`);
    }
  }

  /** True while the calling code runs inside a guarded operation */
  isInsideOperation(): boolean {
    return this.frames.getStore() !== undefined;
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Operations waiting behind the current holder */
  pendingCount(): number {
    return this.queued;
  }

  /** Resolves once every operation queued so far has finished */
  drain(): Promise<void> {
    return this.tail;
  }

  private async hold<T>(frame: OperationFrame, body: (frame: OperationFrame) => Promise<T>): Promise<T> {
    this.locked = true;
    try {
      return await body(frame);
    } finally {
      this.locked = false;
    }
  }
}
