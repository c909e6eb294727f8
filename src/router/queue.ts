/**
 * Trigger Queue
 *
 * Inbound channel between event sources (stdin, AWS Config adapters, the
 * sweep timer) and the router. Producers `push`; the router consumes with
 * `for await`. Iteration ends once the queue is closed and drained.
 */

import type { RunMode, Trigger } from "../types.js";

export type QueuedTrigger = {
  trigger: Trigger;
  mode: RunMode;
};

export class TriggerQueue implements AsyncIterable<QueuedTrigger> {
  private buffer: QueuedTrigger[] = [];
  private waiters: ((item: IteratorResult<QueuedTrigger>) => void)[] = [];
  private closed = false;

  /** Total triggers accepted since creation. */
  totalReceived = 0;

  push(trigger: Trigger, mode: RunMode = "auto"): void {
    if (this.closed) throw new Error("Trigger queue is closed");
    this.totalReceived++;
    const item = { trigger, mode };
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value: item, done: false });
    else this.buffer.push(item);
  }

  /** Stop accepting triggers; consumers finish what is buffered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of triggers currently buffered. */
  get pendingCount(): number {
    return this.buffer.length;
  }

  next(): Promise<IteratorResult<QueuedTrigger>> {
    const item = this.buffer.shift();
    if (item) return Promise.resolve({ value: item, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<QueuedTrigger> {
    return { next: () => this.next() };
  }
}
