export interface BackgroundCallback<T = void> {
  readonly fn: (data: T) => void;
  readonly data: T;
}

export function backgroundCallback<T>(fn: (data: T) => void, data: T): BackgroundCallback<T> {
  return { fn, data };
}

export interface DrainResult {
  ran: number;
  rounds: number;
  deferred: number;
}

export type CallbackErrorHandler = (err: unknown, cb: object) => void;

interface QueueEntry {
  cb: object;
  invoke: () => void;
}

// FIFO of deferred work that guest-side subsystems hand to the scheduler.
// A callback object that is already pending is not queued a second time; it is unlinked
// right before it runs, so it may re-queue itself from inside its own invocation.
export class BackgroundCallbackQueue {
  private entries: QueueEntry[] = [];
  private pending = new Set<object>();

  enqueue<T>(cb: BackgroundCallback<T>): boolean {
    if (this.pending.has(cb)) return false;
    this.pending.add(cb);
    this.entries.push({ cb, invoke: () => cb.fn(cb.data) });
    return true;
  }

  cancel(cb: object): boolean {
    if (!this.pending.delete(cb)) return false;
    this.entries = this.entries.filter((e) => e.cb !== cb);
    return true;
  }

  isPending(cb: object): boolean {
    return this.pending.has(cb);
  }

  get size(): number {
    return this.entries.length;
  }

  hasPending(): boolean {
    return this.entries.length > 0;
  }

  clear(): void {
    this.entries = [];
    this.pending.clear();
  }

  // Runs queued callbacks in rounds. A round covers the entries queued when it starts;
  // anything queued while it runs belongs to the next round. Whatever is still queued
  // after maxRounds stays for the next drain.
  // Without onError an exception propagates; the throwing callback has already been unlinked.
  drain(maxRounds: number, onError?: CallbackErrorHandler): DrainResult {
    const limit = Math.max(1, Math.floor(maxRounds));
    let ran = 0;
    let rounds = 0;
    while (this.entries.length > 0 && rounds < limit) {
      rounds++;
      let remaining = this.entries.length;
      while (remaining-- > 0) {
        const entry = this.entries.shift();
        if (!entry) break;
        this.pending.delete(entry.cb);
        ran++;
        if (onError) {
          try {
            entry.invoke();
          } catch (e) {
            onError(e, entry.cb);
          }
        } else {
          entry.invoke();
        }
      }
    }
    return { ran, rounds, deferred: this.entries.length };
  }
}
