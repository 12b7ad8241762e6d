import type { RegisterBank } from '../hardware/registerBank';
import type { ClockReader } from '../clock/virtualClock';
import { ticksFromMs } from '../clock/timing';
import type { BackgroundCallback, BackgroundCallbackQueue, DrainResult } from './callbackQueue';
import type { YieldController } from './yieldController';

export type YieldReason = 'checkpoint' | 'sleep' | 'wait-input';

export interface YieldEvent {
  reason: YieldReason;
  wakeAtTicks?: number; // sleep deadline, for fast-forwarding hosts
  pin?: number;         // pin being waited on
}

// A guest program is a generator: every `yield` hands control back to the host, and the
// next frame resumes it exactly where it stopped.
export type GuestTask = Generator<YieldEvent, void, void>;
export type GuestProgram = (ctx: GuestContext) => GuestTask;

export interface GuestContextDeps {
  bank: RegisterBank;
  clock: ClockReader;
  callbacks: BackgroundCallbackQueue;
  yields: YieldController;
  runBackgroundTasks: () => DrainResult;
  spinChecks: number;
}

// Everything a guest program may touch. Blocking hardware operations are expressed as
// generator yield points (use them with `yield*`).
export class GuestContext {
  readonly bank: RegisterBank;
  readonly clock: ClockReader;
  private readonly callbacks: BackgroundCallbackQueue;
  private readonly yields: YieldController;
  private readonly drain: () => DrainResult;
  private readonly spinChecks: number;

  constructor(deps: GuestContextDeps) {
    this.bank = deps.bank;
    this.clock = deps.clock;
    this.callbacks = deps.callbacks;
    this.yields = deps.yields;
    this.drain = deps.runBackgroundTasks;
    this.spinChecks = Math.max(1, Math.floor(deps.spinChecks));
  }

  ticks(): number {
    return this.clock.ticks();
  }

  monotonicMs(): number {
    return this.clock.monotonicMs();
  }

  monotonicSeconds(): number {
    return this.clock.monotonicSeconds();
  }

  enqueue<T>(cb: BackgroundCallback<T>): boolean {
    return this.callbacks.enqueue(cb);
  }

  runBackgroundTasks(): DrainResult {
    return this.drain();
  }

  requestYield(): void {
    this.yields.requestYield();
  }

  // Interpreter loop hook: yields only when the controller says the frame is over.
  *checkpoint(): Generator<YieldEvent, void, void> {
    this.yields.hook();
    if (this.yields.shouldYield) yield { reason: 'checkpoint' };
  }

  *sleepUntil(deadlineTicks: number): Generator<YieldEvent, void, void> {
    let spins = 0;
    while (this.clock.ticks() < deadlineTicks) {
      this.drain();
      this.yields.hook();
      spins++;
      if (this.yields.shouldYield || spins >= this.spinChecks) {
        spins = 0;
        yield { reason: 'sleep', wakeAtTicks: deadlineTicks };
      }
    }
  }

  *sleepTicks(ticks: number): Generator<YieldEvent, void, void> {
    const n = Number.isFinite(ticks) ? Math.max(0, Math.floor(ticks)) : 0;
    yield* this.sleepUntil(this.clock.ticks() + n);
  }

  *sleepMs(ms: number): Generator<YieldEvent, void, void> {
    yield* this.sleepTicks(ticksFromMs(ms));
  }

  // Resolves true once the pin reads `level`, false if timeoutTicks elapse first.
  *waitForInput(pin: number, level: boolean, timeoutTicks?: number): Generator<YieldEvent, boolean, void> {
    const deadline = timeoutTicks === undefined
      ? Number.POSITIVE_INFINITY
      : this.clock.ticks() + Math.max(0, Math.floor(timeoutTicks));
    let spins = 0;
    while (this.bank.getValue(pin) !== level) {
      if (this.clock.ticks() >= deadline) return false;
      this.drain();
      this.yields.hook();
      spins++;
      if (this.yields.shouldYield || spins >= this.spinChecks) {
        spins = 0;
        yield { reason: 'wait-input', pin };
      }
    }
    return true;
  }
}
