export interface YieldControllerOptions {
  hookCallsPerCheck?: number; // only look at the wall clock every N hook calls
  yieldIntervalMs?: number;
  now?: () => number;
}

// Owns the guest's "should yield" flag. The interpreter loop calls hook() often; every
// hookCallsPerCheck calls it compares wall time against the last yield and raises the
// flag once yieldIntervalMs has passed.
export class YieldController {
  private readonly hookCallsPerCheck: number;
  private readonly yieldIntervalMs: number;
  private readonly now: () => number;
  private flag = false;
  private hookCalls = 0;
  private lastYieldTime: number;

  constructor(opts: YieldControllerOptions = {}) {
    this.hookCallsPerCheck = Math.max(1, Math.floor(opts.hookCallsPerCheck ?? 100));
    this.yieldIntervalMs = Math.max(0, opts.yieldIntervalMs ?? 100);
    this.now = opts.now ?? (() => performance.now());
    this.lastYieldTime = this.now();
  }

  get shouldYield(): boolean {
    return this.flag;
  }

  hook(): void {
    this.hookCalls++;
    if (this.hookCalls < this.hookCallsPerCheck) return;
    this.hookCalls = 0;
    const t = this.now();
    if (t - this.lastYieldTime >= this.yieldIntervalMs) {
      this.flag = true;
      this.lastYieldTime = t;
    }
  }

  requestYield(): void {
    this.flag = true;
  }

  // Start of every frame
  reset(): void {
    this.flag = false;
    this.hookCalls = 0;
  }

  get pendingHookCalls(): number {
    return this.hookCalls;
  }
}
