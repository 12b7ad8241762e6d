import type { VirtualClock } from '../clock/virtualClock';
import { TimeMode, msFromTicks, ticksFromMs, timeModeName } from '../clock/timing';
import { noTrace } from '../utils/trace';
import type { TraceFn } from '../utils/trace';

export interface ClockDriverOptions {
  now?: () => number;        // wall clock in ms
  intervalMs?: number;       // realtime pump period
  trace?: TraceFn;
}

export interface TimelineEntry {
  ticks: number;
  event: string;
}

export interface ClockStatistics {
  virtualTimeMs: number;
  cpuFrequencyMHz: number;
  yieldCount: number;
  hostTickCount: number;
  timelineEvents: number;
}

// Host-side crystal: decides when and how far ticks move.
//   realtime     ticks follow wall time (anchored at start, so no drift between pumps)
//   manual       ticks move only on explicit steps
//   fast-forward sleeping guests are woken by jumping to their deadline
export class ClockDriver {
  private readonly now: () => number;
  private readonly intervalMs: number;
  private readonly trace: TraceFn;
  private timer: ReturnType<typeof setInterval> | null = null;
  private anchorWallMs = 0;
  private anchorTicks = 0;
  private events: TimelineEntry[] = [];

  constructor(private readonly clock: VirtualClock, opts: ClockDriverOptions = {}) {
    this.now = opts.now ?? (() => performance.now());
    this.intervalMs = Math.max(1, opts.intervalMs ?? 1);
    this.trace = opts.trace ?? noTrace;
  }

  get mode(): TimeMode {
    return this.clock.timeMode;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  startRealtime(): void {
    this.stopRealtime();
    this.setMode(TimeMode.Realtime);
    this.anchorWallMs = this.now();
    this.anchorTicks = this.clock.ticks();
    this.timer = setInterval(() => this.pump(), this.intervalMs);
    this.trace('CLOCK', 'realtime started');
  }

  stopRealtime(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  // Bring a realtime clock up to date with the wall clock. No-op in other modes.
  pump(): number {
    if (this.clock.timeMode !== TimeMode.Realtime) return this.clock.ticks();
    const target = this.anchorTicks + ticksFromMs(this.now() - this.anchorWallMs);
    if (target > this.clock.ticks()) this.clock.writeTicks(target);
    return this.clock.ticks();
  }

  setManualMode(): void {
    this.stopRealtime();
    this.setMode(TimeMode.Manual);
  }

  setFastForwardMode(): void {
    this.stopRealtime();
    this.setMode(TimeMode.FastForward);
  }

  advanceTicks(ticks: number): void {
    const before = this.clock.ticks();
    if (!this.clock.advanceTicks(ticks)) return;
    const moved = this.clock.ticks() - before;
    this.events.push({ ticks: this.clock.ticks(), event: `Advanced ${msFromTicks(moved)}ms (${moved} ticks)` });
  }

  advanceMs(ms: number): void {
    this.advanceTicks(ticksFromMs(ms));
  }

  advanceToMs(targetMs: number): void {
    const current = this.clock.monotonicMs();
    if (targetMs > current) this.advanceMs(targetMs - current);
  }

  // Host hook for a guest sleep yield; only acts in fast-forward mode.
  onSleepDetected(wakeAtTicks: number): boolean {
    if (this.clock.timeMode !== TimeMode.FastForward) return false;
    const from = this.clock.ticks();
    if (!Number.isFinite(wakeAtTicks) || wakeAtTicks <= from) return false;
    this.clock.writeTicks(wakeAtTicks);
    this.events.push({ ticks: wakeAtTicks, event: `Fast-forwarded ${wakeAtTicks - from} ticks` });
    this.trace('CLOCK', `fast-forward ${from} -> ${wakeAtTicks}`);
    return true;
  }

  recordEvent(event: string): void {
    this.events.push({ ticks: this.clock.ticks(), event });
  }

  timeline(): TimelineEntry[] {
    return [...this.events];
  }

  formattedTimeline(): string[] {
    return this.events.map((e) => `T+${msFromTicks(e.ticks).toFixed(3)}ms: ${e.event}`);
  }

  clearTimeline(): void {
    this.events = [];
  }

  statistics(): ClockStatistics {
    return {
      virtualTimeMs: this.clock.monotonicMs(),
      cpuFrequencyMHz: this.clock.cpuFrequencyHz / 1_000_000,
      yieldCount: this.clock.yieldCount(),
      hostTickCount: this.clock.hostTickCount(),
      timelineEvents: this.events.length,
    };
  }

  private setMode(mode: TimeMode): void {
    this.clock.timeMode = mode;
    this.trace('CLOCK', `mode ${timeModeName(mode)}`);
  }
}
