import { CRYSTAL, TimeMode, msFromTicks, secondsFromTicks } from './timing';

// Clock register block, 32 bytes little endian:
//   +0  ticks (u64)            host writes, guest reads
//   +8  cpuFrequencyHz (u32)
//   +12 timeMode (u8)          host writes
//   +16 yieldCount (u64)       guest writes
//   +24 hostTickCount (u64)    host writes
export const CLOCK_LAYOUT = {
  size: 32,
  ticks: 0,
  cpuFrequencyHz: 8,
  timeMode: 12,
  yieldCount: 16,
  hostTickCount: 24,
} as const;

// What guest code may see of the clock
export interface ClockReader {
  ticks(): number;
  monotonicMs(): number;
  monotonicSeconds(): number;
  readonly cpuFrequencyHz: number;
  readonly timeMode: TimeMode;
}

export class VirtualClock implements ClockReader {
  private readonly bytes = new Uint8Array(CLOCK_LAYOUT.size);
  private readonly regs = new DataView(this.bytes.buffer);

  constructor(cpuFrequencyHz = CRYSTAL.defaultCpuFrequencyHz, timeMode: TimeMode = TimeMode.Realtime) {
    this.cpuFrequencyHz = cpuFrequencyHz;
    this.timeMode = timeMode;
  }

  private read64(offset: number): number {
    return Number(this.regs.getBigUint64(offset, true));
  }

  private write64(offset: number, v: number): void {
    this.regs.setBigUint64(offset, BigInt(v), true);
  }

  ticks(): number {
    return this.read64(CLOCK_LAYOUT.ticks);
  }

  // Host only. Ticks never go backward: a lower or non-finite value is rejected, and so is
  // anything past MAX_SAFE_INTEGER, which a number cannot carry exactly.
  writeTicks(ticks: number): boolean {
    if (!Number.isFinite(ticks)) return false;
    const next = Math.floor(ticks);
    if (next < this.ticks() || next > Number.MAX_SAFE_INTEGER) return false;
    this.write64(CLOCK_LAYOUT.ticks, next);
    this.write64(CLOCK_LAYOUT.hostTickCount, this.hostTickCount() + 1);
    return true;
  }

  advanceTicks(delta: number): boolean {
    if (!Number.isFinite(delta)) return false;
    return this.writeTicks(this.ticks() + Math.max(0, Math.floor(delta)));
  }

  monotonicMs(): number {
    return msFromTicks(this.ticks());
  }

  monotonicSeconds(): number {
    return secondsFromTicks(this.ticks());
  }

  get cpuFrequencyHz(): number {
    return this.regs.getUint32(CLOCK_LAYOUT.cpuFrequencyHz, true);
  }

  set cpuFrequencyHz(hz: number) {
    const v = Number.isFinite(hz) ? Math.min(0xffffffff, Math.max(1, Math.floor(hz))) : CRYSTAL.defaultCpuFrequencyHz;
    this.regs.setUint32(CLOCK_LAYOUT.cpuFrequencyHz, v, true);
  }

  get timeMode(): TimeMode {
    switch (this.regs.getUint8(CLOCK_LAYOUT.timeMode)) {
      case TimeMode.Manual: return TimeMode.Manual;
      case TimeMode.FastForward: return TimeMode.FastForward;
      default: return TimeMode.Realtime;
    }
  }

  set timeMode(mode: TimeMode) {
    this.regs.setUint8(CLOCK_LAYOUT.timeMode, mode);
  }

  yieldCount(): number {
    return this.read64(CLOCK_LAYOUT.yieldCount);
  }

  // Guest side: one increment per frame handed back to the host
  recordYield(): void {
    this.write64(CLOCK_LAYOUT.yieldCount, this.yieldCount() + 1);
  }

  hostTickCount(): number {
    return this.read64(CLOCK_LAYOUT.hostTickCount);
  }

  memory(): Uint8Array {
    return this.bytes;
  }
}
