// Virtual crystal timing constants and unit conversions
export interface CrystalTiming {
  readonly ticksPerSecond: number;
  readonly defaultCpuFrequencyHz: number;
}

export const CRYSTAL: CrystalTiming = {
  ticksPerSecond: 32768,
  defaultCpuFrequencyHz: 120_000_000,
};

export const enum TimeMode {
  Realtime = 0,
  Manual = 1,
  FastForward = 2,
}

export function ticksFromMs(ms: number): number {
  if (!Number.isFinite(ms) || ms <= 0) return 0;
  return Math.floor((ms * CRYSTAL.ticksPerSecond) / 1000);
}

export function msFromTicks(ticks: number): number {
  return (ticks * 1000) / CRYSTAL.ticksPerSecond;
}

export function secondsFromTicks(ticks: number): number {
  return ticks / CRYSTAL.ticksPerSecond;
}

export function parseTimeMode(raw: string | undefined): TimeMode | undefined {
  switch ((raw ?? '').trim().toLowerCase()) {
    case 'realtime': return TimeMode.Realtime;
    case 'manual': return TimeMode.Manual;
    case 'fast-forward':
    case 'fastforward': return TimeMode.FastForward;
    default: return undefined;
  }
}

export function timeModeName(mode: TimeMode): string {
  switch (mode) {
    case TimeMode.Manual: return 'manual';
    case TimeMode.FastForward: return 'fast-forward';
    default: return 'realtime';
  }
}
