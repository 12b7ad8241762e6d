import type { Board } from '../board/board';
import type { FrameResult } from '../scheduler/cooperativeScheduler';
import { ClockDriver } from './clockDriver';

export interface HostLoopOptions {
  driver?: ClockDriver;
  frameDelayMs?: number;
  onFrame?: (result: FrameResult) => void;
}

export interface RunOptions {
  maxFrames?: number;
}

// Host side of the alternation: run a frame, let the event loop breathe, repeat.
export class HostLoop {
  readonly driver: ClockDriver;
  private readonly frameDelayMs: number;
  private readonly onFrame?: (result: FrameResult) => void;
  private stopRequested = false;

  constructor(private readonly board: Board, opts: HostLoopOptions = {}) {
    this.driver = opts.driver ?? new ClockDriver(board.clock, { trace: board.trace });
    this.frameDelayMs = Math.max(0, opts.frameDelayMs ?? 0);
    this.onFrame = opts.onFrame;
  }

  step(): FrameResult {
    this.driver.pump();
    const result = this.board.runFrame();
    const ev = result.event;
    if (ev && ev.reason === 'sleep' && ev.wakeAtTicks !== undefined) {
      this.driver.onSleepDetected(ev.wakeAtTicks);
    }
    if (this.onFrame) this.onFrame(result);
    return result;
  }

  // Resolves with the last frame once the guest finishes, crashes, has nothing loaded,
  // stop() is called, or maxFrames frames have run. The realtime pump stops with it.
  async run(opts: RunOptions = {}): Promise<FrameResult> {
    const maxFrames = Math.max(1, Math.floor(opts.maxFrames ?? 10_000));
    this.stopRequested = false;
    try {
      let last = this.step();
      let frames = 1;
      while (last.status === 'yielded' && frames < maxFrames && !this.stopRequested) {
        await new Promise<void>((resolve) => setTimeout(resolve, this.frameDelayMs));
        last = this.step();
        frames++;
      }
      return last;
    } finally {
      this.driver.stopRealtime();
    }
  }

  stop(): void {
    this.stopRequested = true;
  }
}
