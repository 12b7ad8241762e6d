import { RegisterBank } from '../hardware/registerBank';
import { VirtualClock } from '../clock/virtualClock';
import { BackgroundCallbackQueue } from '../scheduler/callbackQueue';
import { YieldController } from '../scheduler/yieldController';
import { CooperativeScheduler } from '../scheduler/cooperativeScheduler';
import type { FrameResult } from '../scheduler/cooperativeScheduler';
import type { GuestProgram } from '../scheduler/guestContext';
import { HostPort } from '../host/hostPort';
import { makeTracer } from '../utils/trace';
import type { TraceFn } from '../utils/trace';
import { boardOptionsFromEnv } from './env';
import type { BoardOptions, Env } from './env';

// One simulated board: bank, clock, callback queue, scheduler and host port.
export class Board {
  readonly bank: RegisterBank;
  readonly clock: VirtualClock;
  readonly callbacks = new BackgroundCallbackQueue();
  readonly yields: YieldController;
  readonly scheduler: CooperativeScheduler;
  readonly host: HostPort;
  readonly trace: TraceFn;

  constructor(opts: BoardOptions = {}) {
    this.trace = makeTracer(opts.trace ?? false, opts.traceSink);
    this.bank = new RegisterBank({ inputPolicy: opts.inputPolicy });
    this.clock = new VirtualClock(opts.cpuFrequencyHz, opts.timeMode);
    this.yields = new YieldController({
      hookCallsPerCheck: opts.hookCallsPerCheck,
      yieldIntervalMs: opts.yieldIntervalMs,
      now: opts.now,
    });
    this.scheduler = new CooperativeScheduler(this.bank, this.clock, this.callbacks, this.yields, {
      maxDrainRounds: opts.maxDrainRounds,
      spinChecks: opts.spinChecks,
      onGuestError: opts.onGuestError,
      onCallbackError: opts.onCallbackError,
      trace: this.trace,
    });
    this.host = new HostPort(this.bank, this.clock, this.scheduler, this.callbacks);
  }

  static fromEnv(env?: Env, overrides: BoardOptions = {}): Board {
    return new Board({ ...boardOptionsFromEnv(env), ...overrides });
  }

  load(program: GuestProgram): void {
    this.scheduler.load(program);
  }

  runFrame(): FrameResult {
    return this.scheduler.runFrame();
  }

  // Between guest runs: peripherals back to defaults, pending work dropped.
  // The crystal keeps running so time stays continuous across runs.
  // Issued by the guest itself, the program ends at its next yield point.
  softReset(): void {
    this.scheduler.stop();
    this.callbacks.clear();
    this.bank.softReset();
    this.trace('BOARD', `soft reset at tick ${this.clock.ticks()}`);
  }
}
