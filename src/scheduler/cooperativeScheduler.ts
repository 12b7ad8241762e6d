import type { RegisterBank } from '../hardware/registerBank';
import type { VirtualClock } from '../clock/virtualClock';
import type { BackgroundCallbackQueue, CallbackErrorHandler, DrainResult } from './callbackQueue';
import type { YieldController } from './yieldController';
import { GuestContext } from './guestContext';
import type { GuestProgram, GuestTask, YieldEvent } from './guestContext';
import { noTrace } from '../utils/trace';
import type { TraceFn } from '../utils/trace';

export type ErrorMode = 'ignore' | 'throw' | 'record';

export interface SchedulerOptions {
  maxDrainRounds?: number;
  spinChecks?: number;
  onGuestError?: ErrorMode;
  onCallbackError?: ErrorMode;
  trace?: TraceFn;
}

export type FrameStatus = 'idle' | 'yielded' | 'finished' | 'crashed';

export interface FrameResult {
  frame: number;
  status: FrameStatus;
  event?: YieldEvent;
  callbacksRun: number;
  deferredCallbacks: number;
}

// One call to runFrame() is one guest time slice:
//   reset yield flag -> drain callbacks -> resume guest to its next yield point -> return.
// Host and guest never overlap, so the bank and clock need no locking.
export class CooperativeScheduler {
  readonly context: GuestContext;
  public lastGuestError: unknown | undefined;
  public lastCallbackError: unknown | undefined;
  readonly guestErrors: unknown[] = [];
  readonly callbackErrors: unknown[] = [];

  private readonly maxDrainRounds: number;
  private readonly onGuestError: ErrorMode;
  private readonly onCallbackError: ErrorMode;
  private readonly trace: TraceFn;
  private task: GuestTask | null = null;
  private running: GuestTask | null = null;
  private stopAfterResume: GuestTask | null = null;
  private frameCount = 0;
  private frameCallbacks = 0;

  constructor(
    bank: RegisterBank,
    private readonly clock: VirtualClock,
    private readonly callbacks: BackgroundCallbackQueue,
    private readonly yields: YieldController,
    opts: SchedulerOptions = {},
  ) {
    this.maxDrainRounds = Math.max(1, Math.floor(opts.maxDrainRounds ?? 4));
    this.onGuestError = opts.onGuestError ?? 'record';
    this.onCallbackError = opts.onCallbackError ?? 'record';
    this.trace = opts.trace ?? noTrace;
    this.context = new GuestContext({
      bank,
      clock,
      callbacks,
      yields,
      runBackgroundTasks: () => this.runBackgroundTasks(),
      spinChecks: opts.spinChecks ?? 4,
    });
  }

  get hasTask(): boolean {
    return this.task !== null;
  }

  get frames(): number {
    return this.frameCount;
  }

  load(program: GuestProgram): void {
    this.stop();
    this.task = program(this.context);
  }

  // Abandons the loaded program; its finally blocks run now. Called from inside the running
  // program (e.g. a soft reset issued by the guest), the program is abandoned at its next
  // yield point, before runFrame returns.
  stop(): void {
    const task = this.task;
    this.task = null;
    if (!task) return;
    if (task === this.running) {
      this.stopAfterResume = task;
      return;
    }
    task.return(undefined);
  }

  runBackgroundTasks(): DrainResult {
    const handler: CallbackErrorHandler | undefined =
      this.onCallbackError === 'throw' ? undefined : (e) => this.recordCallbackError(e);
    const result = this.callbacks.drain(this.maxDrainRounds, handler);
    this.frameCallbacks += result.ran;
    return result;
  }

  runFrame(): FrameResult {
    const frame = ++this.frameCount;
    this.frameCallbacks = 0;
    this.yields.reset();
    this.runBackgroundTasks();

    let status: FrameStatus = 'idle';
    let event: YieldEvent | undefined;
    const task = this.task;
    if (task) {
      this.running = task;
      try {
        const r = task.next();
        if (r.done) {
          status = 'finished';
          if (this.task === task) this.task = null;
        } else {
          status = 'yielded';
          event = r.value;
        }
      } catch (e) {
        if (this.task === task) this.task = null;
        status = 'crashed';
        this.lastGuestError = e;
        if (this.onGuestError === 'record') this.guestErrors.push(e);
        this.trace('SCHED', `frame ${frame} guest error: ${e instanceof Error ? e.message : String(e)}`);
        if (this.onGuestError === 'throw') {
          this.clock.recordYield();
          throw e;
        }
      } finally {
        this.running = null;
        this.finishDeferredStop();
      }
    }

    this.clock.recordYield();
    const result: FrameResult = {
      frame,
      status,
      event,
      callbacksRun: this.frameCallbacks,
      deferredCallbacks: this.callbacks.size,
    };
    this.trace('SCHED', `frame ${frame} ${status}${event ? ` (${event.reason})` : ''} cb=${result.callbacksRun} deferred=${result.deferredCallbacks}`);
    return result;
  }

  private finishDeferredStop(): void {
    const task = this.stopAfterResume;
    this.stopAfterResume = null;
    if (task) task.return(undefined);
  }

  private recordCallbackError(e: unknown): void {
    this.lastCallbackError = e;
    if (this.onCallbackError === 'record') this.callbackErrors.push(e);
    this.trace('SCHED', `background callback error: ${e instanceof Error ? e.message : String(e)}`);
  }
}
