import { describe, it, expect } from 'vitest';
import { RegisterBank } from '../../src/hardware/registerBank';
import { Pull } from '../../src/hardware/types';
import { VirtualClock } from '../../src/clock/virtualClock';
import { BackgroundCallbackQueue, backgroundCallback } from '../../src/scheduler/callbackQueue';
import type { BackgroundCallback } from '../../src/scheduler/callbackQueue';
import { YieldController } from '../../src/scheduler/yieldController';
import { CooperativeScheduler } from '../../src/scheduler/cooperativeScheduler';
import type { SchedulerOptions } from '../../src/scheduler/cooperativeScheduler';
import type { RegisterBankOptions } from '../../src/hardware/registerBank';

function setup(opts: SchedulerOptions = {}, bankOpts: RegisterBankOptions = {}, now: () => number = () => 0) {
  const bank = new RegisterBank(bankOpts);
  const clock = new VirtualClock();
  const callbacks = new BackgroundCallbackQueue();
  const yields = new YieldController({ now });
  const sched = new CooperativeScheduler(bank, clock, callbacks, yields, opts);
  return { bank, clock, callbacks, yields, sched };
}

describe('CooperativeScheduler frames', () => {
  it('reports idle frames when nothing is loaded and still counts yields', () => {
    const { sched, clock } = setup();
    const r = sched.runFrame();
    expect(r).toEqual({ frame: 1, status: 'idle', event: undefined, callbacksRun: 0, deferredCallbacks: 0 });
    sched.runFrame();
    expect(clock.yieldCount()).toBe(2);
    expect(sched.frames).toBe(2);
  });

  it('resumes the guest exactly where it yielded', () => {
    const { sched } = setup();
    const log: string[] = [];
    sched.load(function* (ctx) {
      log.push('a');
      ctx.requestYield();
      yield* ctx.checkpoint();
      log.push('b');
    });
    expect(sched.hasTask).toBe(true);
    const first = sched.runFrame();
    expect(first.status).toBe('yielded');
    expect(first.event).toEqual({ reason: 'checkpoint' });
    expect(log).toEqual(['a']);
    const second = sched.runFrame();
    expect(second.status).toBe('finished');
    expect(log).toEqual(['a', 'b']);
    expect(sched.hasTask).toBe(false);
    expect(sched.runFrame().status).toBe('idle');
  });

  it('checkpoint does not yield while the flag is clear', () => {
    const { sched } = setup();
    let steps = 0;
    sched.load(function* (ctx) {
      for (let i = 0; i < 50; i++) {
        steps++;
        yield* ctx.checkpoint();
      }
    });
    expect(sched.runFrame().status).toBe('finished');
    expect(steps).toBe(50);
  });

  it('checkpoint yields once the wall-clock interval has passed', () => {
    let t = 0;
    const bank = new RegisterBank();
    const clock = new VirtualClock();
    const callbacks = new BackgroundCallbackQueue();
    const yields = new YieldController({ hookCallsPerCheck: 1, yieldIntervalMs: 10, now: () => ++t });
    const sched = new CooperativeScheduler(bank, clock, callbacks, yields);
    let work = 0;
    sched.load(function* (ctx) {
      for (;;) {
        work++;
        yield* ctx.checkpoint();
      }
    });
    sched.runFrame();
    expect(work).toBe(10);
    sched.runFrame();
    expect(work).toBe(20);
  });
});

describe('CooperativeScheduler yield points', () => {
  it('sleep yields with its wake deadline and completes once ticks reach it', () => {
    const { sched, clock } = setup();
    let woke = false;
    sched.load(function* (ctx) {
      yield* ctx.sleepMs(10);
      woke = true;
    });
    const r = sched.runFrame();
    expect(r.status).toBe('yielded');
    expect(r.event).toEqual({ reason: 'sleep', wakeAtTicks: 327 });
    expect(woke).toBe(false);

    clock.advanceTicks(100);
    expect(sched.runFrame().event).toEqual({ reason: 'sleep', wakeAtTicks: 327 });
    clock.advanceTicks(227);
    expect(sched.runFrame().status).toBe('finished');
    expect(woke).toBe(true);
  });

  it('runs background callbacks while sleeping', () => {
    const { sched, callbacks } = setup({ spinChecks: 3 });
    let runs = 0;
    const tick: BackgroundCallback<void> = backgroundCallback<void>(() => {
      runs++;
      callbacks.enqueue(tick);
    }, undefined);
    sched.load(function* (ctx) {
      ctx.enqueue(tick);
      yield* ctx.sleepTicks(10);
    });
    const r = sched.runFrame();
    expect(r.status).toBe('yielded');
    // three spins, each draining up to four rounds of the self-requeueing callback
    expect(runs).toBe(12);
    expect(r.callbacksRun).toBe(12);
    expect(r.deferredCallbacks).toBe(1);
  });

  it('a zero-length sleep returns without yielding', () => {
    const { sched } = setup();
    sched.load(function* (ctx) {
      yield* ctx.sleepTicks(0);
      yield* ctx.sleepMs(-1);
    });
    expect(sched.runFrame().status).toBe('finished');
  });

  it('waitForInput resumes when the host injects the level', () => {
    const { sched, bank } = setup({}, { inputPolicy: 'injection-wins' });
    let pressed: boolean | undefined;
    sched.load(function* (ctx) {
      ctx.bank.setPull(2, Pull.Up);
      pressed = yield* ctx.waitForInput(2, false, 1000);
    });
    expect(sched.runFrame().event).toEqual({ reason: 'wait-input', pin: 2 });
    bank.injectInput(2, false);
    expect(sched.runFrame().status).toBe('finished');
    expect(pressed).toBe(true);
  });

  it('waitForInput gives up after its timeout', () => {
    const { sched, clock } = setup();
    let pressed: boolean | undefined;
    sched.load(function* (ctx) {
      ctx.bank.setPull(2, Pull.Up);
      pressed = yield* ctx.waitForInput(2, false, 1000);
    });
    sched.runFrame();
    clock.advanceTicks(1000);
    expect(sched.runFrame().status).toBe('finished');
    expect(pressed).toBe(false);
  });

  it('waitForInput returns at once when the pin already reads the level', () => {
    const { sched } = setup();
    let result: boolean | undefined;
    sched.load(function* (ctx) {
      result = yield* ctx.waitForInput(5, false);
    });
    expect(sched.runFrame().status).toBe('finished');
    expect(result).toBe(true);
  });
});

describe('CooperativeScheduler background callbacks', () => {
  it('drains queued callbacks before resuming the guest', () => {
    const { sched, callbacks } = setup();
    const order: string[] = [];
    callbacks.enqueue(backgroundCallback((s: string) => order.push(s), 'cb'));
    sched.load(function* () {
      order.push('guest');
    });
    const r = sched.runFrame();
    expect(order).toEqual(['cb', 'guest']);
    expect(r.callbacksRun).toBe(1);
  });

  it('counts callbacks the guest drains itself', () => {
    const { sched } = setup();
    let ran = false;
    sched.load(function* (ctx) {
      ctx.enqueue(backgroundCallback(() => { ran = true; }, undefined));
      ctx.runBackgroundTasks();
      ctx.requestYield();
      yield* ctx.checkpoint();
    });
    const r = sched.runFrame();
    expect(ran).toBe(true);
    expect(r.callbacksRun).toBe(1);
  });

  it('defers callback storms past maxDrainRounds to the next frame', () => {
    const { sched, callbacks } = setup({ maxDrainRounds: 2 });
    let runs = 0;
    const storm: BackgroundCallback<void> = backgroundCallback<void>(() => {
      runs++;
      callbacks.enqueue(storm);
    }, undefined);
    callbacks.enqueue(storm);
    const r = sched.runFrame();
    expect(r.callbacksRun).toBe(2);
    expect(r.deferredCallbacks).toBe(1);
    sched.runFrame();
    expect(runs).toBe(4);
  });
});

describe('CooperativeScheduler errors', () => {
  function crashing() {
    return function* (): Generator<never, void, void> {
      throw new Error('guest fault');
    };
  }

  it('records guest errors and marks the frame crashed', () => {
    const { sched, clock } = setup();
    sched.load(crashing());
    const r = sched.runFrame();
    expect(r.status).toBe('crashed');
    expect(sched.guestErrors).toHaveLength(1);
    expect(sched.lastGuestError).toBeInstanceOf(Error);
    expect(sched.hasTask).toBe(false);
    expect(clock.yieldCount()).toBe(1);
  });

  it('ignore mode keeps only the last error', () => {
    const { sched } = setup({ onGuestError: 'ignore' });
    sched.load(crashing());
    expect(sched.runFrame().status).toBe('crashed');
    expect(sched.guestErrors).toHaveLength(0);
    expect(sched.lastGuestError).toBeInstanceOf(Error);
  });

  it('throw mode rethrows from runFrame', () => {
    const { sched, clock } = setup({ onGuestError: 'throw' });
    sched.load(crashing());
    expect(() => sched.runFrame()).toThrow('guest fault');
    expect(sched.hasTask).toBe(false);
    expect(clock.yieldCount()).toBe(1);
  });

  it('records callback errors and keeps running the guest', () => {
    const { sched, callbacks } = setup();
    let guestRan = false;
    callbacks.enqueue(backgroundCallback(() => { throw new Error('cb fault'); }, undefined));
    sched.load(function* () {
      guestRan = true;
    });
    const r = sched.runFrame();
    expect(r.status).toBe('finished');
    expect(guestRan).toBe(true);
    expect(sched.callbackErrors).toHaveLength(1);
    expect(sched.lastCallbackError).toBeInstanceOf(Error);
  });

  it('callback throw mode propagates out of runFrame', () => {
    const { sched, callbacks } = setup({ onCallbackError: 'throw' });
    callbacks.enqueue(backgroundCallback(() => { throw new Error('cb fault'); }, undefined));
    expect(() => sched.runFrame()).toThrow('cb fault');
    expect(sched.callbackErrors).toHaveLength(0);
  });
});

describe('CooperativeScheduler lifecycle', () => {
  it('stop runs the program finally blocks and leaves the scheduler idle', () => {
    const { sched } = setup();
    let cleaned = false;
    sched.load(function* (ctx) {
      try {
        for (;;) {
          ctx.requestYield();
          yield* ctx.checkpoint();
        }
      } finally {
        cleaned = true;
      }
    });
    expect(sched.runFrame().status).toBe('yielded');
    sched.stop();
    expect(cleaned).toBe(true);
    expect(sched.runFrame().status).toBe('idle');
  });

  it('loading a program stops the previous one', () => {
    const { sched } = setup();
    let firstCleaned = false;
    const log: string[] = [];
    sched.load(function* (ctx) {
      try {
        ctx.requestYield();
        yield* ctx.checkpoint();
        log.push('first');
      } finally {
        firstCleaned = true;
      }
    });
    sched.runFrame();
    sched.load(function* () {
      log.push('second');
    });
    expect(firstCleaned).toBe(true);
    sched.runFrame();
    expect(log).toEqual(['second']);
  });

  it('a program may load its successor from inside its own frame', () => {
    const { sched } = setup();
    const log: string[] = [];
    sched.load(function* (ctx) {
      try {
        sched.load(function* () {
          log.push('second');
        });
        log.push('first');
        ctx.requestYield();
        yield* ctx.checkpoint();
        log.push('first resumed');
      } finally {
        log.push('first cleaned');
      }
    });
    expect(sched.runFrame().status).toBe('yielded');
    expect(log).toEqual(['first', 'first cleaned']);
    expect(sched.hasTask).toBe(true);
    expect(sched.runFrame().status).toBe('finished');
    expect(log).toEqual(['first', 'first cleaned', 'second']);
  });

  it('emits tagged trace lines per frame', () => {
    const lines: string[] = [];
    const { sched } = setup({ trace: (tag, msg) => lines.push(`[${tag}] ${msg}`) });
    sched.runFrame();
    expect(lines).toEqual(['[SCHED] frame 1 idle cb=0 deferred=0']);
  });
});
