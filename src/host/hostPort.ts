import type { RegisterBank, RegisterBankMemory } from '../hardware/registerBank';
import type { AnalogPinState, GpioPinState, PwmChannelState } from '../hardware/types';
import type { VirtualClock } from '../clock/virtualClock';
import type { TimeMode } from '../clock/timing';
import type { BackgroundCallbackQueue, DrainResult } from '../scheduler/callbackQueue';
import type { CooperativeScheduler } from '../scheduler/cooperativeScheduler';

// The controlling environment's view of a board: it plays the outside world
// (inputs, probes) and the crystal. Host-only fields are written only from here.
export class HostPort {
  constructor(
    private readonly bank: RegisterBank,
    private readonly clock: VirtualClock,
    private readonly scheduler: CooperativeScheduler,
    private readonly callbacks: BackgroundCallbackQueue,
  ) {}

  injectInput(pin: number, value: boolean): void {
    this.bank.injectInput(pin, value);
  }

  observeOutput(pin: number): boolean {
    return this.bank.observeOutput(pin);
  }

  injectAnalogInput(pin: number, value: number): void {
    this.bank.injectAnalogInput(pin, value);
  }

  observeAnalogOutput(pin: number): number {
    return this.bank.observeAnalogOutput(pin);
  }

  observePwm(pin: number): PwmChannelState {
    return this.bank.pwmConfig(pin);
  }

  pinConfig(pin: number): GpioPinState {
    return this.bank.gpioConfig(pin);
  }

  analogConfig(pin: number): AnalogPinState {
    return this.bank.analogConfig(pin);
  }

  writeTicks(ticks: number): boolean {
    return this.clock.writeTicks(ticks);
  }

  advanceTicks(delta: number): boolean {
    return this.clock.advanceTicks(delta);
  }

  ticks(): number {
    return this.clock.ticks();
  }

  setTimeMode(mode: TimeMode): void {
    this.clock.timeMode = mode;
  }

  get timeMode(): TimeMode {
    return this.clock.timeMode;
  }

  pendingCallbacks(): number {
    return this.callbacks.size;
  }

  // Runs queued background work outside a frame, e.g. while the guest is parked
  drainCallbacks(): DrainResult {
    return this.scheduler.runBackgroundTasks();
  }

  yieldCount(): number {
    return this.clock.yieldCount();
  }

  memory(): RegisterBankMemory {
    return this.bank.memory();
  }

  clockMemory(): Uint8Array {
    return this.clock.memory();
  }

  digest(): string {
    return this.bank.digest();
  }
}
