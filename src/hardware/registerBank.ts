import {
  ANALOG_LAYOUT,
  ANALOG_MAX,
  ANALOG_MIDSCALE,
  Direction,
  GPIO_LAYOUT,
  PIN_COUNT,
  PWM_DEFAULT_FREQUENCY,
  PWM_LAYOUT,
  Pull,
  isValidPin,
} from './types';
import type { AnalogPinState, GpioPinState, InputPolicy, PwmChannelState } from './types';
import { fnv1aHex } from '../utils/hash';

export interface RegisterBankOptions {
  inputPolicy?: InputPolicy;
}

export interface RegisterBankMemory {
  gpio: Uint8Array;
  analog: Uint8Array;
  pwm: Uint8Array;
}

function clampU16(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.max(0, Math.min(ANALOG_MAX, Math.round(v)));
}

const U32_MAX = 0xffffffff;

function normaliseDirection(dir: number): Direction {
  return dir === Direction.Output ? Direction.Output : Direction.Input;
}

function normalisePull(pull: number): Pull {
  if (pull === Pull.Up) return Pull.Up;
  if (pull === Pull.Down) return Pull.Down;
  return Pull.None;
}

// Single source of truth for all simulated pin state.
// Guest-side setters model what firmware can do to the silicon; host-side methods
// model the outside world (buttons, sensors, probes). Nothing here throws: bad pins
// and wrong roles behave like hardware that does not respond.
export class RegisterBank {
  readonly inputPolicy: InputPolicy;

  private readonly gpio = new Uint8Array(PIN_COUNT * GPIO_LAYOUT.stride);
  private readonly analogBytes = new Uint8Array(PIN_COUNT * ANALOG_LAYOUT.stride);
  private readonly analog = new DataView(this.analogBytes.buffer);
  private readonly pwmBytes = new Uint8Array(PIN_COUNT * PWM_LAYOUT.stride);
  private readonly pwm = new DataView(this.pwmBytes.buffer);

  constructor(opts: RegisterBankOptions = {}) {
    this.inputPolicy = opts.inputPolicy ?? 'pull-wins';
    for (let pin = 0; pin < PIN_COUNT; pin++) {
      this.analog.setUint16(pin * ANALOG_LAYOUT.stride + ANALOG_LAYOUT.value, ANALOG_MIDSCALE, true);
      this.pwm.setUint8(pin * PWM_LAYOUT.stride + PWM_LAYOUT.variableFrequency, 1);
      this.pwm.setUint32(pin * PWM_LAYOUT.stride + PWM_LAYOUT.frequency, PWM_DEFAULT_FREQUENCY, true);
    }
  }

  private g(pin: number, field: number): number {
    return this.gpio[pin * GPIO_LAYOUT.stride + field];
  }

  private setG(pin: number, field: number, v: number): void {
    this.gpio[pin * GPIO_LAYOUT.stride + field] = v & 0xff;
  }

  // ---------------------------------------------------------------------------
  // GPIO (guest)

  setDirection(pin: number, dir: Direction): void {
    if (!isValidPin(pin)) return;
    const next = normaliseDirection(dir);
    if (this.g(pin, GPIO_LAYOUT.direction) !== next) this.setG(pin, GPIO_LAYOUT.injected, 0);
    this.setG(pin, GPIO_LAYOUT.direction, next);
  }

  getDirection(pin: number): Direction {
    if (!isValidPin(pin)) return Direction.Input;
    return normaliseDirection(this.g(pin, GPIO_LAYOUT.direction));
  }

  setPull(pin: number, pull: Pull): void {
    if (!isValidPin(pin)) return;
    this.setG(pin, GPIO_LAYOUT.pull, normalisePull(pull));
  }

  getPull(pin: number): Pull {
    if (!isValidPin(pin)) return Pull.None;
    return normalisePull(this.g(pin, GPIO_LAYOUT.pull));
  }

  setOpenDrain(pin: number, openDrain: boolean): void {
    if (!isValidPin(pin)) return;
    this.setG(pin, GPIO_LAYOUT.openDrain, openDrain ? 1 : 0);
  }

  getOpenDrain(pin: number): boolean {
    if (!isValidPin(pin)) return false;
    return this.g(pin, GPIO_LAYOUT.openDrain) !== 0;
  }

  // Hardware cannot drive a pin configured as input: the write is dropped.
  setValue(pin: number, value: boolean): void {
    if (!isValidPin(pin)) return;
    if (this.g(pin, GPIO_LAYOUT.direction) !== Direction.Output) return;
    this.setG(pin, GPIO_LAYOUT.value, value ? 1 : 0);
  }

  getValue(pin: number): boolean {
    if (!isValidPin(pin)) return false;
    if (this.g(pin, GPIO_LAYOUT.direction) === Direction.Output) {
      return this.g(pin, GPIO_LAYOUT.value) !== 0;
    }
    if (this.inputPolicy === 'injection-wins' && this.g(pin, GPIO_LAYOUT.injected) !== 0) {
      return this.g(pin, GPIO_LAYOUT.value) !== 0;
    }
    // Floating inputs read low
    return this.g(pin, GPIO_LAYOUT.pull) === Pull.Up;
  }

  // Pin claims share the GPIO enabled byte: a pin is in use whatever peripheral holds it.
  claim(pin: number): boolean {
    if (!isValidPin(pin) || this.g(pin, GPIO_LAYOUT.enabled) !== 0) return false;
    this.setG(pin, GPIO_LAYOUT.enabled, 1);
    return true;
  }

  release(pin: number): void {
    if (!isValidPin(pin)) return;
    this.setG(pin, GPIO_LAYOUT.enabled, 0);
    this.setG(pin, GPIO_LAYOUT.neverReset, 0);
  }

  isClaimed(pin: number): boolean {
    if (!isValidPin(pin)) return false;
    return this.g(pin, GPIO_LAYOUT.enabled) !== 0;
  }

  setNeverReset(pin: number, neverReset: boolean): void {
    if (!isValidPin(pin)) return;
    this.setG(pin, GPIO_LAYOUT.neverReset, neverReset ? 1 : 0);
  }

  // ---------------------------------------------------------------------------
  // Analog (guest)

  private aOff(pin: number): number {
    return pin * ANALOG_LAYOUT.stride;
  }

  initAnalog(pin: number, isOutput: boolean): void {
    if (!isValidPin(pin)) return;
    const o = this.aOff(pin);
    this.analog.setUint8(o + ANALOG_LAYOUT.isOutput, isOutput ? 1 : 0);
    this.analog.setUint8(o + ANALOG_LAYOUT.enabled, 1);
    // ADC idles at mid-scale, DAC starts at 0 V
    this.analog.setUint16(o + ANALOG_LAYOUT.value, isOutput ? 0 : ANALOG_MIDSCALE, true);
  }

  deinitAnalog(pin: number): void {
    if (!isValidPin(pin)) return;
    this.analog.setUint8(this.aOff(pin) + ANALOG_LAYOUT.enabled, 0);
  }

  readAnalog(pin: number): number {
    if (!this.isAnalogEnabled(pin)) return 0;
    return this.analog.getUint16(this.aOff(pin) + ANALOG_LAYOUT.value, true);
  }

  writeAnalog(pin: number, value: number): void {
    if (!this.isAnalogOutput(pin)) return;
    this.analog.setUint16(this.aOff(pin) + ANALOG_LAYOUT.value, clampU16(value), true);
  }

  isAnalogEnabled(pin: number): boolean {
    if (!isValidPin(pin)) return false;
    return this.analog.getUint8(this.aOff(pin) + ANALOG_LAYOUT.enabled) !== 0;
  }

  isAnalogOutput(pin: number): boolean {
    if (!this.isAnalogEnabled(pin)) return false;
    return this.analog.getUint8(this.aOff(pin) + ANALOG_LAYOUT.isOutput) !== 0;
  }

  // ---------------------------------------------------------------------------
  // PWM (guest)

  private pOff(pin: number): number {
    return pin * PWM_LAYOUT.stride;
  }

  pwmInit(pin: number, dutyCycle: number, frequency: number, variableFrequency: boolean): void {
    if (!isValidPin(pin)) return;
    const o = this.pOff(pin);
    this.pwm.setUint8(o + PWM_LAYOUT.enabled, 1);
    this.pwm.setUint16(o + PWM_LAYOUT.dutyCycle, clampU16(dutyCycle), true);
    const hz = Number.isFinite(frequency) ? Math.min(U32_MAX, Math.max(1, Math.floor(frequency))) : PWM_DEFAULT_FREQUENCY;
    this.pwm.setUint32(o + PWM_LAYOUT.frequency, hz, true);
    this.pwm.setUint8(o + PWM_LAYOUT.variableFrequency, variableFrequency ? 1 : 0);
    this.pwm.setUint8(o + PWM_LAYOUT.neverReset, 0);
  }

  pwmDeinit(pin: number): void {
    if (!isValidPin(pin)) return;
    this.pwm.setUint8(this.pOff(pin) + PWM_LAYOUT.enabled, 0);
  }

  isPwmEnabled(pin: number): boolean {
    if (!isValidPin(pin)) return false;
    return this.pwm.getUint8(this.pOff(pin) + PWM_LAYOUT.enabled) !== 0;
  }

  setDutyCycle(pin: number, duty: number): void {
    if (!this.isPwmEnabled(pin)) return;
    this.pwm.setUint16(this.pOff(pin) + PWM_LAYOUT.dutyCycle, clampU16(duty), true);
  }

  getDutyCycle(pin: number): number {
    if (!this.isPwmEnabled(pin)) return 0;
    return this.pwm.getUint16(this.pOff(pin) + PWM_LAYOUT.dutyCycle, true);
  }

  // Returns false when the channel is disabled, was created with a fixed frequency, or the
  // value is outside 1..0xffffffff Hz.
  setFrequency(pin: number, frequency: number): boolean {
    if (!this.isVariableFrequency(pin)) return false;
    if (!Number.isFinite(frequency) || frequency < 1 || frequency > U32_MAX) return false;
    this.pwm.setUint32(this.pOff(pin) + PWM_LAYOUT.frequency, Math.floor(frequency), true);
    return true;
  }

  getFrequency(pin: number): number {
    if (!this.isPwmEnabled(pin)) return 0;
    return this.pwm.getUint32(this.pOff(pin) + PWM_LAYOUT.frequency, true);
  }

  isVariableFrequency(pin: number): boolean {
    if (!this.isPwmEnabled(pin)) return false;
    return this.pwm.getUint8(this.pOff(pin) + PWM_LAYOUT.variableFrequency) !== 0;
  }

  setPwmNeverReset(pin: number, neverReset: boolean): void {
    if (!isValidPin(pin)) return;
    this.pwm.setUint8(this.pOff(pin) + PWM_LAYOUT.neverReset, neverReset ? 1 : 0);
  }

  // ---------------------------------------------------------------------------
  // Host side: injection and observation

  injectInput(pin: number, value: boolean): void {
    if (!isValidPin(pin)) return;
    if (this.g(pin, GPIO_LAYOUT.direction) !== Direction.Input) return;
    this.setG(pin, GPIO_LAYOUT.value, value ? 1 : 0);
    this.setG(pin, GPIO_LAYOUT.injected, 1);
  }

  observeOutput(pin: number): boolean {
    if (!isValidPin(pin)) return false;
    if (this.g(pin, GPIO_LAYOUT.direction) !== Direction.Output) return false;
    return this.g(pin, GPIO_LAYOUT.value) !== 0;
  }

  injectAnalogInput(pin: number, value: number): void {
    if (!this.isAnalogEnabled(pin) || this.isAnalogOutput(pin)) return;
    this.analog.setUint16(this.aOff(pin) + ANALOG_LAYOUT.value, clampU16(value), true);
  }

  observeAnalogOutput(pin: number): number {
    if (!this.isAnalogOutput(pin)) return 0;
    return this.analog.getUint16(this.aOff(pin) + ANALOG_LAYOUT.value, true);
  }

  gpioConfig(pin: number): GpioPinState {
    if (!isValidPin(pin)) {
      return { value: false, direction: Direction.Input, pull: Pull.None, openDrain: false, enabled: false, neverReset: false, injected: false };
    }
    return {
      value: this.g(pin, GPIO_LAYOUT.value) !== 0,
      direction: this.getDirection(pin),
      pull: this.getPull(pin),
      openDrain: this.getOpenDrain(pin),
      enabled: this.isClaimed(pin),
      neverReset: this.g(pin, GPIO_LAYOUT.neverReset) !== 0,
      injected: this.g(pin, GPIO_LAYOUT.injected) !== 0,
    };
  }

  analogConfig(pin: number): AnalogPinState {
    if (!isValidPin(pin)) return { value: 0, isOutput: false, enabled: false };
    const o = this.aOff(pin);
    return {
      value: this.analog.getUint16(o + ANALOG_LAYOUT.value, true),
      isOutput: this.analog.getUint8(o + ANALOG_LAYOUT.isOutput) !== 0,
      enabled: this.analog.getUint8(o + ANALOG_LAYOUT.enabled) !== 0,
    };
  }

  pwmConfig(pin: number): PwmChannelState {
    if (!isValidPin(pin)) {
      return { dutyCycle: 0, frequency: 0, variableFrequency: false, enabled: false, neverReset: false };
    }
    const o = this.pOff(pin);
    return {
      dutyCycle: this.pwm.getUint16(o + PWM_LAYOUT.dutyCycle, true),
      frequency: this.pwm.getUint32(o + PWM_LAYOUT.frequency, true),
      variableFrequency: this.pwm.getUint8(o + PWM_LAYOUT.variableFrequency) !== 0,
      enabled: this.pwm.getUint8(o + PWM_LAYOUT.enabled) !== 0,
      neverReset: this.pwm.getUint8(o + PWM_LAYOUT.neverReset) !== 0,
    };
  }

  // Live views over the banks; offsets follow GPIO_LAYOUT / ANALOG_LAYOUT / PWM_LAYOUT.
  memory(): RegisterBankMemory {
    return { gpio: this.gpio, analog: this.analogBytes, pwm: this.pwmBytes };
  }

  digest(): string {
    return fnv1aHex(this.gpio, this.analogBytes, this.pwmBytes);
  }

  // Soft reset between guest runs. Pins marked never-reset keep their GPIO/PWM state.
  softReset(): void {
    for (let pin = 0; pin < PIN_COUNT; pin++) {
      if (this.g(pin, GPIO_LAYOUT.neverReset) === 0) {
        const base = pin * GPIO_LAYOUT.stride;
        this.gpio.fill(0, base, base + GPIO_LAYOUT.stride);
      }

      const a = this.aOff(pin);
      this.analog.setUint16(a + ANALOG_LAYOUT.value, ANALOG_MIDSCALE, true);
      this.analog.setUint8(a + ANALOG_LAYOUT.isOutput, 0);
      this.analog.setUint8(a + ANALOG_LAYOUT.enabled, 0);

      const p = this.pOff(pin);
      if (this.pwm.getUint8(p + PWM_LAYOUT.neverReset) === 0) {
        this.pwm.setUint16(p + PWM_LAYOUT.dutyCycle, 0, true);
        this.pwm.setUint32(p + PWM_LAYOUT.frequency, PWM_DEFAULT_FREQUENCY, true);
        this.pwm.setUint8(p + PWM_LAYOUT.variableFrequency, 1);
        this.pwm.setUint8(p + PWM_LAYOUT.enabled, 0);
      }
    }
  }
}
