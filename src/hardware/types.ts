// Virtual peripheral register layouts shared by guest code and the host.
// Offsets are part of the host contract: the host reads the banks through raw views.

export const PIN_COUNT = 64;

// Full-scale fixed-point analog sample
export const ANALOG_MAX = 0xffff;
export const ANALOG_MIDSCALE = 32768;

export const PWM_DEFAULT_FREQUENCY = 500;

export const enum Direction {
  Input = 0,
  Output = 1,
}

export const enum Pull {
  None = 0,
  Up = 1,
  Down = 2,
}

export const enum DriveMode {
  PushPull = 0,
  OpenDrain = 1,
}

// How an Input pin resolves its level.
// 'pull-wins': derived from the pull configuration only (injected levels are stored, never read).
// 'injection-wins': a level injected since the pin became an input overrides the pull.
export type InputPolicy = 'pull-wins' | 'injection-wins';

export interface GpioPinState {
  value: boolean;
  direction: Direction;
  pull: Pull;
  openDrain: boolean;
  enabled: boolean;
  neverReset: boolean;
  injected: boolean;
}

export interface AnalogPinState {
  value: number; // 0..65535
  isOutput: boolean;
  enabled: boolean;
}

export interface PwmChannelState {
  dutyCycle: number; // 0..65535
  frequency: number; // Hz
  variableFrequency: boolean;
  enabled: boolean;
  neverReset: boolean;
}

// GPIO: 8 bytes per pin
export const GPIO_LAYOUT = {
  stride: 8,
  value: 0,
  direction: 1,
  pull: 2,
  openDrain: 3,
  enabled: 4,
  neverReset: 5,
  injected: 6,
} as const;

// Analog: 4 bytes per channel, value little endian
export const ANALOG_LAYOUT = {
  stride: 4,
  value: 0,
  isOutput: 2,
  enabled: 3,
} as const;

// PWM: 12 bytes per channel, little endian
export const PWM_LAYOUT = {
  stride: 12,
  dutyCycle: 0,
  enabled: 2,
  variableFrequency: 3,
  frequency: 4,
  neverReset: 8,
} as const;

export function isValidPin(pin: number): boolean {
  return Number.isInteger(pin) && pin >= 0 && pin < PIN_COUNT;
}
