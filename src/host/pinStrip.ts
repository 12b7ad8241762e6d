import { PNG } from 'pngjs';
import type { RegisterBank } from '../hardware/registerBank';
import { Direction, PIN_COUNT } from '../hardware/types';

export type Rgb = readonly [number, number, number];

export const STRIP_COLORS = {
  unused: [32, 32, 32],
  outputHigh: [0, 255, 0],
  outputLow: [0, 96, 0],
  inputHigh: [0, 128, 255],
  inputLow: [0, 0, 128],
} as const satisfies Record<string, Rgb>;

// Row 0: GPIO level/direction, row 1: analog value as grey, row 2: PWM duty as red.
export const STRIP_ROWS = 3;

function gpioColor(bank: RegisterBank, pin: number): Rgb {
  if (!bank.isClaimed(pin)) return STRIP_COLORS.unused;
  const high = bank.getValue(pin);
  if (bank.getDirection(pin) === Direction.Output) return high ? STRIP_COLORS.outputHigh : STRIP_COLORS.outputLow;
  return high ? STRIP_COLORS.inputHigh : STRIP_COLORS.inputLow;
}

function analogColor(bank: RegisterBank, pin: number): Rgb {
  if (!bank.isAnalogEnabled(pin)) return STRIP_COLORS.unused;
  const v = bank.readAnalog(pin) >>> 8;
  return [v, v, v];
}

function pwmColor(bank: RegisterBank, pin: number): Rgb {
  if (!bank.isPwmEnabled(pin)) return STRIP_COLORS.unused;
  return [bank.getDutyCycle(pin) >>> 8, 0, 0];
}

// One scale x scale block per pin and row
export function renderPinStrip(bank: RegisterBank, scale = 1): PNG {
  const s = Math.max(1, Math.floor(scale));
  const png = new PNG({ width: PIN_COUNT * s, height: STRIP_ROWS * s });
  const rows = [gpioColor, analogColor, pwmColor];
  for (let row = 0; row < STRIP_ROWS; row++) {
    for (let pin = 0; pin < PIN_COUNT; pin++) {
      const [r, g, b] = rows[row](bank, pin);
      for (let dy = 0; dy < s; dy++) {
        for (let dx = 0; dx < s; dx++) {
          const i = ((row * s + dy) * png.width + pin * s + dx) * 4;
          png.data[i] = r;
          png.data[i + 1] = g;
          png.data[i + 2] = b;
          png.data[i + 3] = 0xff;
        }
      }
    }
  }
  return png;
}

export function encodePinStrip(bank: RegisterBank, scale = 1): Buffer {
  return PNG.sync.write(renderPinStrip(bank, scale));
}
