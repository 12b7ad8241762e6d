import type { RegisterBank } from '../hardware/registerBank';
import { PIN_COUNT, isValidPin } from '../hardware/types';

// Board silkscreen aliases on top of GPIO0..GPIO63
export const PIN_ALIASES: Readonly<Record<string, number>> = {
  LED: 13,
  BUTTON: 2,
  A0: 26,
  A1: 27,
  A2: 28,
  A3: 29,
  A4: 30,
  A5: 31,
};

export function pinName(pin: number): string {
  return `GPIO${pin}`;
}

// Accepts "GPIO13", "D13", "13" or an alias. Unknown names resolve to undefined.
export function resolvePin(name: string): number | undefined {
  const key = name.trim().toUpperCase();
  const alias = PIN_ALIASES[key];
  if (alias !== undefined) return alias;
  const m = /^(?:GPIO|D)?(\d{1,2})$/.exec(key);
  if (!m) return undefined;
  const n = Number(m[1]);
  return n < PIN_COUNT ? n : undefined;
}

// Base for interpreter-level pin handles. A handle is only (bank, pin): all state lives
// in the bank, so two handles can never disagree about a pin.
export abstract class PinReference {
  private claimed: boolean;

  protected constructor(protected readonly bank: RegisterBank, readonly pin: number) {
    if (!isValidPin(pin)) throw new RangeError(`Invalid pin ${pin}`);
    if (!bank.claim(pin)) throw new Error(`${pinName(pin)} in use`);
    this.claimed = true;
  }

  get deinited(): boolean {
    return !this.claimed;
  }

  deinit(): void {
    if (!this.claimed) return;
    this.release();
    this.bank.release(this.pin);
    this.claimed = false;
  }

  protected check(): void {
    if (!this.claimed) throw new Error('Object has been deinitialized and can no longer be used');
  }

  // Peripheral-specific teardown before the pin claim is dropped
  protected abstract release(): void;
}
