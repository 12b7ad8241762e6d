import type { RegisterBank } from '../hardware/registerBank';
import { PinReference } from './pins';

// DAC channel handle
export class AnalogOut extends PinReference {
  constructor(bank: RegisterBank, pin: number) {
    super(bank, pin);
    bank.initAnalog(pin, true);
  }

  get value(): number {
    this.check();
    return this.bank.readAnalog(this.pin);
  }

  set value(v: number) {
    this.check();
    this.bank.writeAnalog(this.pin, v);
  }

  protected release(): void {
    this.bank.deinitAnalog(this.pin);
  }
}
