import type { RegisterBank } from '../hardware/registerBank';
import { PinReference } from './pins';

export const ADC_REFERENCE_VOLTAGE = 3.3;

// ADC channel handle. Readings are whatever the host last injected (mid-scale until then).
export class AnalogIn extends PinReference {
  constructor(bank: RegisterBank, pin: number) {
    super(bank, pin);
    bank.initAnalog(pin, false);
  }

  get value(): number {
    this.check();
    return this.bank.readAnalog(this.pin);
  }

  get referenceVoltage(): number {
    return ADC_REFERENCE_VOLTAGE;
  }

  get voltage(): number {
    return (this.value / 0xffff) * ADC_REFERENCE_VOLTAGE;
  }

  protected release(): void {
    this.bank.deinitAnalog(this.pin);
  }
}
