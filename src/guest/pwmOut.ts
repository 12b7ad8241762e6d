import type { RegisterBank } from '../hardware/registerBank';
import { PWM_DEFAULT_FREQUENCY } from '../hardware/types';
import { PinReference } from './pins';

export interface PwmOutConfig {
  dutyCycle?: number;
  frequency?: number;
  variableFrequency?: boolean;
}

export class PwmOut extends PinReference {
  constructor(bank: RegisterBank, pin: number, cfg: PwmOutConfig = {}) {
    super(bank, pin);
    bank.pwmInit(pin, cfg.dutyCycle ?? 0, cfg.frequency ?? PWM_DEFAULT_FREQUENCY, cfg.variableFrequency ?? false);
  }

  get dutyCycle(): number {
    this.check();
    return this.bank.getDutyCycle(this.pin);
  }

  set dutyCycle(duty: number) {
    this.check();
    this.bank.setDutyCycle(this.pin, duty);
  }

  get frequency(): number {
    this.check();
    return this.bank.getFrequency(this.pin);
  }

  set frequency(hz: number) {
    this.check();
    if (!this.bank.isVariableFrequency(this.pin)) {
      throw new Error('PWM frequency not writable when variableFrequency is false');
    }
    if (!this.bank.setFrequency(this.pin, hz)) throw new RangeError(`Invalid PWM frequency ${hz}`);
  }

  get variableFrequency(): boolean {
    this.check();
    return this.bank.isVariableFrequency(this.pin);
  }

  neverReset(): void {
    this.check();
    this.bank.setPwmNeverReset(this.pin, true);
    this.bank.setNeverReset(this.pin, true);
  }

  protected release(): void {
    this.bank.pwmDeinit(this.pin);
    this.bank.setPwmNeverReset(this.pin, false);
  }
}
