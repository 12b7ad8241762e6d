import type { RegisterBank } from '../hardware/registerBank';
import { Direction, DriveMode, Pull } from '../hardware/types';
import { PinReference } from './pins';

export interface OutputConfig {
  value?: boolean;
  driveMode?: DriveMode;
}

export interface InputConfig {
  pull?: Pull;
}

export class DigitalInOut extends PinReference {
  constructor(bank: RegisterBank, pin: number) {
    super(bank, pin);
    bank.setDirection(pin, Direction.Input);
    bank.setPull(pin, Pull.None);
    bank.setOpenDrain(pin, false);
  }

  switchToOutput(cfg: OutputConfig = {}): void {
    this.check();
    this.bank.setDirection(this.pin, Direction.Output);
    this.bank.setOpenDrain(this.pin, cfg.driveMode === DriveMode.OpenDrain);
    this.bank.setValue(this.pin, cfg.value ?? false);
  }

  switchToInput(cfg: InputConfig = {}): void {
    this.check();
    this.bank.setDirection(this.pin, Direction.Input);
    this.bank.setPull(this.pin, cfg.pull ?? Pull.None);
  }

  get direction(): Direction {
    this.check();
    return this.bank.getDirection(this.pin);
  }

  set direction(dir: Direction) {
    if (dir === Direction.Output) this.switchToOutput();
    else this.switchToInput();
  }

  get value(): boolean {
    this.check();
    return this.bank.getValue(this.pin);
  }

  // Dropped by the bank while the pin is an input
  set value(v: boolean) {
    this.check();
    this.bank.setValue(this.pin, v);
  }

  get pull(): Pull {
    this.check();
    return this.bank.getPull(this.pin);
  }

  set pull(p: Pull) {
    this.check();
    this.bank.setPull(this.pin, p);
  }

  get driveMode(): DriveMode {
    this.check();
    return this.bank.getOpenDrain(this.pin) ? DriveMode.OpenDrain : DriveMode.PushPull;
  }

  set driveMode(mode: DriveMode) {
    this.check();
    this.bank.setOpenDrain(this.pin, mode === DriveMode.OpenDrain);
  }

  // Keep this pin's configuration across soft resets (status LEDs, display control lines)
  neverReset(): void {
    this.check();
    this.bank.setNeverReset(this.pin, true);
  }

  protected release(): void {
    this.bank.setDirection(this.pin, Direction.Input);
    this.bank.setPull(this.pin, Pull.None);
  }
}
