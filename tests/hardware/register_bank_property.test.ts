import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { RegisterBank } from '../../src/hardware/registerBank';
import { Direction, Pull } from '../../src/hardware/types';

const pinArb = fc.integer({ min: 0, max: 63 });
const pullArb = fc.constantFrom(Pull.None, Pull.Up, Pull.Down);

describe('RegisterBank properties', () => {
  it('an output reads back the last value written to it', () => {
    fc.assert(
      fc.property(pinArb, fc.array(fc.boolean(), { minLength: 1, maxLength: 20 }), (pin, writes) => {
        const bank = new RegisterBank();
        bank.setDirection(pin, Direction.Output);
        for (const v of writes) bank.setValue(pin, v);
        expect(bank.getValue(pin)).toBe(writes[writes.length - 1]);
        expect(bank.observeOutput(pin)).toBe(writes[writes.length - 1]);
      }),
    );
  });

  it('under pull-wins an input reads its pull whatever the host injects', () => {
    fc.assert(
      fc.property(pinArb, pullArb, fc.array(fc.boolean(), { maxLength: 10 }), (pin, pull, injected) => {
        const bank = new RegisterBank();
        bank.setPull(pin, pull);
        for (const v of injected) bank.injectInput(pin, v);
        expect(bank.getValue(pin)).toBe(pull === Pull.Up);
      }),
    );
  });

  it('writes to an input never change what it reads', () => {
    fc.assert(
      fc.property(pinArb, pullArb, fc.boolean(), (pin, pull, v) => {
        const bank = new RegisterBank();
        bank.setPull(pin, pull);
        const before = bank.getValue(pin);
        bank.setValue(pin, v);
        expect(bank.getValue(pin)).toBe(before);
      }),
    );
  });

  it('pins outside 0..63 leave the bank untouched', () => {
    fc.assert(
      fc.property(
        fc.oneof(fc.integer({ min: -1000, max: -1 }), fc.integer({ min: 64, max: 100000 })),
        fc.integer({ min: 0, max: 0xffff }),
        (pin, v) => {
          const bank = new RegisterBank();
          const before = bank.digest();
          bank.setDirection(pin, Direction.Output);
          bank.setValue(pin, true);
          bank.initAnalog(pin, true);
          bank.writeAnalog(pin, v);
          bank.injectAnalogInput(pin, v);
          bank.pwmInit(pin, v, 1000, true);
          expect(bank.digest()).toBe(before);
          expect(bank.getValue(pin)).toBe(false);
          expect(bank.readAnalog(pin)).toBe(0);
        },
      ),
    );
  });

  it('DAC writes always land inside 0..65535', () => {
    fc.assert(
      fc.property(pinArb, fc.double({ min: -1e6, max: 1e6, noNaN: true }), (pin, v) => {
        const bank = new RegisterBank();
        bank.initAnalog(pin, true);
        bank.writeAnalog(pin, v);
        const read = bank.readAnalog(pin);
        expect(read).toBe(Math.max(0, Math.min(0xffff, Math.round(v))));
      }),
    );
  });
});
