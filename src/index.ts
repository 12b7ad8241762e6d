export * from './hardware/types';
export { RegisterBank } from './hardware/registerBank';
export type { RegisterBankOptions, RegisterBankMemory } from './hardware/registerBank';
export * from './clock/timing';
export { VirtualClock, CLOCK_LAYOUT } from './clock/virtualClock';
export type { ClockReader } from './clock/virtualClock';
export { BackgroundCallbackQueue, backgroundCallback } from './scheduler/callbackQueue';
export type { BackgroundCallback, DrainResult } from './scheduler/callbackQueue';
export { YieldController } from './scheduler/yieldController';
export { GuestContext } from './scheduler/guestContext';
export type { GuestProgram, GuestTask, YieldEvent, YieldReason } from './scheduler/guestContext';
export { CooperativeScheduler } from './scheduler/cooperativeScheduler';
export type { ErrorMode, FrameResult, FrameStatus, SchedulerOptions } from './scheduler/cooperativeScheduler';
export { PinReference, resolvePin, pinName, PIN_ALIASES } from './guest/pins';
export { DigitalInOut } from './guest/digitalInOut';
export { AnalogIn, ADC_REFERENCE_VOLTAGE } from './guest/analogIn';
export { AnalogOut } from './guest/analogOut';
export { PwmOut } from './guest/pwmOut';
export { Board } from './board/board';
export { boardOptionsFromEnv } from './board/env';
export type { BoardOptions, Env } from './board/env';
export { HostPort } from './host/hostPort';
export { ClockDriver } from './host/clockDriver';
export type { ClockStatistics, TimelineEntry } from './host/clockDriver';
export { HostLoop } from './host/hostLoop';
export { renderPinStrip, encodePinStrip, STRIP_COLORS } from './host/pinStrip';
