import type { InputPolicy } from '../hardware/types';
import { TimeMode, parseTimeMode } from '../clock/timing';
import type { ErrorMode } from '../scheduler/cooperativeScheduler';

export type Env = Record<string, string | undefined>;

export interface BoardOptions {
  inputPolicy?: InputPolicy;
  cpuFrequencyHz?: number;
  timeMode?: TimeMode;
  maxDrainRounds?: number;
  hookCallsPerCheck?: number;
  yieldIntervalMs?: number;
  spinChecks?: number;
  onGuestError?: ErrorMode;
  onCallbackError?: ErrorMode;
  trace?: boolean;
  traceSink?: (line: string) => void;
  now?: () => number;
}

function defaultEnv(): Env {
  return typeof process !== 'undefined' && process?.env ? process.env : {};
}

function num(raw: string | undefined, min: number): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const v = Number(raw);
  return Number.isFinite(v) && v >= min ? v : undefined;
}

function errorMode(raw: string | undefined): ErrorMode | undefined {
  const v = (raw ?? '').trim().toLowerCase();
  return v === 'ignore' || v === 'throw' || v === 'record' ? v : undefined;
}

function inputPolicy(raw: string | undefined): InputPolicy | undefined {
  const v = (raw ?? '').trim().toLowerCase();
  return v === 'pull-wins' || v === 'injection-wins' ? v : undefined;
}

// Board options from VHW_* environment variables. Unset or malformed values are left out
// so the component defaults apply.
export function boardOptionsFromEnv(env: Env = defaultEnv()): BoardOptions {
  const opts: BoardOptions = {};
  const policy = inputPolicy(env.VHW_INPUT_POLICY);
  if (policy) opts.inputPolicy = policy;
  const hz = num(env.VHW_CPU_HZ, 1);
  if (hz !== undefined) opts.cpuFrequencyHz = hz;
  const mode = parseTimeMode(env.VHW_TIME_MODE);
  if (mode !== undefined) opts.timeMode = mode;
  const rounds = num(env.VHW_MAX_DRAIN_ROUNDS, 1);
  if (rounds !== undefined) opts.maxDrainRounds = rounds;
  const hooks = num(env.VHW_HOOK_CALLS, 1);
  if (hooks !== undefined) opts.hookCallsPerCheck = hooks;
  const interval = num(env.VHW_YIELD_INTERVAL_MS, 0);
  if (interval !== undefined) opts.yieldIntervalMs = interval;
  const spins = num(env.VHW_SPIN_CHECKS, 1);
  if (spins !== undefined) opts.spinChecks = spins;
  const guestErrors = errorMode(env.VHW_GUEST_ERRORS);
  if (guestErrors) opts.onGuestError = guestErrors;
  const callbackErrors = errorMode(env.VHW_CALLBACK_ERRORS);
  if (callbackErrors) opts.onCallbackError = callbackErrors;
  const trace = (env.VHW_TRACE ?? '').toLowerCase();
  if (trace === '1' || trace === 'true') opts.trace = true;
  return opts;
}
