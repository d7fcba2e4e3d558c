import { DEFAULT_QUIRKS, LogSink, Quirks } from './types';
import { FAULT_KINDS, FaultKind } from './faults';
import type { RandomByte } from '../cpu/cpu';

export type FaultMode = 'halt' | 'ignore';
export type FaultPolicy = FaultMode | Partial<Record<FaultKind, FaultMode>>;

export interface MachineOptions {
  instructionsPerTick?: number;
  onFault?: FaultPolicy;
  quirks?: Partial<Quirks>;
  random?: RandomByte;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
  log?: LogSink;
}

export const DEFAULT_INSTRUCTIONS_PER_TICK = 10;

// Whole instructions per tick, at least 1; missing or non-finite input gets the default
export function resolveInstructionsPerTick(n: number | undefined): number {
  if (n === undefined || !Number.isFinite(n)) return DEFAULT_INSTRUCTIONS_PER_TICK;
  return Math.max(1, Math.floor(n));
}

const QUIRK_NAMES = Object.keys(DEFAULT_QUIRKS) as (keyof Quirks)[];

function isQuirkName(s: string): s is keyof Quirks {
  return (QUIRK_NAMES as string[]).includes(s);
}

function isFaultMode(s: string): s is FaultMode {
  return s === 'halt' || s === 'ignore';
}

function isFaultKind(s: string): s is FaultKind {
  return (FAULT_KINDS as readonly string[]).includes(s);
}

export function faultModeFor(policy: FaultPolicy | undefined, kind: FaultKind): FaultMode {
  if (policy === undefined) return 'halt';
  if (typeof policy === 'string') return policy;
  return policy[kind] ?? 'halt';
}

/**
 * Parse a fault policy string: either a single mode (`ignore`) or a comma list
 * of `Kind=mode` pairs (`InvalidOpcode=ignore,StackOverflow=halt`).
 */
export function parseFaultPolicy(s: string): FaultPolicy | undefined {
  const text = s.trim();
  if (isFaultMode(text)) return text;
  const out: Partial<Record<FaultKind, FaultMode>> = {};
  let any = false;
  for (const part of text.split(',')) {
    const m = part.trim().match(/^([A-Za-z]+)=([a-z]+)$/);
    if (!m) continue;
    const [, kind, mode] = m;
    if (!isFaultKind(kind) || !isFaultMode(mode)) continue;
    out[kind] = mode;
    any = true;
  }
  return any ? out : undefined;
}

export function parseQuirks(s: string): Partial<Quirks> {
  const out: Partial<Quirks> = {};
  for (const raw of s.split(',')) {
    const name = raw.trim();
    if (isQuirkName(name)) out[name] = true;
  }
  return out;
}

function positiveInt(s: string | undefined): number | undefined {
  if (s === undefined || !/^\d+$/.test(s.trim())) return undefined;
  const n = Number(s);
  return n > 0 ? n : undefined;
}

// CHIP8_IPS, CHIP8_ON_FAULT, CHIP8_TRACE, CHIP8_QUIRKS; malformed values are skipped
export function resolveOptionsFromEnv(env: Record<string, string | undefined>): MachineOptions {
  const opts: MachineOptions = {};
  const ips = positiveInt(env.CHIP8_IPS);
  if (ips !== undefined) opts.instructionsPerTick = ips;
  if (env.CHIP8_ON_FAULT) {
    const policy = parseFaultPolicy(env.CHIP8_ON_FAULT);
    if (policy !== undefined) opts.onFault = policy;
  }
  const trace = positiveInt(env.CHIP8_TRACE);
  if (trace !== undefined) opts.traceEveryInstr = trace;
  if (env.CHIP8_QUIRKS) opts.quirks = parseQuirks(env.CHIP8_QUIRKS);
  return opts;
}
