import { MachineOptions, parseFaultPolicy, parseQuirks, resolveOptionsFromEnv } from '../emulator/config';

// `--key=value` pairs; a bare `--flag` becomes "1"
export function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
    else if (a.startsWith('--')) out[a.slice(2)] = '1';
  }
  return out;
}

export function intArg(v: string | undefined, def: number, min = 0): number {
  if (v === undefined) return def;
  const n = Number(v);
  return Number.isFinite(n) ? Math.max(min, Math.floor(n)) : def;
}

// Seeded byte source (mulberry32) so runs are reproducible from the command line
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) & 0xff;
  };
}

// Environment first, then CLI flags on top
export function machineOptionsFrom(args: Record<string, string>, env: Record<string, string | undefined>): MachineOptions {
  const opts = resolveOptionsFromEnv(env);
  if (args.ips !== undefined) opts.instructionsPerTick = intArg(args.ips, opts.instructionsPerTick ?? 10, 1);
  if (args.onFault !== undefined) {
    const policy = parseFaultPolicy(args.onFault);
    if (policy !== undefined) opts.onFault = policy;
  }
  if (args.trace !== undefined) opts.traceEveryInstr = intArg(args.trace, 0);
  if (args.quirks !== undefined) opts.quirks = { ...opts.quirks, ...parseQuirks(args.quirks) };
  if (args.seed !== undefined) opts.random = seededRandom(intArg(args.seed, 0));
  return opts;
}
