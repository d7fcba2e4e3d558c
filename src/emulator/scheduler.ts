import type { Machine } from './machine';
import { FaultPolicy, faultModeFor, resolveInstructionsPerTick } from './config';
import { Chip8Fault } from './faults';

export interface MachineHost {
  // Current keypad mask, polled once per tick before the instruction batch
  readKeys?(): number;
  // Called after each timer tick; returning false halts the run
  onFrame?(machine: Machine, tick: number): boolean | void;
}

export interface RunOptions {
  instructionsPerTick?: number;
  maxTicks?: number;
}

export interface SchedulerOptions extends RunOptions {
  onFault?: FaultPolicy;
}

export type HaltReason = 'host' | 'requested' | 'fault' | 'maxTicks';

export interface RunOutcome {
  reason: HaltReason;
  fault?: Chip8Fault;
  ticks: number;
  instructions: number;
  faultsIgnored: number;
}

// Fixed cadence: N instructions, one timer tick, hand the frame to the host.
// Halt requests are only looked at between instructions.
export class Scheduler {
  private readonly instrPerTick: number;
  private readonly maxTicks: number | undefined;
  private readonly onFault: FaultPolicy | undefined;

  constructor(private readonly machine: Machine, opts: SchedulerOptions = {}) {
    this.instrPerTick = opts.instructionsPerTick === undefined
      ? machine.instructionsPerTick
      : resolveInstructionsPerTick(opts.instructionsPerTick);
    this.maxTicks = opts.maxTicks;
    this.onFault = opts.onFault;
  }

  run(host: MachineHost = {}): RunOutcome {
    const m = this.machine;
    let ticks = 0;
    let instructions = 0;
    let faultsIgnored = 0;
    const done = (reason: HaltReason, fault?: Chip8Fault): RunOutcome =>
      ({ reason, fault, ticks, instructions, faultsIgnored });

    for (;;) {
      if (this.maxTicks !== undefined && ticks >= this.maxTicks) return done('maxTicks');
      if (host.readKeys) m.setKeys(host.readKeys());

      for (let i = 0; i < this.instrPerTick; i++) {
        if (m.consumeHaltRequest()) return done('requested');
        const res = m.step();
        if (res.ok) {
          instructions++;
          continue;
        }
        if (faultModeFor(this.onFault, res.fault.kind) === 'halt') {
          m.log.warn(`[FAULT] halting: ${res.fault.describe()}`);
          return done('fault', res.fault);
        }
        m.log.warn(`[FAULT] ignored: ${res.fault.describe()}`);
        m.skipInstruction();
        faultsIgnored++;
      }

      m.tickTimers();
      ticks++;
      if (host.onFrame && host.onFrame(m, ticks) === false) return done('host');
    }
  }
}
