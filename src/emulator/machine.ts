import { CPU, CPUState } from '../cpu/cpu';
import { formatInstruction } from '../cpu/disasm';
import { Display } from '../display/display';
import { Keypad } from '../input/keypad';
import { Memory } from '../memory/memory';
import { MachineOptions, resolveInstructionsPerTick } from './config';
import { Chip8Fault, isChip8Fault } from './faults';
import { MachineHost, RunOptions, RunOutcome, Scheduler } from './scheduler';
import { Timers } from './timers';
import { LogSink, MAX_PROGRAM_SIZE } from './types';

export type StepResult = { ok: true; waiting: boolean } | { ok: false; fault: Chip8Fault };
export type LoadResult = { ok: true; size: number } | { ok: false; fault: Chip8Fault };

export interface MachineSnapshot extends CPUState {
  DT: number;
  ST: number;
}

const hx = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

export class Machine {
  readonly memory = new Memory();
  readonly keypad = new Keypad();
  readonly timers = new Timers();
  readonly display: Display;
  readonly cpu: CPU;
  readonly instructionsPerTick: number;
  readonly log: LogSink;
  readonly options: MachineOptions;
  private traceEveryInstr: number;
  private execCount = 0;
  private haltRequested = false;

  constructor(opts: MachineOptions = {}) {
    this.options = opts;
    this.log = opts.log ?? console;
    this.instructionsPerTick = resolveInstructionsPerTick(opts.instructionsPerTick);
    const trace = opts.traceEveryInstr ?? 0;
    this.traceEveryInstr = Number.isFinite(trace) ? Math.max(0, Math.floor(trace)) : 0;
    this.display = new Display({ clip: opts.quirks?.clipSprites ?? false });
    this.cpu = new CPU({
      memory: this.memory,
      display: this.display,
      keypad: this.keypad,
      timers: this.timers,
      random: opts.random,
      quirks: opts.quirks,
    });
    this.init();
  }

  // Fresh power-on state: zeroed memory with the font, PC=0x200, blank screen
  init(): void {
    this.memory.reset();
    this.cpu.reset();
    this.timers.reset();
    this.display.clear();
    this.display.clearDirty();
    this.keypad.reset();
    this.execCount = 0;
    this.haltRequested = false;
  }

  // An oversized ROM is rejected before anything is reset
  loadProgram(bytes: ArrayLike<number>): LoadResult {
    if (bytes.length > MAX_PROGRAM_SIZE) {
      const msg = `program is ${bytes.length} bytes, limit is ${MAX_PROGRAM_SIZE}`;
      return { ok: false, fault: new Chip8Fault('ProgramTooLarge', msg) };
    }
    this.init();
    try {
      this.memory.loadProgram(bytes);
    } catch (e) {
      if (isChip8Fault(e)) return { ok: false, fault: e };
      throw e;
    }
    return { ok: true, size: bytes.length };
  }

  setKeys(mask: number): void {
    this.keypad.setKeys(mask);
  }

  step(): StepResult {
    const pc = this.cpu.pc;
    try {
      const ins = this.cpu.stepInstruction();
      this.execCount++;
      if (this.traceEveryInstr > 0 && (this.execCount % this.traceEveryInstr) === 0) {
        const s = this.cpu;
        const regs = Array.from(s.v, (b) => hx(b, 2)).join(' ');
        this.log.info(`[TRACE] ${hx(pc, 3)} ${formatInstruction(ins)} | I=${hx(s.i, 3)} SP=${s.sp} V=${regs}`);
      }
    } catch (e) {
      if (isChip8Fault(e)) return { ok: false, fault: e };
      throw e;
    }
    return { ok: true, waiting: this.cpu.isWaiting() };
  }

  // Treat the instruction at PC as a no-op (used when a fault is ignored)
  skipInstruction(): void {
    this.cpu.waitingRegister = null;
    this.cpu.pc = (this.cpu.pc + 2) & 0xffff;
  }

  tickTimers(): void {
    this.timers.tick();
  }

  framebuffer(): Readonly<Uint8Array> {
    return this.display.framebuffer();
  }

  isSoundActive(): boolean {
    return this.timers.isSoundActive();
  }

  requestHalt(): void {
    this.haltRequested = true;
  }

  consumeHaltRequest(): boolean {
    const was = this.haltRequested;
    this.haltRequested = false;
    return was;
  }

  get executedInstructions(): number {
    return this.execCount;
  }

  snapshot(): MachineSnapshot {
    return { ...this.cpu.getState(), DT: this.timers.delay, ST: this.timers.sound };
  }

  run(host: MachineHost = {}, opts: RunOptions = {}): RunOutcome {
    return new Scheduler(this, {
      instructionsPerTick: opts.instructionsPerTick ?? this.instructionsPerTick,
      maxTicks: opts.maxTicks,
      onFault: this.options.onFault,
    }).run(host);
  }
}
