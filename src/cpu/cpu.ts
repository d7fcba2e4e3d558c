import {
  Byte,
  DEFAULT_QUIRKS,
  IDisplay,
  IKeypad,
  IMemory,
  ITimers,
  PROGRAM_START,
  Quirks,
  REGISTER_COUNT,
  STACK_DEPTH,
  Word,
} from '../emulator/types';
import { Chip8Fault, isChip8Fault } from '../emulator/faults';
import { fontAddress } from '../memory/font';
import { decode, Instruction } from './decode';

export type RandomByte = () => Byte;

export const mathRandomByte: RandomByte = () => Math.floor(Math.random() * 256) & 0xff;

export interface CPUDeps {
  memory: IMemory;
  display: IDisplay;
  keypad: IKeypad;
  timers: ITimers;
  random?: RandomByte;
  quirks?: Partial<Quirks>;
}

export interface CPUState {
  V: number[];
  I: Word;
  PC: Word;
  SP: number;
  stack: number[];
  waitingRegister: number | null;
}

const VF = 0xf;

export class CPU {
  readonly v = new Uint8Array(REGISTER_COUNT);
  readonly stack = new Uint16Array(STACK_DEPTH);
  i: Word = 0;
  pc: Word = PROGRAM_START;
  sp = 0;
  // Register Fx0A is waiting to fill, or null when not suspended
  waitingRegister: number | null = null;

  readonly quirks: Quirks;
  private readonly memory: IMemory;
  private readonly display: IDisplay;
  private readonly keypad: IKeypad;
  private readonly timers: ITimers;
  private readonly random: RandomByte;
  // Reused for DRW so a blit never allocates
  private readonly spriteBuf = new Uint8Array(15);

  constructor(deps: CPUDeps) {
    this.memory = deps.memory;
    this.display = deps.display;
    this.keypad = deps.keypad;
    this.timers = deps.timers;
    this.random = deps.random ?? mathRandomByte;
    this.quirks = { ...DEFAULT_QUIRKS, ...deps.quirks };
  }

  reset(): void {
    this.v.fill(0);
    this.stack.fill(0);
    this.i = 0;
    this.pc = PROGRAM_START;
    this.sp = 0;
    this.waitingRegister = null;
  }

  isWaiting(): boolean {
    return this.waitingRegister !== null;
  }

  fetch(): Word {
    return this.memory.readWord(this.pc);
  }

  /**
   * Fetch, decode and execute one instruction. Faults are tagged with the PC
   * and opcode of the instruction and rethrown; machine state is left as it
   * was before the instruction.
   */
  stepInstruction(): Instruction {
    const pc = this.pc;
    let word: Word | undefined;
    try {
      word = this.fetch();
      const ins = decode(word);
      this.execute(ins);
      return ins;
    } catch (e) {
      if (isChip8Fault(e)) {
        if (e.pc === undefined) e.pc = pc;
        if (e.opcode === undefined && word !== undefined) e.opcode = word;
      }
      throw e;
    }
  }

  execute(ins: Instruction): void {
    const v = this.v;
    switch (ins.op) {
      case 'SYS':
        // Machine-code calls have no meaning here
        this.next();
        return;
      case 'CLS':
        this.display.clear();
        this.next();
        return;
      case 'RET':
        if (this.sp === 0) throw new Chip8Fault('StackUnderflow', 'RET with empty stack');
        this.sp--;
        this.pc = this.stack[this.sp];
        return;
      case 'JP':
        this.pc = ins.addr;
        return;
      case 'CALL':
        if (this.sp >= STACK_DEPTH) {
          throw new Chip8Fault('StackOverflow', `CALL 0x${ins.addr.toString(16)} exceeds ${STACK_DEPTH} frames`);
        }
        this.stack[this.sp] = (this.pc + 2) & 0xffff;
        this.sp++;
        this.pc = ins.addr;
        return;
      case 'SE_BYTE':
        this.skipIf(v[ins.x] === ins.byte);
        return;
      case 'SNE_BYTE':
        this.skipIf(v[ins.x] !== ins.byte);
        return;
      case 'SE_REG':
        this.skipIf(v[ins.x] === v[ins.y]);
        return;
      case 'SNE_REG':
        this.skipIf(v[ins.x] !== v[ins.y]);
        return;
      case 'LD_BYTE':
        v[ins.x] = ins.byte;
        this.next();
        return;
      case 'ADD_BYTE':
        v[ins.x] = (v[ins.x] + ins.byte) & 0xff;
        this.next();
        return;
      case 'LD_REG':
        v[ins.x] = v[ins.y];
        this.next();
        return;
      case 'OR':
        v[ins.x] |= v[ins.y];
        if (this.quirks.logicResetsVf) v[VF] = 0;
        this.next();
        return;
      case 'AND':
        v[ins.x] &= v[ins.y];
        if (this.quirks.logicResetsVf) v[VF] = 0;
        this.next();
        return;
      case 'XOR':
        v[ins.x] ^= v[ins.y];
        if (this.quirks.logicResetsVf) v[VF] = 0;
        this.next();
        return;
      case 'ADD_REG': {
        const sum = v[ins.x] + v[ins.y];
        v[ins.x] = sum & 0xff;
        v[VF] = sum > 0xff ? 1 : 0;
        this.next();
        return;
      }
      case 'SUB': {
        const a = v[ins.x];
        const b = v[ins.y];
        v[ins.x] = (a - b) & 0xff;
        v[VF] = a >= b ? 1 : 0;
        this.next();
        return;
      }
      case 'SUBN': {
        const a = v[ins.x];
        const b = v[ins.y];
        v[ins.x] = (b - a) & 0xff;
        v[VF] = b >= a ? 1 : 0;
        this.next();
        return;
      }
      case 'SHR': {
        const src = this.quirks.shiftUsesVy ? v[ins.y] : v[ins.x];
        v[ins.x] = src >>> 1;
        v[VF] = src & 0x01;
        this.next();
        return;
      }
      case 'SHL': {
        const src = this.quirks.shiftUsesVy ? v[ins.y] : v[ins.x];
        v[ins.x] = (src << 1) & 0xff;
        v[VF] = (src >>> 7) & 0x01;
        this.next();
        return;
      }
      case 'LD_I':
        this.i = ins.addr;
        this.next();
        return;
      case 'JP_V0':
        this.pc = ins.addr + (this.quirks.jumpUsesVx ? v[ins.x] : v[0]);
        return;
      case 'RND':
        v[ins.x] = this.random() & ins.byte;
        this.next();
        return;
      case 'DRW': {
        this.memory.checkRange(this.i, ins.n);
        const sprite = this.spriteBuf.subarray(0, ins.n);
        for (let r = 0; r < ins.n; r++) sprite[r] = this.memory.readByte(this.i + r);
        const collision = this.display.drawSprite(v[ins.x], v[ins.y], sprite);
        v[VF] = collision ? 1 : 0;
        this.next();
        return;
      }
      case 'SKP':
        this.skipIf(this.keypad.isPressed(v[ins.x] & 0xf));
        return;
      case 'SKNP':
        this.skipIf(!this.keypad.isPressed(v[ins.x] & 0xf));
        return;
      case 'LD_VX_DT':
        v[ins.x] = this.timers.delay;
        this.next();
        return;
      case 'LD_VX_K': {
        if (this.waitingRegister === null) {
          // Only presses that arrive after the wait starts count
          this.keypad.clearPressLatch();
          this.waitingRegister = ins.x;
          return;
        }
        const key = this.keypad.waitForKey();
        if (key === null) return;
        v[ins.x] = key;
        this.waitingRegister = null;
        this.next();
        return;
      }
      case 'LD_DT_VX':
        this.timers.delay = v[ins.x];
        this.next();
        return;
      case 'LD_ST_VX':
        this.timers.sound = v[ins.x];
        this.next();
        return;
      case 'ADD_I':
        this.i = (this.i + v[ins.x]) & 0xffff;
        this.next();
        return;
      case 'LD_F':
        this.i = fontAddress(v[ins.x] & 0xf);
        this.next();
        return;
      case 'LD_B': {
        this.memory.checkRange(this.i, 3);
        const value = v[ins.x];
        this.memory.writeByte(this.i, Math.floor(value / 100));
        this.memory.writeByte(this.i + 1, Math.floor(value / 10) % 10);
        this.memory.writeByte(this.i + 2, value % 10);
        this.next();
        return;
      }
      case 'STORE':
        this.memory.checkRange(this.i, ins.x + 1);
        for (let r = 0; r <= ins.x; r++) this.memory.writeByte(this.i + r, v[r]);
        if (this.quirks.memoryIncrementsI) this.i = (this.i + ins.x + 1) & 0xffff;
        this.next();
        return;
      case 'LOAD':
        this.memory.checkRange(this.i, ins.x + 1);
        for (let r = 0; r <= ins.x; r++) v[r] = this.memory.readByte(this.i + r);
        if (this.quirks.memoryIncrementsI) this.i = (this.i + ins.x + 1) & 0xffff;
        this.next();
        return;
      case 'INVALID':
        throw new Chip8Fault('InvalidOpcode', `unrecognized opcode 0x${ins.word.toString(16).padStart(4, '0')}`, {
          opcode: ins.word,
        });
      default: {
        const unreachable: never = ins;
        throw new Error(`Unhandled instruction: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  getState(): CPUState {
    return {
      V: Array.from(this.v),
      I: this.i,
      PC: this.pc,
      SP: this.sp,
      stack: Array.from(this.stack.subarray(0, this.sp)),
      waitingRegister: this.waitingRegister,
    };
  }

  private next(): void {
    this.pc = (this.pc + 2) & 0xffff;
  }

  private skipIf(cond: boolean): void {
    this.pc = (this.pc + (cond ? 4 : 2)) & 0xffff;
  }
}
