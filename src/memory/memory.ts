import { Byte, FONT_BASE, IMemory, MAX_PROGRAM_SIZE, MEMORY_SIZE, PROGRAM_START, Word } from '../emulator/types';
import { Chip8Fault } from '../emulator/faults';
import { FONT_SET } from './font';

function inBounds(addr: number): boolean {
  return Number.isInteger(addr) && addr >= 0 && addr < MEMORY_SIZE;
}

// 4 KiB flat address space. Font at 0x000, programs from 0x200.
export class Memory implements IMemory {
  private readonly mem = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.mem.fill(0);
    this.mem.set(FONT_SET, FONT_BASE);
  }

  readByte(addr: number): Byte {
    this.check(addr);
    return this.mem[addr];
  }

  // Big-endian: high byte at addr
  readWord(addr: number): Word {
    this.checkRange(addr, 2);
    return (this.mem[addr] << 8) | this.mem[addr + 1];
  }

  writeByte(addr: number, value: Byte): void {
    this.check(addr);
    this.mem[addr] = value & 0xff;
  }

  checkRange(addr: number, length: number): void {
    if (length <= 0) return;
    this.check(addr);
    this.check(addr + length - 1);
  }

  loadProgram(bytes: ArrayLike<number>): void {
    if (bytes.length > MAX_PROGRAM_SIZE) {
      throw new Chip8Fault(
        'ProgramTooLarge',
        `program is ${bytes.length} bytes, limit is ${MAX_PROGRAM_SIZE}`,
      );
    }
    this.mem.fill(0, PROGRAM_START);
    for (let i = 0; i < bytes.length; i++) this.mem[PROGRAM_START + i] = bytes[i] & 0xff;
  }

  slice(addr: number, length: number): Uint8Array {
    this.checkRange(addr, length);
    return this.mem.slice(addr, addr + length);
  }

  private check(addr: number): void {
    if (!inBounds(addr)) {
      throw new Chip8Fault('AddressOutOfBounds', `address ${addr} outside 0x000-0xFFF`, { address: addr });
    }
  }
}
