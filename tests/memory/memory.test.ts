import { describe, it, expect } from 'vitest';
import { Memory } from '../../src/memory/memory';
import { FONT_SET, fontAddress } from '../../src/memory/font';
import { faultOf } from '../helpers/program';

describe('Memory: byte and word access', () => {
  it('writes mask to 8 bits and read back', () => {
    const mem = new Memory();
    mem.writeByte(0x300, 0x1ff);
    expect(mem.readByte(0x300)).toBe(0xff);
  });

  it('reads words big-endian', () => {
    const mem = new Memory();
    mem.writeByte(0x300, 0x12);
    mem.writeByte(0x301, 0x34);
    expect(mem.readWord(0x300)).toBe(0x1234);
    expect(mem.readWord(0xffe)).toBe(0x0000);
  });

  it('faults on addresses outside 0x000-0xFFF', () => {
    const mem = new Memory();
    expect(faultOf(() => mem.readByte(0x1000)).kind).toBe('AddressOutOfBounds');
    expect(faultOf(() => mem.writeByte(-1, 0)).kind).toBe('AddressOutOfBounds');
    expect(faultOf(() => mem.readByte(1.5)).kind).toBe('AddressOutOfBounds');
    const f = faultOf(() => mem.readWord(0xfff));
    expect(f.kind).toBe('AddressOutOfBounds');
    expect(f.address).toBe(0x1000);
  });

  it('checkRange validates whole spans', () => {
    const mem = new Memory();
    expect(() => mem.checkRange(0xffe, 2)).not.toThrow();
    expect(() => mem.checkRange(0xfff, 0)).not.toThrow();
    expect(faultOf(() => mem.checkRange(0xffe, 3)).kind).toBe('AddressOutOfBounds');
  });
});

describe('Memory: font and program regions', () => {
  it('has the font set at 0x000 after construction', () => {
    const mem = new Memory();
    expect(FONT_SET.length).toBe(80);
    expect(mem.readByte(0x000)).toBe(0xf0);
    expect(mem.readByte(0x005)).toBe(0x20);
    expect(mem.readByte(0x04f)).toBe(0x80);
    expect(mem.readByte(0x050)).toBe(0x00);
  });

  it('fontAddress maps digits to 5-byte glyphs and rejects others', () => {
    expect(fontAddress(0x0)).toBe(0);
    expect(fontAddress(0xa)).toBe(50);
    expect(fontAddress(0xf)).toBe(75);
    expect(faultOf(() => fontAddress(16)).kind).toBe('UnmappedFont');
  });

  it('loads exactly 3584 bytes ending at 0xFFF', () => {
    const mem = new Memory();
    const rom = new Uint8Array(3584).fill(0x11);
    rom[3583] = 0x99;
    mem.loadProgram(rom);
    expect(mem.readByte(0x200)).toBe(0x11);
    expect(mem.readByte(0xfff)).toBe(0x99);
  });

  it('rejects 3585 bytes with ProgramTooLarge and leaves memory alone', () => {
    const mem = new Memory();
    mem.writeByte(0x200, 0x42);
    expect(faultOf(() => mem.loadProgram(new Uint8Array(3585))).kind).toBe('ProgramTooLarge');
    expect(mem.readByte(0x200)).toBe(0x42);
  });

  it('zeroes the program region left over from a previous program', () => {
    const mem = new Memory();
    mem.loadProgram([1, 2, 3, 4]);
    mem.loadProgram([9]);
    expect(mem.readByte(0x200)).toBe(9);
    expect(mem.readByte(0x201)).toBe(0);
    expect(mem.readByte(0x203)).toBe(0);
    expect(mem.readByte(0x000)).toBe(0xf0);
  });

  it('slice copies a span', () => {
    const mem = new Memory();
    mem.loadProgram([0x60, 0x05]);
    const s = mem.slice(0x200, 2);
    s[0] = 0;
    expect(Array.from(s)).toEqual([0, 0x05]);
    expect(mem.readByte(0x200)).toBe(0x60);
  });
});
