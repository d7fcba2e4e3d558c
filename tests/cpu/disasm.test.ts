import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { disassemble, disassembleRange } from '../../src/cpu/disasm';

describe('disassembler', () => {
  it('formats instructions in conventional mnemonics', () => {
    expect(disassemble(0x6005)).toBe('LD V0, 0x05');
    expect(disassemble(0x8ab4)).toBe('ADD VA, VB');
    expect(disassemble(0xd125)).toBe('DRW V1, V2, 5');
    expect(disassemble(0xa2f0)).toBe('LD I, 0x2F0');
    expect(disassemble(0xf155)).toBe('LD [I], V1');
    expect(disassemble(0xf265)).toBe('LD V2, [I]');
    expect(disassemble(0xfe29)).toBe('LD F, VE');
    expect(disassemble(0xb200)).toBe('JP V0, 0x200');
    expect(disassemble(0x00e0)).toBe('CLS');
    expect(disassemble(0x5001)).toBe('DW 0x5001');
  });

  it('lists a byte range with addresses', () => {
    expect(disassembleRange([0x60, 0x05, 0x12], 0x200)).toEqual([
      '200: 6005  LD V0, 0x05',
      '202: 12    DB 0x12',
    ]);
  });

  it('produces a non-empty line for every word', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffff }), (w) => {
        expect(disassemble(w).length).toBeGreaterThan(0);
      }),
      { numRuns: 300 }
    );
  });
});
