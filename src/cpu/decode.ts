import { Word } from '../emulator/types';

type Addr = { addr: number };
type X = { x: number };
type XY = { x: number; y: number };
type XByte = { x: number; byte: number };

// One variant per CHIP-8 instruction form, discriminated by `op`.
export type Instruction =
  | ({ op: 'SYS' } & Addr)          // 0nnn
  | { op: 'CLS' }                    // 00E0
  | { op: 'RET' }                    // 00EE
  | ({ op: 'JP' } & Addr)           // 1nnn
  | ({ op: 'CALL' } & Addr)         // 2nnn
  | ({ op: 'SE_BYTE' } & XByte)     // 3xkk
  | ({ op: 'SNE_BYTE' } & XByte)    // 4xkk
  | ({ op: 'SE_REG' } & XY)         // 5xy0
  | ({ op: 'LD_BYTE' } & XByte)     // 6xkk
  | ({ op: 'ADD_BYTE' } & XByte)    // 7xkk
  | ({ op: 'LD_REG' } & XY)         // 8xy0
  | ({ op: 'OR' } & XY)             // 8xy1
  | ({ op: 'AND' } & XY)            // 8xy2
  | ({ op: 'XOR' } & XY)            // 8xy3
  | ({ op: 'ADD_REG' } & XY)        // 8xy4
  | ({ op: 'SUB' } & XY)            // 8xy5
  | ({ op: 'SHR' } & XY)            // 8xy6
  | ({ op: 'SUBN' } & XY)           // 8xy7
  | ({ op: 'SHL' } & XY)            // 8xyE
  | ({ op: 'SNE_REG' } & XY)        // 9xy0
  | ({ op: 'LD_I' } & Addr)         // Annn
  | ({ op: 'JP_V0' } & Addr & X)    // Bnnn (x is the high nibble of nnn)
  | ({ op: 'RND' } & XByte)         // Cxkk
  | ({ op: 'DRW' } & XY & { n: number }) // Dxyn
  | ({ op: 'SKP' } & X)             // Ex9E
  | ({ op: 'SKNP' } & X)            // ExA1
  | ({ op: 'LD_VX_DT' } & X)        // Fx07
  | ({ op: 'LD_VX_K' } & X)         // Fx0A
  | ({ op: 'LD_DT_VX' } & X)        // Fx15
  | ({ op: 'LD_ST_VX' } & X)        // Fx18
  | ({ op: 'ADD_I' } & X)           // Fx1E
  | ({ op: 'LD_F' } & X)            // Fx29
  | ({ op: 'LD_B' } & X)            // Fx33
  | ({ op: 'STORE' } & X)           // Fx55
  | ({ op: 'LOAD' } & X)            // Fx65
  | { op: 'INVALID'; word: Word };

export type Opcode = Instruction['op'];

// Pure: the result depends only on the 16-bit word.
export function decode(word: Word): Instruction {
  const w = word & 0xffff;
  const x = (w >>> 8) & 0xf;
  const y = (w >>> 4) & 0xf;
  const n = w & 0xf;
  const byte = w & 0xff;
  const addr = w & 0xfff;

  switch (w >>> 12) {
    case 0x0:
      if (w === 0x00e0) return { op: 'CLS' };
      if (w === 0x00ee) return { op: 'RET' };
      return { op: 'SYS', addr };
    case 0x1: return { op: 'JP', addr };
    case 0x2: return { op: 'CALL', addr };
    case 0x3: return { op: 'SE_BYTE', x, byte };
    case 0x4: return { op: 'SNE_BYTE', x, byte };
    case 0x5: return n === 0 ? { op: 'SE_REG', x, y } : { op: 'INVALID', word: w };
    case 0x6: return { op: 'LD_BYTE', x, byte };
    case 0x7: return { op: 'ADD_BYTE', x, byte };
    case 0x8:
      switch (n) {
        case 0x0: return { op: 'LD_REG', x, y };
        case 0x1: return { op: 'OR', x, y };
        case 0x2: return { op: 'AND', x, y };
        case 0x3: return { op: 'XOR', x, y };
        case 0x4: return { op: 'ADD_REG', x, y };
        case 0x5: return { op: 'SUB', x, y };
        case 0x6: return { op: 'SHR', x, y };
        case 0x7: return { op: 'SUBN', x, y };
        case 0xe: return { op: 'SHL', x, y };
        default: return { op: 'INVALID', word: w };
      }
    case 0x9: return n === 0 ? { op: 'SNE_REG', x, y } : { op: 'INVALID', word: w };
    case 0xa: return { op: 'LD_I', addr };
    case 0xb: return { op: 'JP_V0', addr, x };
    case 0xc: return { op: 'RND', x, byte };
    case 0xd: return { op: 'DRW', x, y, n };
    case 0xe:
      if (byte === 0x9e) return { op: 'SKP', x };
      if (byte === 0xa1) return { op: 'SKNP', x };
      return { op: 'INVALID', word: w };
    default:
      switch (byte) {
        case 0x07: return { op: 'LD_VX_DT', x };
        case 0x0a: return { op: 'LD_VX_K', x };
        case 0x15: return { op: 'LD_DT_VX', x };
        case 0x18: return { op: 'LD_ST_VX', x };
        case 0x1e: return { op: 'ADD_I', x };
        case 0x29: return { op: 'LD_F', x };
        case 0x33: return { op: 'LD_B', x };
        case 0x55: return { op: 'STORE', x };
        case 0x65: return { op: 'LOAD', x };
        default: return { op: 'INVALID', word: w };
      }
  }
}
