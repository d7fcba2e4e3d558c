import { PROGRAM_START, Word } from '../emulator/types';
import { decode, Instruction } from './decode';

const h = (v: number, w: number) => '0x' + v.toString(16).toUpperCase().padStart(w, '0');
const r = (n: number) => 'V' + n.toString(16).toUpperCase();

export function formatInstruction(ins: Instruction): string {
  switch (ins.op) {
    case 'SYS': return `SYS ${h(ins.addr, 3)}`;
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'JP': return `JP ${h(ins.addr, 3)}`;
    case 'CALL': return `CALL ${h(ins.addr, 3)}`;
    case 'SE_BYTE': return `SE ${r(ins.x)}, ${h(ins.byte, 2)}`;
    case 'SNE_BYTE': return `SNE ${r(ins.x)}, ${h(ins.byte, 2)}`;
    case 'SE_REG': return `SE ${r(ins.x)}, ${r(ins.y)}`;
    case 'SNE_REG': return `SNE ${r(ins.x)}, ${r(ins.y)}`;
    case 'LD_BYTE': return `LD ${r(ins.x)}, ${h(ins.byte, 2)}`;
    case 'ADD_BYTE': return `ADD ${r(ins.x)}, ${h(ins.byte, 2)}`;
    case 'LD_REG': return `LD ${r(ins.x)}, ${r(ins.y)}`;
    case 'OR': return `OR ${r(ins.x)}, ${r(ins.y)}`;
    case 'AND': return `AND ${r(ins.x)}, ${r(ins.y)}`;
    case 'XOR': return `XOR ${r(ins.x)}, ${r(ins.y)}`;
    case 'ADD_REG': return `ADD ${r(ins.x)}, ${r(ins.y)}`;
    case 'SUB': return `SUB ${r(ins.x)}, ${r(ins.y)}`;
    case 'SUBN': return `SUBN ${r(ins.x)}, ${r(ins.y)}`;
    case 'SHR': return `SHR ${r(ins.x)}`;
    case 'SHL': return `SHL ${r(ins.x)}`;
    case 'LD_I': return `LD I, ${h(ins.addr, 3)}`;
    case 'JP_V0': return `JP V0, ${h(ins.addr, 3)}`;
    case 'RND': return `RND ${r(ins.x)}, ${h(ins.byte, 2)}`;
    case 'DRW': return `DRW ${r(ins.x)}, ${r(ins.y)}, ${ins.n}`;
    case 'SKP': return `SKP ${r(ins.x)}`;
    case 'SKNP': return `SKNP ${r(ins.x)}`;
    case 'LD_VX_DT': return `LD ${r(ins.x)}, DT`;
    case 'LD_VX_K': return `LD ${r(ins.x)}, K`;
    case 'LD_DT_VX': return `LD DT, ${r(ins.x)}`;
    case 'LD_ST_VX': return `LD ST, ${r(ins.x)}`;
    case 'ADD_I': return `ADD I, ${r(ins.x)}`;
    case 'LD_F': return `LD F, ${r(ins.x)}`;
    case 'LD_B': return `LD B, ${r(ins.x)}`;
    case 'STORE': return `LD [I], ${r(ins.x)}`;
    case 'LOAD': return `LD ${r(ins.x)}, [I]`;
    case 'INVALID': return `DW ${h(ins.word, 4)}`;
  }
}

export function disassemble(word: Word): string {
  return formatInstruction(decode(word));
}

// One `addr: word  mnemonic` line per 2 bytes; a trailing odd byte is listed as DB
export function disassembleRange(bytes: ArrayLike<number>, origin = PROGRAM_START): string[] {
  const lines: string[] = [];
  let off = 0;
  for (; off + 1 < bytes.length; off += 2) {
    const word = ((bytes[off] & 0xff) << 8) | (bytes[off + 1] & 0xff);
    lines.push(`${h(origin + off, 3).slice(2)}: ${h(word, 4).slice(2)}  ${disassemble(word)}`);
  }
  if (off < bytes.length) {
    const b = bytes[off] & 0xff;
    lines.push(`${h(origin + off, 3).slice(2)}: ${h(b, 2).slice(2)}    DB ${h(b, 2)}`);
  }
  return lines;
}
