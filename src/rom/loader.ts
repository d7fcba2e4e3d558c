import fs from 'fs';
import { MAX_PROGRAM_SIZE } from '../emulator/types';
import { Chip8Fault } from '../emulator/faults';

export function checkRomSize(rom: Uint8Array): Uint8Array {
  if (rom.length > MAX_PROGRAM_SIZE) {
    throw new Chip8Fault('ProgramTooLarge', `ROM is ${rom.length} bytes, limit is ${MAX_PROGRAM_SIZE}`);
  }
  return rom;
}

// Raw CHIP-8 ROMs have no header: the file is the opcode stream loaded at 0x200
export function readRomFile(path: string): Uint8Array {
  const raw = fs.readFileSync(path);
  return checkRomSize(new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength));
}

// Parse `6005 6103 8014` style hex listings (whitespace, commas and 0x prefixes allowed)
export function parseHexProgram(text: string): Uint8Array {
  const words = text
    .replace(/\/\/.*$/gm, '')
    .split(/[\s,]+/)
    .map((t) => t.replace(/^0x/i, ''))
    .filter((t) => t.length > 0);
  const out: number[] = [];
  for (const w of words) {
    if (!/^[0-9a-fA-F]+$/.test(w) || w.length % 2 !== 0) {
      throw new Error(`invalid hex token: ${w}`);
    }
    for (let i = 0; i < w.length; i += 2) out.push(parseInt(w.slice(i, i + 2), 16));
  }
  return checkRomSize(Uint8Array.from(out));
}
