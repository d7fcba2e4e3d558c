#!/usr/bin/env tsx
/*
Print a disassembly listing of a CHIP-8 ROM.

Usage:
  tsx scripts/disasm.ts --rom=path/to/game.ch8 [--origin=0x200]
*/
import { disassembleRange } from '../src/cpu/disasm';
import { readRomFile } from '../src/rom/loader';
import { parseArgs } from '../src/tools/cliArgs';

const args = parseArgs(process.argv.slice(2));
if (!args.rom) {
  console.error('Usage: npm run disasm -- --rom=path/to/game.ch8 [--origin=0x200]');
  process.exitCode = 2;
} else {
  const origin = args.origin ? parseInt(args.origin.replace(/^0x/i, ''), 16) : 0x200;
  for (const line of disassembleRange(readRomFile(args.rom), origin)) console.log(line);
}
