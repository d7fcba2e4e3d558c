#!/usr/bin/env tsx
/*
Run a ROM for a number of frames and save the framebuffer as a PNG.

Usage:
  tsx scripts/headless_screenshot.ts --rom=path/to/game.ch8 --out=./out.png [--frames=180] [--scale=8]
                                     [--on=ffffff] [--off=000000] [--ips=10] [--onFault=halt|ignore]
*/
import fs from 'fs';
import { Machine } from '../src/emulator/machine';
import { encodePNG } from '../src/display/render';
import { readRomFile } from '../src/rom/loader';
import { intArg, machineOptionsFrom, parseArgs } from '../src/tools/cliArgs';

function color(v: string | undefined, def: number): number {
  if (v === undefined || !/^(0x|#)?[0-9a-fA-F]{6}$/.test(v)) return def;
  return parseInt(v.replace(/^(0x|#)/, ''), 16);
}

function main(): number {
  const args = parseArgs(process.argv.slice(2));
  const romPath = args.rom || process.env.CHIP8_ROM;
  const outPath = args.out || 'screenshot.png';
  if (!romPath) {
    console.error('Usage: npm run screenshot -- --rom=path/to/game.ch8 --out=./out.png [--frames=180] [--scale=8]');
    return 2;
  }
  const frames = intArg(args.frames, 180, 1);
  const scale = intArg(args.scale, 8, 1);

  const machine = new Machine(machineOptionsFrom(args, process.env));
  const loaded = machine.loadProgram(readRomFile(romPath));
  if (!loaded.ok) {
    console.error(`[screenshot] ${loaded.fault.describe()}`);
    return 1;
  }
  const outcome = machine.run({}, { maxTicks: frames });
  if (outcome.fault) console.error(`[screenshot] CPU fault, saving current frame: ${outcome.fault.describe()}`);

  const png = encodePNG(machine.framebuffer(), { scale, on: color(args.on, 0xffffff), off: color(args.off, 0x000000) });
  fs.writeFileSync(outPath, png);
  console.log(`[screenshot] wrote ${outPath} (${64 * scale}x${32 * scale}) after ${outcome.ticks} frames, lit=${machine.display.litCount()}`);
  return 0;
}

process.exitCode = main();
