#!/usr/bin/env tsx
/*
Run a CHIP-8 ROM headless and print the final frame as ASCII.

Usage:
  tsx scripts/run_rom.ts --rom=path/to/game.ch8 [--frames=120] [--ips=10] [--keys=0x0000]
                         [--onFault=halt|ignore] [--quirks=shiftUsesVy,...] [--seed=N] [--trace=N]
*/
import { Machine } from '../src/emulator/machine';
import { renderAscii } from '../src/display/render';
import { readRomFile } from '../src/rom/loader';
import { intArg, machineOptionsFrom, parseArgs } from '../src/tools/cliArgs';
import { isChip8Fault } from '../src/emulator/faults';

function main(): number {
  const args = parseArgs(process.argv.slice(2));
  const romPath = args.rom || process.env.CHIP8_ROM;
  if (!romPath) {
    console.error('Usage: npm run run-rom -- --rom=path/to/game.ch8 [--frames=N] [--ips=N] [--keys=hexmask] [--onFault=halt|ignore] [--seed=N]');
    return 2;
  }
  const frames = intArg(args.frames, 120, 1);
  const keys = args.keys !== undefined ? parseInt(args.keys.replace(/^0x/i, ''), 16) & 0xffff : 0;

  let rom: Uint8Array;
  try {
    rom = readRomFile(romPath);
  } catch (e) {
    if (isChip8Fault(e)) {
      console.error(`[run_rom] ${e.describe()}`);
      return 1;
    }
    throw e;
  }

  const machine = new Machine(machineOptionsFrom(args, process.env));
  const loaded = machine.loadProgram(rom);
  if (!loaded.ok) {
    console.error(`[run_rom] ${loaded.fault.describe()}`);
    return 1;
  }
  console.log(`[run_rom] ROM: ${romPath} size=${loaded.size} frames=${frames} ips=${machine.instructionsPerTick} keys=0x${keys.toString(16)}`);

  const outcome = machine.run({ readKeys: () => keys }, { maxTicks: frames });
  console.log(renderAscii(machine.framebuffer()));
  console.log(`[run_rom] stopped: ${outcome.reason} ticks=${outcome.ticks} instructions=${outcome.instructions} ignoredFaults=${outcome.faultsIgnored}`);
  if (outcome.fault) {
    console.error(`[run_rom] ${outcome.fault.describe()}`);
    return 1;
  }
  return 0;
}

process.exitCode = main();
