export type FaultKind =
  | 'AddressOutOfBounds'
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'ProgramTooLarge'
  | 'InvalidOpcode'
  | 'UnmappedFont';

export const FAULT_KINDS: readonly FaultKind[] = [
  'AddressOutOfBounds',
  'StackOverflow',
  'StackUnderflow',
  'ProgramTooLarge',
  'InvalidOpcode',
  'UnmappedFont',
];

export interface FaultDetails {
  address?: number;
  opcode?: number;
  pc?: number;
}

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

/**
 * A deterministic machine fault. Components throw it; the Machine catches it at
 * the step/load boundary and hands it to the host as a status value.
 */
export class Chip8Fault extends Error {
  readonly kind: FaultKind;
  readonly address?: number;
  opcode?: number;
  pc?: number;

  constructor(kind: FaultKind, message: string, details: FaultDetails = {}) {
    super(message);
    this.name = 'Chip8Fault';
    this.kind = kind;
    this.address = details.address;
    this.opcode = details.opcode;
    this.pc = details.pc;
  }

  describe(): string {
    const parts: string[] = [this.kind];
    if (this.pc !== undefined) parts.push(`pc=0x${hex(this.pc, 3)}`);
    if (this.opcode !== undefined) parts.push(`op=0x${hex(this.opcode, 4)}`);
    if (this.address !== undefined) parts.push(`addr=0x${hex(this.address, 3)}`);
    return `${parts.join(' ')}: ${this.message}`;
  }
}

export function isChip8Fault(e: unknown): e is Chip8Fault {
  return e instanceof Chip8Fault;
}
