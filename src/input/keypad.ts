import { IKeypad, KEY_COUNT } from '../emulator/types';

// Hex keypad, keys 0x0-0xF. The host replaces the whole snapshot once per cycle;
// the keypad latches keys that went from released to pressed so Fx0A can see
// presses that happened while it was waiting.
export class Keypad implements IKeypad {
  private state = 0;
  private pressLatch = 0;

  reset(): void {
    this.state = 0;
    this.pressLatch = 0;
  }

  setKeys(mask: number): void {
    const next = mask & 0xffff;
    this.pressLatch |= next & ~this.state & 0xffff;
    this.state = next;
  }

  press(key: number): void {
    this.setKeys(this.state | (1 << (key & 0xf)));
  }

  release(key: number): void {
    this.setKeys(this.state & ~(1 << (key & 0xf)));
  }

  mask(): number {
    return this.state;
  }

  isPressed(key: number): boolean {
    return (this.state & (1 << (key & 0xf))) !== 0;
  }

  // Lowest key pressed since the latch was last cleared, consumed on read
  waitForKey(): number | null {
    for (let k = 0; k < KEY_COUNT; k++) {
      const bit = 1 << k;
      if ((this.pressLatch & bit) !== 0) {
        this.pressLatch &= ~bit;
        return k;
      }
    }
    return null;
  }

  clearPressLatch(): void {
    this.pressLatch = 0;
  }
}
