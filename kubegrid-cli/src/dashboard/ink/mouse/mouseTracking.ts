/**
 * SGR 1006 mouse tracking toggles. Tracking is on in every mode except the
 * modal ones, where the overlay owns input and the terminal's own text
 * selection is left working.
 */

import { MODAL_MODES } from '../../commands';
import type { InputMode } from '../../commands';

// VT200 button events, drag tracking, SGR extended encoding.
const PRIVATE_MODES = [1000, 1002, 1006] as const;

export interface TerminalWriter {
  write(data: string): unknown;
}

/** Escape sequence that turns tracking on or off; modes are reset in reverse order. */
export function mouseTrackingSequence(on: boolean): string {
  const modes = on ? [...PRIVATE_MODES] : [...PRIVATE_MODES].reverse();
  return modes.map((mode) => `\x1b[?${mode}${on ? 'h' : 'l'}`).join('');
}

export function tracksMouse(mode: InputMode): boolean {
  return !MODAL_MODES.has(mode);
}

/** Tracks what the terminal was last told so repeated toggles write nothing. */
export class MouseTracking {
  private on = false;

  constructor(private readonly out: TerminalWriter = process.stdout) {}

  get enabled(): boolean {
    return this.on;
  }

  set(on: boolean): void {
    if (on === this.on) return;
    this.on = on;
    this.out.write(mouseTrackingSequence(on));
  }

  follow(mode: InputMode): void {
    this.set(tracksMouse(mode));
  }
}

/** Unconditional reset, for the process exit hook. */
export function disableMouse(): void {
  process.stdout.write(mouseTrackingSequence(false));
}
