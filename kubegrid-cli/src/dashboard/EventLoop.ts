/**
 * The control loop: one consumer of the event channel.
 *
 * Each iteration waits for an event, handles it, then handles whatever else
 * queued up in the meantime before asking for a redraw, so a burst of
 * deliveries costs one frame.
 */

import { InvariantViolationError, errorMessage, getLogger } from 'kubegrid-shared';
import type { AppEvent, EventChannel } from 'kubegrid-shared';

const log = getLogger('loop');

/** The part of the controller the loop drives. */
export interface LoopTarget {
  readonly running: boolean;
  handleEvent(event: AppEvent): void;
  assertPaneInvariants(): void;
}

export class EventLoop {
  private handled = 0;

  constructor(
    private readonly channel: EventChannel<AppEvent>,
    private readonly target: LoopTarget,
    private readonly redraw: () => void,
  ) {}

  /** Events handled so far. */
  get eventCount(): number {
    return this.handled;
  }

  /**
   * Resolves when the target stops running or the channel closes. Rejects
   * only on an invariant violation.
   */
  async run(): Promise<void> {
    this.redraw();
    while (this.target.running) {
      const event = await this.channel.next();
      if (event === null) {
        log.info('event channel closed');
        return;
      }
      this.step(event);
      for (const queued of this.channel.drain()) {
        if (!this.target.running) break;
        this.step(queued);
      }
      this.target.assertPaneInvariants();
      if (this.target.running) this.redraw();
    }
  }

  private step(event: AppEvent): void {
    this.handled++;
    try {
      this.target.handleEvent(event);
    } catch (err) {
      if (err instanceof InvariantViolationError) throw err;
      log.error({ err, event: event.type }, 'event handler failed');
      this.target.handleEvent({ type: 'toast', level: 'error', message: errorMessage(err) });
    }
  }
}
