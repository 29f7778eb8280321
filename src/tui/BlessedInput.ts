import type { InputSource } from '../core/loop';
import type { KeyPress } from '../core/keymap';

export interface KeyEvent {
  name?: string;
  full?: string;
}

/** Anything that emits blessed-style keypress events; normally the screen. */
export interface KeypressEmitter {
  on(event: 'keypress', listener: (ch: string | undefined, key: KeyEvent | undefined) => void): unknown;
}

/**
 * Turns blessed's push-style keypress events into the pull-style poll the
 * control loop wants. Keys arriving between polls are buffered in order.
 */
export class BlessedInput implements InputSource {
  private pending: KeyPress[] = [];
  private waiter: ((key: KeyPress | undefined) => void) | undefined;
  private timer: NodeJS.Timeout | undefined;
  private closed = false;

  constructor(emitter: KeypressEmitter) {
    emitter.on('keypress', (ch, key) => {
      this.push({ name: key?.name, full: key?.full, ch: ch || undefined });
    });
  }

  poll(timeoutMs: number): Promise<KeyPress | undefined> {
    const next = this.pending.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(undefined);

    return new Promise(resolve => {
      this.waiter = resolve;
      this.timer = setTimeout(() => this.settle(undefined), timeoutMs);
    });
  }

  /** Resolves any outstanding poll and ignores further keys. */
  close() {
    this.closed = true;
    this.pending = [];
    this.settle(undefined);
  }

  private push(key: KeyPress) {
    if (this.closed) return;
    if (this.waiter) {
      this.settle(key);
    } else {
      this.pending.push(key);
    }
  }

  private settle(key: KeyPress | undefined) {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(key);
  }
}
