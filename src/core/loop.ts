import type { Board } from './board';
import type { LogQueue } from './logQueue';
import { applyCommand, resolveCommand, type Command, type KeyPress } from './keymap';
import { STATUSES, type BoardFrame } from './types';
import { STATUS_TITLES } from './status';
import { log } from '../utils/logger';

export const TICK_RATE_MS = 250;

export type LoopState = 'running' | 'terminated';

export interface Renderer {
  draw(frame: BoardFrame): void;
}

export interface InputSource {
  /** Resolves with the next key press, or undefined once `timeoutMs` has passed without one. */
  poll(timeoutMs: number): Promise<KeyPress | undefined>;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/** Snapshot of the board and log queue; later mutations do not reach a built frame. */
export function buildFrame(board: Board, logQueue: LogQueue): BoardFrame {
  return {
    columns: STATUSES.map(status => board.columnView(status)),
    logs: [...logQueue.entries],
    totalItems: board.items.length,
    activeColumn: board.activeColumn,
  };
}

/**
 * Draw, wait for a key (never past the next tick), apply it, then rotate the
 * log queue if the tick is due. Key handling never resets the tick clock.
 */
export class ControlLoop {
  private _state: LoopState = 'running';
  private lastTick: number;

  constructor(
    private board: Board,
    private logQueue: LogQueue,
    private renderer: Renderer,
    private input: InputSource,
    private clock: Clock = systemClock,
    private tickRateMs: number = TICK_RATE_MS,
  ) {
    this.lastTick = clock.now();
  }

  get state(): LoopState {
    return this._state;
  }

  async run(): Promise<void> {
    log('[Loop] started');
    while (this._state === 'running') {
      await this.step();
    }
    log('[Loop] terminated');
  }

  async step(): Promise<LoopState> {
    if (this._state === 'terminated') return this._state;

    this.renderer.draw(buildFrame(this.board, this.logQueue));

    const timeout = Math.max(0, this.tickRateMs - (this.clock.now() - this.lastTick));
    const key = await this.input.poll(timeout);
    if (key) {
      const command = resolveCommand(key);
      if (command === 'quit') {
        this._state = 'terminated';
        return this._state;
      }
      if (command) {
        this.dispatch(command);
      }
    }

    if (this.clock.now() - this.lastTick >= this.tickRateMs) {
      this.logQueue.advance();
      this.lastTick = this.clock.now();
    }
    return this._state;
  }

  private dispatch(command: Exclude<Command, 'quit'>) {
    if (command === 'delete_selected') {
      const target = this.board.selectedItem();
      applyCommand(this.board, command);
      if (target) log(`[Board] deleted ${target.label} (${this.board.items.length} left)`);
      return;
    }
    applyCommand(this.board, command);
    if (command === 'column_forward' || command === 'column_backward') {
      log(`[Board] active column: ${STATUS_TITLES[this.board.activeColumn]}`, 'debug');
    }
  }
}
