import type { LogEntry } from './types';

/** Fixed set of log entries that rotate by one on every tick. */
export class LogQueue {
  private _entries: LogEntry[];

  constructor(entries: LogEntry[]) {
    this._entries = entries.map(entry => ({ ...entry }));
  }

  get entries(): readonly LogEntry[] {
    return this._entries;
  }

  get size(): number {
    return this._entries.length;
  }

  advance() {
    const head = this._entries.shift();
    if (head) this._entries.push(head);
  }
}
