import blessed from 'blessed';
import type { LogEntry, Severity } from '../../core/types';

const SEVERITY_COLOR: Record<Severity, string> = {
  INFO: 'white',
  WARNING: 'yellow',
  ERROR: 'red',
  CRITICAL: 'magenta',
};

export function formatLogEntry(entry: LogEntry): string {
  const color = SEVERITY_COLOR[entry.severity];
  return `{${color}-fg}${entry.severity.padEnd(8)}{/} ${entry.label}`;
}

export class LogArea {
  widget: blessed.Widgets.BoxElement;

  constructor(screen: blessed.Widgets.Screen, logHeight: number, commandBarHeight: number) {
    this.widget = blessed.box({
      parent: screen,
      bottom: commandBarHeight,
      left: 0,
      width: '100%',
      height: logHeight,
      label: ' LOGS ',
      border: { type: 'line' },
      style: { border: { fg: 'gray' } },
      tags: true,
      scrollable: true
    });
  }

  /** Shows the head of the queue; the queue rotates, so the view scrolls by itself. */
  update(entries: readonly LogEntry[]) {
    const height = typeof this.widget.height === 'number' ? this.widget.height : entries.length + 2;
    const visible = Math.max(1, height - 2);
    this.widget.setContent(entries.slice(0, visible).map(formatLogEntry).join('\n'));
  }
}
