import blessed from 'blessed';
import type { BoardFrame } from '../../core/types';
import { STATUS_TITLES } from '../../core/status';

export function formatHeader(title: string, frame: BoardFrame): string {
  const counts = frame.columns
    .map(c => `${STATUS_TITLES[c.status]}: ${c.items.length}`)
    .join(' | ');
  return ` ${title} | Items: ${frame.totalItems} | ${counts} | Active: ${STATUS_TITLES[frame.activeColumn]}`;
}

export class Header {
  widget: blessed.Widgets.BoxElement;
  private title: string;

  constructor(screen: blessed.Widgets.Screen, title: string) {
    this.title = title;
    this.widget = blessed.box({
      parent: screen,
      top: 0,
      left: 0,
      width: '100%',
      height: 1,
      style: { bg: 'blue', fg: 'white', bold: true }
    });
  }

  update(frame: BoardFrame) {
    this.widget.setContent(formatHeader(this.title, frame));
  }
}
