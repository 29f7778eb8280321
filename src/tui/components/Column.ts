import blessed from 'blessed';
import type { ColumnView, Status } from '../../core/types';
import { STATUS_TITLES } from '../../core/status';

const DETAIL_LINE = 'Something important to do';

const HIGHLIGHT_SYMBOL: Record<Status, string> = {
  todo: '>> ',
  up_next: '>> ',
  in_progress: '&& ',
};

export interface ColumnRows {
  /** Tagged rows, ready for the box content. */
  rows: string[];
  /** Row of the selected item's label, if the column has a selection. */
  selectedRow?: number;
}

const highlight = (row: string) => `{yellow-bg}{black-fg}{bold}${row}{/}`;

/**
 * One row for the label, then `weight` detail rows per item. Every row of the
 * selected item is highlighted.
 */
export function layoutColumn(view: ColumnView): ColumnRows {
  const symbol = HIGHLIGHT_SYMBOL[view.status];
  const pad = ' '.repeat(symbol.length);
  const rows: string[] = [];
  let selectedRow: number | undefined;

  view.items.forEach((item, i) => {
    if (i === view.selected) {
      selectedRow = rows.length;
      rows.push(highlight(`${symbol}${item.label}`));
      for (let n = 0; n < item.weight; n++) {
        rows.push(highlight(`${pad}${DETAIL_LINE}`));
      }
      return;
    }
    rows.push(`${pad}${item.label}`);
    for (let n = 0; n < item.weight; n++) {
      rows.push(`${pad}{grey-fg}${DETAIL_LINE}{/}`);
    }
  });

  return selectedRow === undefined ? { rows } : { rows, selectedRow };
}

export class Column {
  widget: blessed.Widgets.BoxElement;
  readonly status: Status;

  constructor(screen: blessed.Widgets.Screen, status: Status, index: number, top: number, bottom: number) {
    this.status = status;
    this.widget = blessed.box({
      parent: screen,
      top,
      bottom,
      left: `${index * 33}%`,
      width: index === 2 ? '34%' : '33%',
      label: ` ${STATUS_TITLES[status]} `,
      border: { type: 'line' },
      style: { border: { fg: 'gray' } },
      tags: true,
      scrollable: true,
      scrollbar: {
        ch: ' ',
        track: { bg: 'gray' },
        style: { inverse: true }
      }
    });
  }

  update(view: ColumnView) {
    const { rows, selectedRow } = layoutColumn(view);
    this.widget.setContent(rows.join('\n'));
    this.widget.scrollTo(selectedRow ?? 0);
    this.widget.style.border.fg = view.active ? 'yellow' : 'gray';
    this.widget.setLabel(view.active
      ? ` {yellow-fg}{bold}${STATUS_TITLES[this.status]}{/} `
      : ` ${STATUS_TITLES[this.status]} `);
  }
}
