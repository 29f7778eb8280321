import { nextStatus, prevStatus } from './status';
import type { ColumnView, Item, Status } from './types';

/**
 * Work items plus a single selection cursor and the active column.
 *
 * The cursor indexes the full item sequence, not the column the user is
 * looking at. Columns are filtered on every draw, so a selection only shows
 * up in a column whose filtered list is long enough to contain that index.
 */
export class Board {
  private _items: Item[];
  private _selected: number | undefined = undefined;
  private _activeColumn: Status;

  constructor(items: Item[], activeColumn: Status = 'todo') {
    this._items = items.map(item => ({ ...item }));
    this._activeColumn = activeColumn;
  }

  get items(): readonly Item[] {
    return this._items;
  }

  get selected(): number | undefined {
    return this._selected;
  }

  get activeColumn(): Status {
    return this._activeColumn;
  }

  selectedItem(): Item | undefined {
    if (this._selected === undefined) return undefined;
    return this._items[this._selected];
  }

  itemsWithStatus(status: Status): Item[] {
    return this._items.filter(item => item.status === status);
  }

  selectNext() {
    if (this._items.length === 0) return;
    const i = this._selected;
    if (i === undefined) {
      this._selected = 0;
    } else {
      this._selected = i >= this._items.length - 1 ? 0 : i + 1;
    }
  }

  selectPrevious() {
    if (this._items.length === 0) return;
    const i = this._selected;
    if (i === undefined) {
      this._selected = 0;
    } else {
      this._selected = i === 0 ? this._items.length - 1 : i - 1;
    }
  }

  unselect() {
    this._selected = undefined;
  }

  /** Removes the selected item and returns it, or undefined when nothing is selected. */
  deleteSelected(): Item | undefined {
    const i = this._selected;
    if (i === undefined) return undefined;
    const [removed] = this._items.splice(i, 1);
    this._selected = this._items.length > 0 ? Math.max(0, i - 1) : undefined;
    return removed;
  }

  cycleActiveColumnForward() {
    this._activeColumn = nextStatus(this._activeColumn);
  }

  cycleActiveColumnBackward() {
    this._activeColumn = prevStatus(this._activeColumn);
  }

  columnView(status: Status): ColumnView {
    const items = this.itemsWithStatus(status);
    const view: ColumnView = { status, items, active: status === this._activeColumn };
    if (this._selected !== undefined && this._selected < items.length) {
      view.selected = this._selected;
    }
    return view;
  }
}
