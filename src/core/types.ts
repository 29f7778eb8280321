export type Status = 'todo' | 'up_next' | 'in_progress';

/** Column order, left to right. */
export const STATUSES: readonly Status[] = ['todo', 'up_next', 'in_progress'];

export interface Item {
  label: string;
  /** Number of detail lines shown under the label. Always a positive integer. */
  weight: number;
  status: Status;
}

export type Severity = 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface LogEntry {
  label: string;
  severity: Severity;
}

/** What a single column needs to draw itself. */
export interface ColumnView {
  status: Status;
  items: readonly Item[];
  /** Index into `items`, only present when the board selection falls inside this column's filtered list. */
  selected?: number;
  active: boolean;
}

export interface BoardFrame {
  columns: ColumnView[];
  logs: readonly LogEntry[];
  totalItems: number;
  activeColumn: Status;
}
