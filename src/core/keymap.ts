import type { Board } from './board';

export type Command =
  | 'quit'
  | 'unselect'
  | 'select_next'
  | 'select_previous'
  | 'column_forward'
  | 'column_backward'
  | 'delete_selected';

/** Subset of the blessed key event the board cares about. */
export interface KeyPress {
  name?: string;
  full?: string;
  ch?: string;
}

const KEYMAP = new Map<string, Command>([
  ['q', 'quit'],
  ['C-c', 'quit'],
  ['left', 'unselect'],
  ['down', 'select_next'],
  ['j', 'select_next'],
  ['up', 'select_previous'],
  ['k', 'select_previous'],
  ['l', 'column_forward'],
  ['h', 'column_backward'],
  ['x', 'delete_selected'],
]);

export function resolveCommand(key: KeyPress): Command | undefined {
  const id = key.full ?? key.name ?? key.ch;
  if (id === undefined) return undefined;
  return KEYMAP.get(id);
}

/** Applies every command except `quit`, which belongs to the control loop. */
export function applyCommand(board: Board, command: Exclude<Command, 'quit'>) {
  switch (command) {
    case 'unselect':
      board.unselect();
      break;
    case 'select_next':
      board.selectNext();
      break;
    case 'select_previous':
      board.selectPrevious();
      break;
    case 'column_forward':
      board.cycleActiveColumnForward();
      break;
    case 'column_backward':
      board.cycleActiveColumnBackward();
      break;
    case 'delete_selected':
      board.deleteSelected();
      break;
  }
}

export const KEY_HELP = ' [j/k] Select | [Left] Unselect | [h/l] Column | [x] Delete | [q] Quit';
