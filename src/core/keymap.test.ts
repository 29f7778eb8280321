import { describe, it, expect } from 'vitest';
import { applyCommand, resolveCommand } from './keymap';
import { Board } from './board';

describe('resolveCommand', () => {
  it('maps the board keys', () => {
    expect(resolveCommand({ name: 'q', full: 'q' })).toBe('quit');
    expect(resolveCommand({ name: 'c', full: 'C-c' })).toBe('quit');
    expect(resolveCommand({ name: 'left', full: 'left' })).toBe('unselect');
    expect(resolveCommand({ name: 'down', full: 'down' })).toBe('select_next');
    expect(resolveCommand({ name: 'j', full: 'j' })).toBe('select_next');
    expect(resolveCommand({ name: 'up', full: 'up' })).toBe('select_previous');
    expect(resolveCommand({ name: 'k', full: 'k' })).toBe('select_previous');
    expect(resolveCommand({ name: 'l', full: 'l' })).toBe('column_forward');
    expect(resolveCommand({ name: 'h', full: 'h' })).toBe('column_backward');
    expect(resolveCommand({ name: 'x', full: 'x' })).toBe('delete_selected');
  });

  it('falls back to the raw character', () => {
    expect(resolveCommand({ ch: 'x' })).toBe('delete_selected');
  });

  it('ignores unmapped keys', () => {
    expect(resolveCommand({ name: 'c', full: 'c' })).toBeUndefined();
    expect(resolveCommand({ name: 'j', full: 'S-j' })).toBeUndefined();
    expect(resolveCommand({ name: 'right', full: 'right' })).toBeUndefined();
    expect(resolveCommand({ full: 'constructor' })).toBeUndefined();
    expect(resolveCommand({})).toBeUndefined();
  });
});

describe('applyCommand', () => {
  it('routes commands to the board', () => {
    const board = new Board([
      { label: 'A', weight: 1, status: 'todo' },
      { label: 'B', weight: 1, status: 'todo' },
    ]);
    applyCommand(board, 'select_previous');
    applyCommand(board, 'select_next');
    expect(board.selected).toBe(1);
    applyCommand(board, 'column_backward');
    expect(board.activeColumn).toBe('in_progress');
    applyCommand(board, 'column_forward');
    expect(board.activeColumn).toBe('todo');
    applyCommand(board, 'delete_selected');
    expect(board.items.map(i => i.label)).toEqual(['A']);
    applyCommand(board, 'unselect');
    expect(board.selected).toBeUndefined();
  });
});
