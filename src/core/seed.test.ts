import { describe, it, expect } from 'vitest';
import { createInitialState, parseSeed } from './seed';
import { SeedError } from '../utils/errors';

describe('createInitialState', () => {
  it('builds the bundled board', () => {
    const { board, logQueue } = createInitialState();
    expect(board.items).toHaveLength(24);
    expect(board.itemsWithStatus('todo')).toHaveLength(10);
    expect(board.itemsWithStatus('in_progress')).toHaveLength(11);
    expect(board.itemsWithStatus('up_next')).toHaveLength(3);
    expect(board.items[9]).toEqual({ label: 'Item9', weight: 6, status: 'todo' });
    expect(board.items[23]).toEqual({ label: 'Item23', weight: 3, status: 'up_next' });
    expect(board.activeColumn).toBe('todo');
    expect(board.selected).toBeUndefined();

    expect(logQueue.size).toBe(26);
    expect(logQueue.entries[0]).toEqual({ label: 'Event1', severity: 'INFO' });
    expect(logQueue.entries[2]).toEqual({ label: 'Event3', severity: 'CRITICAL' });
  });

  it('returns independent state on every call', () => {
    const first = createInitialState();
    first.board.selectNext();
    first.board.deleteSelected();
    first.logQueue.advance();

    const second = createInitialState();
    expect(second.board.items).toHaveLength(24);
    expect(second.logQueue.entries[0]?.label).toBe('Event1');
  });
});

describe('parseSeed', () => {
  const valid = {
    items: [{ label: 'A', weight: 2, status: 'up_next' }],
    logs: [{ label: 'E', severity: 'WARNING' }],
  };

  it('defaults the active column to todo', () => {
    expect(parseSeed(valid).activeColumn).toBe('todo');
  });

  it('rejects a non-positive weight', () => {
    const bad = { ...valid, items: [{ label: 'A', weight: 0, status: 'todo' }] };
    expect(() => parseSeed(bad)).toThrow(SeedError);
    try {
      parseSeed(bad);
    } catch (err) {
      expect(err).toBeInstanceOf(SeedError);
      if (err instanceof SeedError) {
        expect(err.code).toBe('SEED_INVALID');
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^items\.0\.weight: /);
      }
    }
  });

  it('rejects an unknown status and an empty log list', () => {
    const bad = { items: [{ label: 'A', weight: 1, status: 'done' }], logs: [] };
    try {
      parseSeed(bad);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SeedError);
      if (err instanceof SeedError) {
        expect(err.issues.map(i => i.split(':')[0])).toEqual(['items.0.status', 'logs']);
      }
    }
  });
});
