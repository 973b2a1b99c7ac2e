import { describe, it, expect } from 'vitest';
import { compareReceipts, supersedes, sortBoard, type Board, type Card } from '../board';

describe('compareReceipts', () => {
  it('orders by receipt time first', () => {
    expect(
      compareReceipts({ receivedAt: 1, connectionId: '9' }, { receivedAt: 2, connectionId: '1' }),
    ).toBeLessThan(0);
  });

  it('breaks ties by connection id, numerically for numeric ids', () => {
    expect(
      compareReceipts({ receivedAt: 5, connectionId: '10' }, { receivedAt: 5, connectionId: '9' }),
    ).toBeGreaterThan(0);
    expect(
      compareReceipts({ receivedAt: 5, connectionId: 'conn-a' }, { receivedAt: 5, connectionId: 'conn-b' }),
    ).toBeLessThan(0);
  });
});

describe('supersedes', () => {
  it('accepts the first write to an entity', () => {
    expect(supersedes({ receivedAt: 1, connectionId: 'a' }, null)).toBe(true);
  });

  it('rejects a write received before the current one', () => {
    expect(
      supersedes({ receivedAt: 1, connectionId: 'a' }, { receivedAt: 2, connectionId: 'a' }),
    ).toBe(false);
  });

  it('rejects a replay of the same receipt', () => {
    const receipt = { receivedAt: 3, connectionId: 'a' };
    expect(supersedes(receipt, receipt)).toBe(false);
  });
});

function card(id: string, position: number): Card {
  return {
    id,
    boardId: 'B1',
    columnId: 'col1',
    title: id,
    description: null,
    position,
    assignedTo: null,
    priority: 'medium',
    dueDate: null,
    labels: [],
    createdAt: new Date('2026-01-01T00:00:00Z'),
  };
}

describe('sortBoard', () => {
  it('orders columns and cards by position', () => {
    const board: Board = {
      id: 'B1',
      organizationId: 'org-1',
      name: 'Roadmap',
      description: null,
      columns: [
        { id: 'col2', boardId: 'B1', name: 'Done', position: 1, cards: [] },
        { id: 'col1', boardId: 'B1', name: 'Todo', position: 0, cards: [card('c2', 1), card('c1', 0)] },
      ],
    };

    const sorted = sortBoard(board);

    expect(sorted.columns.map((c) => c.id)).toEqual(['col1', 'col2']);
    expect(sorted.columns[0]?.cards.map((c) => c.id)).toEqual(['c1', 'c2']);
  });
});
