import { describe, it, expect } from 'vitest';
import type { Board } from '@gatehouse/domain';
import { InMemoryBoardRepository } from '../board-store';

const created = new Date('2026-01-01T00:00:00Z');

function seeded(): InMemoryBoardRepository {
  const repo = new InMemoryBoardRepository(() => created.getTime());
  const board: Board = {
    id: 'B1',
    organizationId: 'org-1',
    name: 'Roadmap',
    description: null,
    columns: [
      {
        id: 'col1',
        boardId: 'B1',
        name: 'Todo',
        position: 0,
        cards: [
          {
            id: 'C1',
            boardId: 'B1',
            columnId: 'col1',
            title: 'Write docs',
            description: null,
            position: 0,
            assignedTo: null,
            priority: 'medium',
            dueDate: null,
            labels: [],
            createdAt: created,
          },
        ],
      },
      { id: 'col2', boardId: 'B1', name: 'Done', position: 1, cards: [] },
    ],
  };
  repo.seed(board);
  return repo;
}

describe('InMemoryBoardRepository', () => {
  it('moves a card and reports the new location', async () => {
    const repo = seeded();
    const outcome = await repo.apply(
      null,
      'B1',
      { kind: 'card_moved', cardId: 'C1', columnId: 'col2', position: 0 },
      { receivedAt: 1, connectionId: 'a' },
    );

    expect(outcome.status).toBe('applied');
    const board = await repo.getBoard(null, 'B1');
    expect(board?.columns[1]?.cards.map((c) => c.id)).toEqual(['C1']);
  });

  it('keeps the later write when two arrive out of order', async () => {
    const repo = seeded();
    await repo.apply(
      null,
      'B1',
      { kind: 'card_moved', cardId: 'C1', columnId: 'col2', position: 0 },
      { receivedAt: 10, connectionId: 'b' },
    );

    const stale = await repo.apply(
      null,
      'B1',
      { kind: 'card_moved', cardId: 'C1', columnId: 'col1', position: 3 },
      { receivedAt: 10, connectionId: 'a' },
    );

    expect(stale).toEqual({ status: 'superseded' });
    const board = await repo.getBoard(null, 'B1');
    expect(board?.columns[1]?.cards[0]?.columnId).toBe('col2');
  });

  it('reports unknown entities', async () => {
    const repo = seeded();
    const receipt = { receivedAt: 1, connectionId: 'a' };

    expect(await repo.apply(null, 'B1', { kind: 'card_deleted', cardId: 'nope' }, receipt)).toEqual({
      status: 'not_found',
    });
    expect(await repo.apply(null, 'B9', { kind: 'card_deleted', cardId: 'C1' }, receipt)).toEqual({
      status: 'not_found',
    });
    expect(await repo.findOrganizationId(null, 'B9')).toBeNull();
  });

  it('creates cards with the board id and creation time', async () => {
    const repo = seeded();
    const outcome = await repo.apply(
      null,
      'B1',
      {
        kind: 'card_created',
        card: {
          id: 'C2',
          columnId: 'col1',
          title: 'Ship it',
          description: null,
          position: 1,
          assignedTo: 'u2',
          priority: 'high',
          dueDate: null,
          labels: ['release'],
        },
      },
      { receivedAt: 2, connectionId: 'a' },
    );

    expect(outcome.status === 'applied' && outcome.card).toMatchObject({
      id: 'C2',
      boardId: 'B1',
      createdAt: created,
    });
  });

  it('removes a column with its cards', async () => {
    const repo = seeded();
    await repo.apply(null, 'B1', { kind: 'column_deleted', columnId: 'col1' }, { receivedAt: 3, connectionId: 'a' });

    const board = await repo.getBoard(null, 'B1');
    expect(board?.columns.map((c) => c.id)).toEqual(['col2']);
    expect(
      await repo.apply(null, 'B1', { kind: 'card_deleted', cardId: 'C1' }, { receivedAt: 4, connectionId: 'a' }),
    ).toEqual({ status: 'not_found' });
  });
});
