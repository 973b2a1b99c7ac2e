import {
  sortBoard,
  supersedes,
  type Board,
  type BoardMutation,
  type BoardRepository,
  type Card,
  type Column,
  type MutationOutcome,
  type Receipt,
} from '@gatehouse/domain';

interface BoardRecord {
  id: string;
  organizationId: string;
  name: string;
  description: string | null;
  columns: Map<string, Column>;
  cards: Map<string, Card>;
  revisions: Map<string, Receipt>;
}

/**
 * Process-local board repository with the same last-write-wins rules as the
 * PostgreSQL one. Used by tests and single-instance development.
 */
export class InMemoryBoardRepository implements BoardRepository {
  private readonly boards = new Map<string, BoardRecord>();

  constructor(private readonly clock: () => number = Date.now) {}

  seed(board: Board): void {
    const record: BoardRecord = {
      id: board.id,
      organizationId: board.organizationId,
      name: board.name,
      description: board.description,
      columns: new Map(),
      cards: new Map(),
      revisions: new Map(),
    };
    for (const { cards, ...column } of board.columns) {
      record.columns.set(column.id, column);
      for (const card of cards) record.cards.set(card.id, card);
    }
    this.boards.set(board.id, record);
  }

  async findOrganizationId(_tx: unknown, boardId: string): Promise<string | null> {
    return this.boards.get(boardId)?.organizationId ?? null;
  }

  async getBoard(_tx: unknown, boardId: string): Promise<Board | null> {
    const record = this.boards.get(boardId);
    if (!record) return null;
    const cards = [...record.cards.values()];
    return sortBoard({
      id: record.id,
      organizationId: record.organizationId,
      name: record.name,
      description: record.description,
      columns: [...record.columns.values()].map((column) => ({
        ...column,
        cards: cards.filter((card) => card.columnId === column.id),
      })),
    });
  }

  async apply(
    _tx: unknown,
    boardId: string,
    mutation: BoardMutation,
    receipt: Receipt,
  ): Promise<MutationOutcome> {
    const board = this.boards.get(boardId);
    if (!board) return { status: 'not_found' };

    switch (mutation.kind) {
      case 'card_moved': {
        const card = board.cards.get(mutation.cardId);
        if (!card || !board.columns.has(mutation.columnId)) return { status: 'not_found' };
        if (!this.claim(board, mutation.cardId, receipt)) return { status: 'superseded' };
        const moved = { ...card, columnId: mutation.columnId, position: mutation.position };
        board.cards.set(moved.id, moved);
        return { status: 'applied', card: moved, column: null };
      }
      case 'card_created': {
        if (!board.columns.has(mutation.card.columnId)) return { status: 'not_found' };
        if (!this.claim(board, mutation.card.id, receipt)) return { status: 'superseded' };
        const card: Card = { ...mutation.card, boardId, createdAt: new Date(this.clock()) };
        board.cards.set(card.id, card);
        return { status: 'applied', card, column: null };
      }
      case 'card_updated': {
        const card = board.cards.get(mutation.cardId);
        if (!card) return { status: 'not_found' };
        if (!this.claim(board, mutation.cardId, receipt)) return { status: 'superseded' };
        const updated = { ...card, ...mutation.changes };
        board.cards.set(updated.id, updated);
        return { status: 'applied', card: updated, column: null };
      }
      case 'card_deleted': {
        if (!board.cards.has(mutation.cardId)) return { status: 'not_found' };
        if (!this.claim(board, mutation.cardId, receipt)) return { status: 'superseded' };
        board.cards.delete(mutation.cardId);
        return { status: 'applied', card: null, column: null };
      }
      case 'column_created': {
        if (!this.claim(board, mutation.column.id, receipt)) return { status: 'superseded' };
        const column: Column = { ...mutation.column, boardId };
        board.columns.set(column.id, column);
        return { status: 'applied', card: null, column };
      }
      case 'column_updated': {
        const column = board.columns.get(mutation.columnId);
        if (!column) return { status: 'not_found' };
        if (!this.claim(board, mutation.columnId, receipt)) return { status: 'superseded' };
        const updated = { ...column, ...mutation.changes };
        board.columns.set(updated.id, updated);
        return { status: 'applied', card: null, column: updated };
      }
      case 'column_deleted': {
        if (!board.columns.has(mutation.columnId)) return { status: 'not_found' };
        if (!this.claim(board, mutation.columnId, receipt)) return { status: 'superseded' };
        board.columns.delete(mutation.columnId);
        for (const [id, card] of board.cards) {
          if (card.columnId === mutation.columnId) board.cards.delete(id);
        }
        return { status: 'applied', card: null, column: null };
      }
    }
  }

  private claim(board: BoardRecord, entityId: string, receipt: Receipt): boolean {
    if (!supersedes(receipt, board.revisions.get(entityId) ?? null)) return false;
    board.revisions.set(entityId, receipt);
    return true;
  }
}
