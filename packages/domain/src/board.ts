export type CardPriority = 'low' | 'medium' | 'high' | 'urgent';

export interface Card {
  id: string;
  boardId: string;
  columnId: string;
  title: string;
  description: string | null;
  position: number;
  assignedTo: string | null;
  priority: CardPriority;
  dueDate: Date | null;
  labels: string[];
  createdAt: Date;
}

export interface Column {
  id: string;
  boardId: string;
  name: string;
  position: number;
}

export interface Board {
  id: string;
  organizationId: string;
  name: string;
  description: string | null;
  columns: Array<Column & { cards: Card[] }>;
}

export interface CardChanges {
  title?: string;
  description?: string | null;
  assignedTo?: string | null;
  priority?: CardPriority;
  dueDate?: Date | null;
  labels?: string[];
}

export interface ColumnChanges {
  name?: string;
  position?: number;
}

export type BoardMutation =
  | { kind: 'card_moved'; cardId: string; columnId: string; position: number }
  | {
      kind: 'card_created';
      card: Omit<Card, 'boardId' | 'createdAt'>;
    }
  | { kind: 'card_updated'; cardId: string; changes: CardChanges }
  | { kind: 'card_deleted'; cardId: string }
  | { kind: 'column_created'; column: Omit<Column, 'boardId'> }
  | { kind: 'column_updated'; columnId: string; changes: ColumnChanges }
  | { kind: 'column_deleted'; columnId: string };

/**
 * When the server received a write, and on which connection. Writes to the
 * same entity are ordered by `receivedAt`, then by connection id.
 */
export interface Receipt {
  receivedAt: number;
  connectionId: string;
}

export type MutationOutcome =
  | { status: 'applied'; card: Card | null; column: Column | null }
  | { status: 'superseded' }
  | { status: 'not_found' };

function compareIds(a: string, b: string): number {
  // Numeric ids compare by magnitude, anything else lexically.
  if (/^\d+$/.test(a) && /^\d+$/.test(b) && a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareReceipts(a: Receipt, b: Receipt): number {
  if (a.receivedAt !== b.receivedAt) return a.receivedAt - b.receivedAt;
  return compareIds(a.connectionId, b.connectionId);
}

/** True when `incoming` should overwrite an entity last written at `current`. */
export function supersedes(incoming: Receipt, current: Receipt | null): boolean {
  return current === null || compareReceipts(incoming, current) > 0;
}

export function sortBoard(board: Board): Board {
  const byPosition = <T extends { position: number; id: string }>(a: T, b: T) =>
    a.position - b.position || compareIds(a.id, b.id);
  return {
    ...board,
    columns: [...board.columns]
      .sort(byPosition)
      .map((col) => ({ ...col, cards: [...col.cards].sort(byPosition) })),
  };
}
