import {
  sortBoard,
  supersedes,
  type Board,
  type BoardMutation,
  type BoardRepository,
  type Card,
  type CardChanges,
  type CardPriority,
  type Column,
  type ColumnChanges,
  type MutationOutcome,
  type Receipt,
} from '@gatehouse/domain';
import {
  queryable,
  toDate,
  toNullableDate,
  toNullableString,
  toStringArray,
  type Queryable,
  type Row,
} from '../rows';

const CARD_COLUMNS = `id, board_id, column_id, title, description, position,
  assigned_to, priority, due_date, labels, created_at`;
const COLUMN_COLUMNS = 'id, board_id, name, position';

const CARD_FIELDS: Array<[keyof CardChanges, string]> = [
  ['title', 'title'],
  ['description', 'description'],
  ['assignedTo', 'assigned_to'],
  ['priority', 'priority'],
  ['dueDate', 'due_date'],
  ['labels', 'labels'],
];

const COLUMN_FIELDS: Array<[keyof ColumnChanges, string]> = [
  ['name', 'name'],
  ['position', 'position'],
];

const NOT_FOUND: MutationOutcome = { status: 'not_found' };
const SUPERSEDED: MutationOutcome = { status: 'superseded' };

/** Null when the row does not exist; `receipt` is null for rows never written through the gateway. */
type Revision = { receipt: Receipt | null } | null;

/**
 * Board writes are last-write-wins per entity. Each row carries the receipt
 * of the write that produced it; a mutation locks the row, compares
 * receipts, and only then writes.
 */
export class PgBoardRepository implements BoardRepository {
  async findOrganizationId(tx: unknown, boardId: string): Promise<string | null> {
    const result = await queryable(tx).query(
      `SELECT organization_id FROM kanban_boards WHERE id = $1`,
      [boardId],
    );
    return result.rows[0] ? String(result.rows[0].organization_id) : null;
  }

  async getBoard(tx: unknown, boardId: string): Promise<Board | null> {
    const client = queryable(tx);
    const boardResult = await client.query(
      `SELECT id, organization_id, name, description FROM kanban_boards WHERE id = $1`,
      [boardId],
    );
    const row: Row | undefined = boardResult.rows[0];
    if (!row) return null;

    const columns = await client.query(
      `SELECT ${COLUMN_COLUMNS} FROM kanban_columns WHERE board_id = $1`,
      [boardId],
    );
    const cards = await client.query(
      `SELECT ${CARD_COLUMNS} FROM kanban_cards WHERE board_id = $1`,
      [boardId],
    );
    const allCards = cards.rows.map(mapCardRow);

    return sortBoard({
      id: String(row.id),
      organizationId: String(row.organization_id),
      name: String(row.name),
      description: toNullableString(row.description),
      columns: columns.rows.map(mapColumnRow).map((column) => ({
        ...column,
        cards: allCards.filter((card) => card.columnId === column.id),
      })),
    });
  }

  async apply(
    tx: unknown,
    boardId: string,
    mutation: BoardMutation,
    receipt: Receipt,
  ): Promise<MutationOutcome> {
    const client = queryable(tx);

    switch (mutation.kind) {
      case 'card_moved': {
        const rev = await lockRow(client, 'kanban_cards', boardId, mutation.cardId);
        if (!rev || !(await columnExists(client, boardId, mutation.columnId))) return NOT_FOUND;
        if (!supersedes(receipt, rev.receipt)) return SUPERSEDED;
        const result = await client.query(
          `UPDATE kanban_cards
           SET column_id = $3, position = $4, rev_at = $5, rev_conn = $6, updated_at = NOW()
           WHERE id = $1 AND board_id = $2
           RETURNING ${CARD_COLUMNS}`,
          [mutation.cardId, boardId, mutation.columnId, mutation.position, receipt.receivedAt, receipt.connectionId],
        );
        return { status: 'applied', card: mapCardRow(result.rows[0]), column: null };
      }

      case 'card_created': {
        const { card } = mutation;
        if (!(await columnExists(client, boardId, card.columnId))) return NOT_FOUND;
        const rev = await lockRow(client, 'kanban_cards', boardId, card.id);
        if (rev && !supersedes(receipt, rev.receipt)) return SUPERSEDED;
        const result = await client.query(
          `INSERT INTO kanban_cards
             (id, board_id, column_id, title, description, position, assigned_to, priority, due_date, labels, rev_at, rev_conn)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
           ON CONFLICT (id) DO UPDATE SET
             column_id = EXCLUDED.column_id, title = EXCLUDED.title, description = EXCLUDED.description,
             position = EXCLUDED.position, assigned_to = EXCLUDED.assigned_to, priority = EXCLUDED.priority,
             due_date = EXCLUDED.due_date, labels = EXCLUDED.labels,
             rev_at = EXCLUDED.rev_at, rev_conn = EXCLUDED.rev_conn, updated_at = NOW()
           RETURNING ${CARD_COLUMNS}`,
          [
            card.id,
            boardId,
            card.columnId,
            card.title,
            card.description,
            card.position,
            card.assignedTo,
            card.priority,
            card.dueDate,
            card.labels,
            receipt.receivedAt,
            receipt.connectionId,
          ],
        );
        return { status: 'applied', card: mapCardRow(result.rows[0]), column: null };
      }

      case 'card_updated': {
        const rev = await lockRow(client, 'kanban_cards', boardId, mutation.cardId);
        if (!rev) return NOT_FOUND;
        if (!supersedes(receipt, rev.receipt)) return SUPERSEDED;
        const { sets, values } = buildAssignments(CARD_FIELDS, mutation.changes, 2);
        const result = await client.query(
          `UPDATE kanban_cards
           SET ${[...sets, `rev_at = $${values.length + 3}`, `rev_conn = $${values.length + 4}`].join(', ')},
               updated_at = NOW()
           WHERE id = $1 AND board_id = $2
           RETURNING ${CARD_COLUMNS}`,
          [mutation.cardId, boardId, ...values, receipt.receivedAt, receipt.connectionId],
        );
        return { status: 'applied', card: mapCardRow(result.rows[0]), column: null };
      }

      case 'card_deleted': {
        const rev = await lockRow(client, 'kanban_cards', boardId, mutation.cardId);
        if (!rev) return NOT_FOUND;
        if (!supersedes(receipt, rev.receipt)) return SUPERSEDED;
        await client.query(`DELETE FROM kanban_cards WHERE id = $1 AND board_id = $2`, [
          mutation.cardId,
          boardId,
        ]);
        return { status: 'applied', card: null, column: null };
      }

      case 'column_created': {
        const { column } = mutation;
        const rev = await lockRow(client, 'kanban_columns', boardId, column.id);
        if (rev && !supersedes(receipt, rev.receipt)) return SUPERSEDED;
        const result = await client.query(
          `INSERT INTO kanban_columns (id, board_id, name, position, rev_at, rev_conn)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (id) DO UPDATE SET
             name = EXCLUDED.name, position = EXCLUDED.position,
             rev_at = EXCLUDED.rev_at, rev_conn = EXCLUDED.rev_conn
           RETURNING ${COLUMN_COLUMNS}`,
          [column.id, boardId, column.name, column.position, receipt.receivedAt, receipt.connectionId],
        );
        return { status: 'applied', card: null, column: mapColumnRow(result.rows[0]) };
      }

      case 'column_updated': {
        const rev = await lockRow(client, 'kanban_columns', boardId, mutation.columnId);
        if (!rev) return NOT_FOUND;
        if (!supersedes(receipt, rev.receipt)) return SUPERSEDED;
        const { sets, values } = buildAssignments(COLUMN_FIELDS, mutation.changes, 2);
        const result = await client.query(
          `UPDATE kanban_columns
           SET ${[...sets, `rev_at = $${values.length + 3}`, `rev_conn = $${values.length + 4}`].join(', ')}
           WHERE id = $1 AND board_id = $2
           RETURNING ${COLUMN_COLUMNS}`,
          [mutation.columnId, boardId, ...values, receipt.receivedAt, receipt.connectionId],
        );
        return { status: 'applied', card: null, column: mapColumnRow(result.rows[0]) };
      }

      case 'column_deleted': {
        const rev = await lockRow(client, 'kanban_columns', boardId, mutation.columnId);
        if (!rev) return NOT_FOUND;
        if (!supersedes(receipt, rev.receipt)) return SUPERSEDED;
        // Cards go with the column (ON DELETE CASCADE).
        await client.query(`DELETE FROM kanban_columns WHERE id = $1 AND board_id = $2`, [
          mutation.columnId,
          boardId,
        ]);
        return { status: 'applied', card: null, column: null };
      }
    }
  }
}

async function lockRow(
  client: Queryable,
  table: 'kanban_cards' | 'kanban_columns',
  boardId: string,
  id: string,
): Promise<Revision> {
  const result = await client.query(
    `SELECT rev_at, rev_conn FROM ${table} WHERE id = $1 AND board_id = $2 FOR UPDATE`,
    [id, boardId],
  );
  const row: Row | undefined = result.rows[0];
  if (!row) return null;
  if (row.rev_at === null || row.rev_conn === null) return { receipt: null };
  return { receipt: { receivedAt: Number(row.rev_at), connectionId: String(row.rev_conn) } };
}

async function columnExists(client: Queryable, boardId: string, columnId: string): Promise<boolean> {
  const result = await client.query(
    `SELECT 1 FROM kanban_columns WHERE id = $1 AND board_id = $2`,
    [columnId, boardId],
  );
  return result.rows.length > 0;
}

/** SET clauses for the fields present in `changes`, numbered after `offset` leading parameters. */
function buildAssignments<K extends string>(
  fields: Array<[K, string]>,
  changes: Partial<Record<K, unknown>>,
  offset: number,
): { sets: string[]; values: unknown[] } {
  const sets: string[] = [];
  const values: unknown[] = [];
  for (const [key, column] of fields) {
    const value = changes[key];
    if (value === undefined) continue;
    values.push(value);
    sets.push(`${column} = $${offset + values.length}`);
  }
  return { sets, values };
}

const PRIORITIES: readonly CardPriority[] = ['low', 'medium', 'high', 'urgent'];

function toPriority(value: unknown): CardPriority {
  return PRIORITIES.find((p) => p === value) ?? 'medium';
}

function mapCardRow(row: Row): Card {
  return {
    id: String(row.id),
    boardId: String(row.board_id),
    columnId: String(row.column_id),
    title: String(row.title),
    description: toNullableString(row.description),
    position: Number(row.position),
    assignedTo: toNullableString(row.assigned_to),
    priority: toPriority(row.priority),
    dueDate: toNullableDate(row.due_date),
    labels: toStringArray(row.labels),
    createdAt: toDate(row.created_at),
  };
}

function mapColumnRow(row: Row): Column {
  return {
    id: String(row.id),
    boardId: String(row.board_id),
    name: String(row.name),
    position: Number(row.position),
  };
}
