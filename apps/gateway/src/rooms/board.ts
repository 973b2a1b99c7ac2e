import {
  type Board,
  type BoardMutation,
  type Card,
  type CardChanges,
  type Column,
  type ColumnChanges,
  type MutationOutcome,
} from '@gatehouse/domain';
import {
  boardState,
  cardCreated,
  cardDeleted,
  cardMoved,
  cardUpdated,
  columnCreated,
  columnDeleted,
  columnUpdated,
  errorFrame,
  CARD_CREATED,
  CARD_DELETED,
  CARD_MOVED,
  CARD_UPDATED,
  COLUMN_CREATED,
  COLUMN_DELETED,
  COLUMN_UPDATED,
  TYPING,
  type BoardClientFrame,
  type BoardWire,
  type CardUpdatedFrame,
  type CardWire,
  type ClientFrame,
  type ClientFrameType,
  type ColumnUpdatedFrame,
  type ColumnWire,
} from '@gatehouse/proto';
import { AppError, ErrorCode } from '@gatehouse/shared';
import { type Connection } from '../connections';
import { type Room } from '../registry';
import { publishTyping } from './chat';
import { type RoomBehavior, type RoomContext } from './types';

const BOARD_PREFIX = 'board:';

export function toCardWire(card: Card): CardWire {
  return {
    id: card.id,
    column_id: card.columnId,
    title: card.title,
    description: card.description,
    position: card.position,
    assigned_to: card.assignedTo,
    priority: card.priority,
    due_date: card.dueDate ? card.dueDate.toISOString() : null,
    labels: card.labels,
    created_at: card.createdAt.toISOString(),
  };
}

export function toColumnWire(column: Column): ColumnWire {
  return { id: column.id, board_id: column.boardId, name: column.name, position: column.position };
}

export function toBoardWire(board: Board): BoardWire {
  return {
    id: board.id,
    name: board.name,
    description: board.description,
    columns: board.columns.map((column) => ({
      id: column.id,
      name: column.name,
      position: column.position,
      cards: column.cards.map(toCardWire),
    })),
  };
}

function toCardChanges(data: CardUpdatedFrame['update_data']): CardChanges {
  const changes: CardChanges = {};
  if (data.title !== undefined) changes.title = data.title;
  if (data.description !== undefined) changes.description = data.description;
  if (data.assigned_to !== undefined) changes.assignedTo = data.assigned_to;
  if (data.priority !== undefined) changes.priority = data.priority;
  if (data.due_date !== undefined) changes.dueDate = data.due_date === null ? null : new Date(data.due_date);
  if (data.labels !== undefined) changes.labels = data.labels;
  return changes;
}

function toColumnChanges(data: ColumnUpdatedFrame['update_data']): ColumnChanges {
  const changes: ColumnChanges = {};
  if (data.name !== undefined) changes.name = data.name;
  if (data.position !== undefined) changes.position = data.position;
  return changes;
}

/** Maps a client frame to a write, generating ids for created entities. */
export function toMutation(frame: BoardClientFrame, newId: () => string): BoardMutation {
  switch (frame.type) {
    case CARD_MOVED:
      return { kind: 'card_moved', cardId: frame.card_id, columnId: frame.new_column_id, position: frame.new_position };
    case CARD_CREATED: {
      const data = frame.card_data;
      return {
        kind: 'card_created',
        card: {
          id: newId(),
          columnId: data.column_id,
          title: data.title,
          description: data.description ?? null,
          position: data.position,
          assignedTo: data.assigned_to ?? null,
          priority: data.priority,
          dueDate: data.due_date ? new Date(data.due_date) : null,
          labels: data.labels,
        },
      };
    }
    case CARD_UPDATED:
      return { kind: 'card_updated', cardId: frame.card_id, changes: toCardChanges(frame.update_data) };
    case CARD_DELETED:
      return { kind: 'card_deleted', cardId: frame.card_id };
    case COLUMN_CREATED:
      return {
        kind: 'column_created',
        column: { id: newId(), name: frame.column_data.name, position: frame.column_data.position },
      };
    case COLUMN_UPDATED:
      return { kind: 'column_updated', columnId: frame.column_id, changes: toColumnChanges(frame.update_data) };
    case COLUMN_DELETED:
      return { kind: 'column_deleted', columnId: frame.column_id };
  }
}

type Applied = Extract<MutationOutcome, { status: 'applied' }>;

/** What the other members see once a write has been applied. */
export function appliedFrame(roomId: string, frame: BoardClientFrame, outcome: Applied, userId: string): object {
  switch (frame.type) {
    case CARD_MOVED:
      return cardMoved(roomId, {
        card_id: frame.card_id,
        new_column_id: frame.new_column_id,
        new_position: frame.new_position,
        moved_by: userId,
      });
    case CARD_CREATED:
      if (!outcome.card) throw new Error('Created card missing from outcome');
      return cardCreated(roomId, toCardWire(outcome.card), userId);
    case CARD_UPDATED:
      return cardUpdated(roomId, frame.card_id, frame.update_data, userId);
    case CARD_DELETED:
      return cardDeleted(roomId, frame.card_id, userId);
    case COLUMN_CREATED:
      if (!outcome.column) throw new Error('Created column missing from outcome');
      return columnCreated(roomId, toColumnWire(outcome.column), userId);
    case COLUMN_UPDATED:
      return columnUpdated(roomId, frame.column_id, frame.update_data, userId);
    case COLUMN_DELETED:
      return columnDeleted(roomId, frame.column_id, userId);
  }
}

function isBoardFrame(frame: ClientFrame): frame is BoardClientFrame {
  switch (frame.type) {
    case CARD_MOVED:
    case CARD_CREATED:
    case CARD_UPDATED:
    case CARD_DELETED:
    case COLUMN_CREATED:
    case COLUMN_UPDATED:
    case COLUMN_DELETED:
      return true;
    default:
      return false;
  }
}

/**
 * Kanban board rooms. Writes go to the board repository first; a write that
 * loses to a newer one on the same card or column is answered with an error
 * and not broadcast.
 */
export class BoardRoom implements RoomBehavior {
  readonly kind = 'board';
  readonly frames: ReadonlySet<ClientFrameType> = new Set([
    CARD_MOVED,
    CARD_CREATED,
    CARD_UPDATED,
    CARD_DELETED,
    COLUMN_CREATED,
    COLUMN_UPDATED,
    COLUMN_DELETED,
    TYPING,
  ]);

  async onJoin(ctx: RoomContext, connection: Connection, room: Room): Promise<void> {
    const boardId = room.id.slice(BOARD_PREFIX.length);
    const board = await ctx.withTransaction((tx) => ctx.boards.getBoard(tx, boardId));
    if (!board) throw new AppError(ErrorCode.NOT_FOUND, 'Board not found', { boardId });
    await ctx.reply(connection, boardState(room.id, toBoardWire(board)));
  }

  async handle(ctx: RoomContext, connection: Connection, room: Room, frame: ClientFrame): Promise<void> {
    if (frame.type === TYPING) return publishTyping(ctx, connection, room, frame);
    if (!isBoardFrame(frame)) {
      throw new AppError(ErrorCode.BAD_REQUEST, `Unsupported message type for board rooms: ${frame.type}`);
    }

    const boardId = room.id.slice(BOARD_PREFIX.length);
    const mutation = toMutation(frame, () => ctx.idGen.generate());
    const receipt = { receivedAt: ctx.clock(), connectionId: connection.id };
    const outcome = await ctx.withTransaction((tx) => ctx.boards.apply(tx, boardId, mutation, receipt));

    switch (outcome.status) {
      case 'superseded':
        await ctx.reply(connection, errorFrame('Update superseded by a newer change'));
        return;
      case 'not_found':
        await ctx.reply(connection, errorFrame(`Target of ${frame.type} not found`));
        return;
      case 'applied': {
        // The creator needs the generated id, so creations go to everyone.
        const created = mutation.kind === 'card_created' || mutation.kind === 'column_created';
        await ctx.publish(
          room.id,
          appliedFrame(room.id, frame, outcome, connection.userId),
          created ? undefined : connection.id,
        );
      }
    }
  }
}
