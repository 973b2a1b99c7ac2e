import { z } from 'zod';
import { createFrame } from '../frame';
import { RoomIdSchema } from './room';

export const CARD_MOVED = 'card_moved' as const;
export const CARD_CREATED = 'card_created' as const;
export const CARD_UPDATED = 'card_updated' as const;
export const CARD_DELETED = 'card_deleted' as const;
export const COLUMN_CREATED = 'column_created' as const;
export const COLUMN_UPDATED = 'column_updated' as const;
export const COLUMN_DELETED = 'column_deleted' as const;
export const BOARD_STATE = 'board_state' as const;

const IdSchema = z.string().min(1).max(64);
const PositionSchema = z.number().int().min(0);
const PrioritySchema = z.enum(['low', 'medium', 'high', 'urgent']);

export const CardMovedFrameSchema = z.object({
  type: z.literal(CARD_MOVED),
  room_id: RoomIdSchema,
  card_id: IdSchema,
  new_column_id: IdSchema,
  new_position: PositionSchema,
});

export const CardCreatedFrameSchema = z.object({
  type: z.literal(CARD_CREATED),
  room_id: RoomIdSchema,
  card_data: z.object({
    column_id: IdSchema,
    title: z.string().trim().min(1).max(200),
    description: z.string().max(4000).optional(),
    position: PositionSchema,
    assigned_to: IdSchema.optional(),
    priority: PrioritySchema.default('medium'),
    due_date: z.string().datetime().optional(),
    labels: z.array(z.string().min(1).max(50)).max(20).default([]),
  }),
});

export const CardUpdatedFrameSchema = z.object({
  type: z.literal(CARD_UPDATED),
  room_id: RoomIdSchema,
  card_id: IdSchema,
  update_data: z
    .object({
      title: z.string().trim().min(1).max(200).optional(),
      description: z.string().max(4000).nullable().optional(),
      assigned_to: IdSchema.nullable().optional(),
      priority: PrioritySchema.optional(),
      due_date: z.string().datetime().nullable().optional(),
      labels: z.array(z.string().min(1).max(50)).max(20).optional(),
    })
    .refine((data) => Object.keys(data).length > 0, 'update_data must change at least one field'),
});

export const CardDeletedFrameSchema = z.object({
  type: z.literal(CARD_DELETED),
  room_id: RoomIdSchema,
  card_id: IdSchema,
});

export const ColumnCreatedFrameSchema = z.object({
  type: z.literal(COLUMN_CREATED),
  room_id: RoomIdSchema,
  column_data: z.object({
    name: z.string().trim().min(1).max(100),
    position: PositionSchema,
  }),
});

export const ColumnUpdatedFrameSchema = z.object({
  type: z.literal(COLUMN_UPDATED),
  room_id: RoomIdSchema,
  column_id: IdSchema,
  update_data: z
    .object({
      name: z.string().trim().min(1).max(100).optional(),
      position: PositionSchema.optional(),
    })
    .refine((data) => Object.keys(data).length > 0, 'update_data must change at least one field'),
});

export const ColumnDeletedFrameSchema = z.object({
  type: z.literal(COLUMN_DELETED),
  room_id: RoomIdSchema,
  column_id: IdSchema,
});

export const BoardClientFrames = [
  CardMovedFrameSchema,
  CardCreatedFrameSchema,
  CardUpdatedFrameSchema,
  CardDeletedFrameSchema,
  ColumnCreatedFrameSchema,
  ColumnUpdatedFrameSchema,
  ColumnDeletedFrameSchema,
] as const;

export type CardMovedFrame = z.infer<typeof CardMovedFrameSchema>;
export type CardCreatedFrame = z.infer<typeof CardCreatedFrameSchema>;
export type CardUpdatedFrame = z.infer<typeof CardUpdatedFrameSchema>;
export type CardDeletedFrame = z.infer<typeof CardDeletedFrameSchema>;
export type ColumnCreatedFrame = z.infer<typeof ColumnCreatedFrameSchema>;
export type ColumnUpdatedFrame = z.infer<typeof ColumnUpdatedFrameSchema>;
export type ColumnDeletedFrame = z.infer<typeof ColumnDeletedFrameSchema>;
export type BoardClientFrame =
  | CardMovedFrame
  | CardCreatedFrame
  | CardUpdatedFrame
  | CardDeletedFrame
  | ColumnCreatedFrame
  | ColumnUpdatedFrame
  | ColumnDeletedFrame;

export interface CardWire {
  id: string;
  column_id: string;
  title: string;
  description: string | null;
  position: number;
  assigned_to: string | null;
  priority: string;
  due_date: string | null;
  labels: string[];
  created_at: string;
}

export interface ColumnWire {
  id: string;
  board_id: string;
  name: string;
  position: number;
}

export interface BoardWire {
  id: string;
  name: string;
  description: string | null;
  columns: Array<Omit<ColumnWire, 'board_id'> & { cards: CardWire[] }>;
}

export const cardMoved = (
  roomId: string,
  fields: { card_id: string; new_column_id: string; new_position: number; moved_by: string },
) => createFrame(CARD_MOVED, fields, roomId);

export const cardCreated = (roomId: string, card: CardWire, createdBy: string) =>
  createFrame(CARD_CREATED, { card, created_by: createdBy }, roomId);

export const cardUpdated = (
  roomId: string,
  cardId: string,
  updateData: CardUpdatedFrame['update_data'],
  updatedBy: string,
) => createFrame(CARD_UPDATED, { card_id: cardId, update_data: updateData, updated_by: updatedBy }, roomId);

export const cardDeleted = (roomId: string, cardId: string, deletedBy: string) =>
  createFrame(CARD_DELETED, { card_id: cardId, deleted_by: deletedBy }, roomId);

export const columnCreated = (roomId: string, column: ColumnWire, createdBy: string) =>
  createFrame(COLUMN_CREATED, { column, created_by: createdBy }, roomId);

export const columnUpdated = (
  roomId: string,
  columnId: string,
  updateData: ColumnUpdatedFrame['update_data'],
  updatedBy: string,
) =>
  createFrame(
    COLUMN_UPDATED,
    { column_id: columnId, update_data: updateData, updated_by: updatedBy },
    roomId,
  );

export const columnDeleted = (roomId: string, columnId: string, deletedBy: string) =>
  createFrame(COLUMN_DELETED, { column_id: columnId, deleted_by: deletedBy }, roomId);

export const boardState = (roomId: string, board: BoardWire) =>
  createFrame(BOARD_STATE, { board }, roomId);
