import { describe, it, expect } from 'vitest';
import {
  CardCreatedFrameSchema,
  CardMovedFrameSchema,
  CardUpdatedFrameSchema,
  ColumnUpdatedFrameSchema,
  cardMoved,
} from '../events/board';

describe('board frames', () => {
  it('accepts a card move', () => {
    const result = CardMovedFrameSchema.safeParse({
      type: 'card_moved',
      room_id: 'board:B1',
      card_id: 'c1',
      new_column_id: 'col2',
      new_position: 0,
    });
    expect(result.success).toBe(true);
  });

  it('rejects a negative position', () => {
    const result = CardMovedFrameSchema.safeParse({
      type: 'card_moved',
      room_id: 'board:B1',
      card_id: 'c1',
      new_column_id: 'col2',
      new_position: -1,
    });
    expect(result.success).toBe(false);
  });

  it('defaults priority and labels on card creation', () => {
    const result = CardCreatedFrameSchema.safeParse({
      type: 'card_created',
      room_id: 'board:B1',
      card_data: { column_id: 'col1', title: 'Write tests', position: 2 },
    });
    expect(result.success).toBe(true);
    expect(result.data?.card_data.priority).toBe('medium');
    expect(result.data?.card_data.labels).toEqual([]);
  });

  it('rejects an empty card update', () => {
    const result = CardUpdatedFrameSchema.safeParse({
      type: 'card_updated',
      room_id: 'board:B1',
      card_id: 'c1',
      update_data: {},
    });
    expect(result.success).toBe(false);
  });

  it('allows clearing an assignee', () => {
    const result = CardUpdatedFrameSchema.safeParse({
      type: 'card_updated',
      room_id: 'board:B1',
      card_id: 'c1',
      update_data: { assigned_to: null },
    });
    expect(result.success).toBe(true);
  });

  it('rejects an empty column update', () => {
    const result = ColumnUpdatedFrameSchema.safeParse({
      type: 'column_updated',
      room_id: 'board:B1',
      column_id: 'col1',
      update_data: {},
    });
    expect(result.success).toBe(false);
  });

  it('card_moved broadcast names the mover', () => {
    const frame = cardMoved('board:B1', {
      card_id: 'c1',
      new_column_id: 'col2',
      new_position: 0,
      moved_by: 'u1',
    });
    expect(frame).toMatchObject({
      type: 'card_moved',
      room_id: 'board:B1',
      card_id: 'c1',
      new_column_id: 'col2',
      new_position: 0,
      moved_by: 'u1',
    });
  });
});
