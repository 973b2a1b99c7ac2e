import { describe, it, expect } from 'vitest';
import { StoreKeys } from '@gatehouse/proto';
import { AppError, ErrorCode } from '@gatehouse/shared';
import { clientFrame } from './fakes';
import { createHarness } from './harness';

const INBOX = 'direct:alice';

describe('direct rooms', () => {
  it('delivers the unread backlog on join, oldest first', async () => {
    const h = createHarness();
    await h.broadcaster.notify('alice', { category: 'system', title: 'Welcome' });
    await h.broadcaster.notify('alice', { category: 'billing', title: 'Invoice ready', body: 'March' });
    await h.store.sadd(StoreKeys.readNotifications('alice'), 'id-1');
    const alice = h.connect('c1', 'alice');

    await h.broadcaster.join(alice.connection, INBOX);

    expect(alice.transport.frames()[1]).toMatchObject({
      type: 'notification_backlog',
      room_id: INBOX,
      unread_count: 1,
      notifications: [
        { type: 'notification', id: 'id-2', category: 'billing', title: 'Invoice ready', body: 'March', data: {} },
      ],
    });
  });

  it('pushes live notifications and tracks read state across tabs', async () => {
    const h = createHarness();
    const tab1 = h.connect('c1', 'alice');
    const tab2 = h.connect('c2', 'alice');
    await h.broadcaster.join(tab1.connection, INBOX);
    await h.broadcaster.join(tab2.connection, INBOX);
    tab1.transport.sent.length = 0;
    tab2.transport.sent.length = 0;

    const sent = await h.broadcaster.notify('alice', { category: 'system', title: 'Hi', data: { link: '/x' } });
    expect(sent.id).toBe('id-1');
    expect(tab1.transport.last()).toMatchObject({ type: 'notification', id: 'id-1', data: { link: '/x' } });

    await h.broadcaster.receive(tab1.connection, clientFrame({ type: 'get_unread_count', room_id: INBOX }));
    expect(tab1.transport.last()).toMatchObject({ type: 'unread_count', count: 1 });

    await h.broadcaster.receive(tab1.connection, clientFrame({ type: 'mark_read', room_id: INBOX, notification_id: 'id-1' }));
    expect(tab2.transport.last()).toMatchObject({ type: 'notification_marked_read', notification_id: 'id-1' });
    expect(await h.store.ttl(StoreKeys.readNotifications('alice'))).toBe(30 * 24 * 60 * 60);

    await h.broadcaster.receive(tab1.connection, clientFrame({ type: 'get_unread_count', room_id: INBOX }));
    expect(tab1.transport.last()).toMatchObject({ type: 'unread_count', count: 0 });
  });

  it('keeps other users out of an inbox', async () => {
    const h = createHarness();
    const bob = h.connect('c2', 'bob');

    await h.broadcaster.receive(bob.connection, clientFrame({ type: 'join_room', room_id: INBOX }));

    expect(bob.transport.frames()).toMatchObject([{ type: 'error', message: 'Access to room denied' }]);
  });

  it('rejects an invalid notification', async () => {
    const h = createHarness();
    const attempt = h.broadcaster.notify('alice', { category: 'system', title: '' });

    await expect(attempt).rejects.toBeInstanceOf(AppError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.VALIDATION, safeMeta: { issues: ['title'] } });
    expect(await h.history.recent(INBOX, 10)).toEqual([]);
  });
});
