import { describe, it, expect } from 'vitest';
import { Connection, ConnectionStateError } from '../connections';
import { MessageRateLimiter } from '../rate-limiter';
import { FakeTransport, session, silentLogger, T0 } from './fakes';

function fresh() {
  return new Connection('c1', '203.0.113.1', new FakeTransport(), silentLogger, T0);
}

describe('Connection', () => {
  it('moves through admitted and joined and back', () => {
    const connection = fresh();
    expect(connection.phase).toBe('connecting');
    expect(() => connection.userId).toThrow(ConnectionStateError);

    connection.admit(session('alice'));
    expect(connection.phase).toBe('admitted');
    expect(connection.userId).toBe('alice');
    expect(connection.sessionId).toBe('session-alice');

    connection.enterRoom('chat:general:lobby');
    connection.enterRoom('direct:alice');
    expect(connection.phase).toBe('joined');
    connection.leaveRoom('chat:general:lobby');
    expect(connection.phase).toBe('joined');
    connection.leaveRoom('direct:alice');
    expect(connection.phase).toBe('admitted');
  });

  it('cannot join before admission or be admitted twice', () => {
    const connection = fresh();
    expect(() => connection.enterRoom('chat:general:lobby')).toThrow(
      'Cannot join a room with connection c1 in phase connecting',
    );
    connection.admit(session('alice'));
    expect(() => connection.admit(session('alice'))).toThrow(ConnectionStateError);
  });

  it('reports its rooms when closed and stays closed', () => {
    const connection = fresh();
    connection.admit(session('alice'));
    connection.enterRoom('chat:general:lobby');

    expect(connection.markClosed()).toEqual(['chat:general:lobby']);
    expect(connection.isClosed).toBe(true);
    expect(connection.rooms.size).toBe(0);
    expect(() => connection.enterRoom('direct:alice')).toThrow(ConnectionStateError);
  });
});

describe('MessageRateLimiter', () => {
  it('allows a fixed number of frames per second', () => {
    let now = T0;
    const limiter = new MessageRateLimiter(3, () => now);
    const connection = fresh();

    expect([1, 2, 3, 4].map(() => limiter.allow(connection))).toEqual([true, true, true, false]);
    now = T0 + 999;
    expect(limiter.allow(connection)).toBe(false);
    now = T0 + 1000;
    expect(limiter.allow(connection)).toBe(true);
    expect(connection.messageCount).toBe(1);
  });
});
