import { describe, it, expect } from 'vitest';
import { SerialLanes } from '../lanes';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SerialLanes', () => {
  it('runs work on one key in arrival order without overlap', async () => {
    const lanes = new SerialLanes();
    const events: string[] = [];
    const gate = deferred();

    const first = lanes.run('room', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lanes.run('room', async () => {
      events.push('second');
    });

    await new Promise((r) => setImmediate(r));
    expect(events).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lanes.isBusy('room')).toBe(false);
  });

  it('lets different keys proceed independently', async () => {
    const lanes = new SerialLanes();
    const gate = deferred();
    const events: string[] = [];

    const blocked = lanes.run('a', async () => {
      await gate.promise;
      events.push('a');
    });
    await lanes.run('b', async () => {
      events.push('b');
    });

    expect(events).toEqual(['b']);
    expect(lanes.activeKeys).toBe(1);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['b', 'a']);
    expect(lanes.activeKeys).toBe(0);
  });

  it('releases the lane when a task throws', async () => {
    const lanes = new SerialLanes();
    await expect(
      lanes.run('room', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(lanes.run('room', async () => 'next')).resolves.toBe('next');
  });
});
