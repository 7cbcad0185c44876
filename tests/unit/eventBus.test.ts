import { describe, it, expect } from 'vitest';
import { EventBus } from '../../src/events/eventBus.js';

interface Events {
  [k: string]: unknown;
  ping: { n: number };
}

describe('EventBus', () => {
  it('delivers to listeners in registration order', async () => {
    const bus = new EventBus<Events>();
    const seen: string[] = [];
    bus.on('ping', ({ n }) => {
      seen.push(`a${n}`);
    });
    bus.on('ping', async ({ n }) => {
      seen.push(`b${n}`);
    });
    await bus.emit('ping', { n: 1 });
    expect(seen).toEqual(['a1', 'b1']);
  });

  it('keeps delivering after a listener throws', async () => {
    const bus = new EventBus<Events>();
    const seen: number[] = [];
    bus.on('ping', () => {
      throw new Error('listener bug');
    });
    bus.on('ping', ({ n }) => {
      seen.push(n);
    });
    await expect(bus.emit('ping', { n: 2 })).resolves.toBeUndefined();
    expect(seen).toEqual([2]);
  });

  it('stops delivering once unsubscribed', async () => {
    const bus = new EventBus<Events>();
    let count = 0;
    const off = bus.on('ping', () => {
      count += 1;
    });
    await bus.emit('ping', { n: 1 });
    off();
    await bus.emit('ping', { n: 2 });
    expect(count).toBe(1);
  });
});
