import { describe, it, expect } from 'vitest';
import { CapacityError } from '@/lib/errors';
import { JobSlots } from '../job-slots';

describe('JobSlots', () => {
  it('admits up to maxConcurrent immediately', () => {
    const slots = new JobSlots({ maxConcurrent: 2, maxQueued: 1 });
    expect(slots.reserve().queued).toBe(false);
    expect(slots.reserve().queued).toBe(false);
    expect(slots.stats).toEqual({ running: 2, queued: 0 });
  });

  it('queues beyond maxConcurrent and rejects beyond maxQueued', () => {
    const slots = new JobSlots({ maxConcurrent: 1, maxQueued: 1 });
    slots.reserve();
    expect(slots.reserve().queued).toBe(true);
    expect(() => slots.reserve()).toThrow(CapacityError);
    expect(slots.stats).toEqual({ running: 1, queued: 1 });
  });

  it('hands a released slot to waiters in FIFO order', async () => {
    const slots = new JobSlots({ maxConcurrent: 1, maxQueued: 2 });
    slots.reserve();
    const order: string[] = [];
    const second = slots.reserve().ready.then(() => order.push('second'));
    const third = slots.reserve().ready.then(() => order.push('third'));

    slots.release();
    await second;
    expect(order).toEqual(['second']);
    expect(slots.stats).toEqual({ running: 1, queued: 1 });

    slots.release();
    await third;
    expect(order).toEqual(['second', 'third']);
  });

  it('frees the slot when nobody waits', () => {
    const slots = new JobSlots({ maxConcurrent: 1, maxQueued: 0 });
    slots.reserve();
    slots.release();
    expect(slots.stats).toEqual({ running: 0, queued: 0 });
    expect(slots.reserve().queued).toBe(false);
  });
});
