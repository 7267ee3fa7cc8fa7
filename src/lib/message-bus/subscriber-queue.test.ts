import { describe, expect, test } from 'vitest';
import { createEvent } from '../events/event';
import { SubscriberQueue } from './subscriber-queue';

function event(text: string) {
  return createEvent({ type: 'text-input', payload: { text }, source: 'test' });
}

describe('SubscriberQueue', () => {
  test('should report room until capacity is reached', () => {
    const queue = new SubscriberQueue('nlp', 2);

    queue.push(event('a'));
    expect(queue.hasRoom()).toBe(true);

    queue.push(event('b'));
    expect(queue.hasRoom()).toBe(false);
    expect(queue.depth).toBe(2);
  });

  test('should move a waiting event in as soon as room opens', async () => {
    const queue = new SubscriberQueue('nlp', 1);
    const first = event('first');
    const waiting = event('waiting');

    queue.push(first);
    const outcome = queue.waitForRoom(waiting, 1000);

    expect(queue.hasRoom()).toBe(false);
    expect(queue.shift()).toBe(first);
    expect(queue.depth).toBe(1);
    expect(await outcome).toBe('admitted');
    expect(queue.shift()).toBe(waiting);
  });

  test('evictOldest should not admit waiters', async () => {
    const queue = new SubscriberQueue('nlp', 1);
    queue.push(event('a'));
    const outcome = queue.waitForRoom(event('b'), 1000);

    queue.evictOldest();

    expect(queue.depth).toBe(0);
    expect(queue.blockedPublishers).toBe(1);
    expect(queue.cancelWaiters()).toBe(1);
    expect(await outcome).toBe('cancelled');
  });

  test('should time out waiters', async () => {
    const queue = new SubscriberQueue('nlp', 1);
    queue.push(event('a'));

    expect(await queue.waitForRoom(event('b'), 10)).toBe('timeout');
    expect(queue.blockedPublishers).toBe(0);
  });

  test('clear should return the number discarded', () => {
    const queue = new SubscriberQueue('nlp', 5);
    queue.push(event('a'));
    queue.push(event('b'));

    expect(queue.clear()).toBe(2);
    expect(queue.isIdle()).toBe(true);
  });
});
