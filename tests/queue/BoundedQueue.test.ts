import { BoundedQueue } from '../../src/queue/BoundedQueue';
import { InvalidArgumentError, QueueEmptyError } from '../../src/errors';

describe('BoundedQueue', () => {
  it('should never report full without a capacity', () => {
    const buffer = new BoundedQueue<number>();
    for (let i = 0; i < 50; i++) {
      expect(buffer.push(i)).toBe(true);
    }

    expect(buffer.capacity).toBeUndefined();
    expect(buffer.isFull).toBe(false);
    expect(buffer.size).toBe(50);
  });

  it('should refuse push once capacity is reached', () => {
    const buffer = new BoundedQueue<string>(2);

    expect(buffer.push('a')).toBe(true);
    expect(buffer.push('b')).toBe(true);
    expect(buffer.push('c')).toBe(false);
    expect(buffer.isFull).toBe(true);
    expect(buffer.toArray()).toEqual(['a', 'b']);
  });

  it('should let forcePush go past capacity', () => {
    const buffer = new BoundedQueue<string>(1);
    buffer.push('a');
    buffer.forcePush('b');

    expect(buffer.size).toBe(2);
    expect(buffer.dequeue()).toBe('a');
    expect(buffer.dequeue()).toBe('b');
    expect(buffer.isEmpty).toBe(true);
  });

  it('should throw from dequeue and head when empty', () => {
    const buffer = new BoundedQueue<number>();

    expect(() => buffer.dequeue()).toThrow(QueueEmptyError);
    expect(() => buffer.head()).toThrow(QueueEmptyError);
  });

  it('should dequeue undefined items without ambiguity', () => {
    const buffer = new BoundedQueue<number | undefined>();
    buffer.push(undefined);
    buffer.push(2);

    expect(buffer.head()).toBeUndefined();
    expect(buffer.dequeue()).toBeUndefined();
    expect(buffer.dequeue()).toBe(2);
    expect(buffer.isEmpty).toBe(true);
  });

  it('should return discarded items from clear', () => {
    const buffer = new BoundedQueue<number>(5);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.clear()).toEqual([1, 2]);
    expect(buffer.isEmpty).toBe(true);
    expect(buffer.clear()).toEqual([]);
  });

  it('should validate capacity', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(InvalidArgumentError);
    expect(() => new BoundedQueue<number>(-3)).toThrow(InvalidArgumentError);
    expect(() => new BoundedQueue<number>(Number.NaN)).toThrow(InvalidArgumentError);
  });
});
