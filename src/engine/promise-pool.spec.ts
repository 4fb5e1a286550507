import { describe, expect, it, vi } from 'vitest';

import { runWithConcurrency } from './promise-pool';

const tick = (): Promise<void> => new Promise<void>(resolve => setTimeout(resolve, 1));

describe('runWithConcurrency', () => {
  it('should call the worker for every item with its index', async () => {
    // Arrange
    const seen: Array<[string, number]> = [];
    const worker = async (item: string, index: number): Promise<void> => {
      seen.push([item, index]);
    };

    // Act
    await runWithConcurrency(['a', 'b', 'c'], 3, worker);

    // Assert
    expect(seen.sort((left, right) => left[1] - right[1])).toEqual([
      ['a', 0],
      ['b', 1],
      ['c', 2],
    ]);
  });

  it('should process items in order when concurrency is 1', async () => {
    // Arrange
    const order: number[] = [];
    const worker = async (item: number): Promise<void> => {
      await tick();
      order.push(item);
    };

    // Act
    await runWithConcurrency([10, 20, 30], 1, worker);

    // Assert
    expect(order).toEqual([10, 20, 30]);
  });

  it('should never run more workers than the limit at once', async () => {
    // Arrange
    let active = 0;
    let peak = 0;
    const worker = async (): Promise<void> => {
      active += 1;
      peak = Math.max(peak, active);
      await tick();
      active -= 1;
    };

    // Act
    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, worker);

    // Assert
    expect(peak).toBe(3);
    expect(active).toBe(0);
  });

  it('should clamp concurrency below 1 to sequential processing', async () => {
    // Arrange
    const order: number[] = [];
    const worker = async (item: number): Promise<void> => {
      await tick();
      order.push(item);
    };

    // Act
    await runWithConcurrency([1, 2, 3], 0, worker);

    // Assert
    expect(order).toEqual([1, 2, 3]);
  });

  it('should treat a non-finite concurrency as 1', async () => {
    // Arrange
    const order: number[] = [];
    const worker = async (item: number): Promise<void> => {
      await tick();
      order.push(item);
    };

    // Act
    await runWithConcurrency([3, 2, 1], Number.NaN, worker);

    // Assert
    expect(order).toEqual([3, 2, 1]);
  });

  it('should floor a fractional concurrency', async () => {
    // Arrange
    let peak = 0;
    let active = 0;
    const worker = async (): Promise<void> => {
      active += 1;
      peak = Math.max(peak, active);
      await tick();
      active -= 1;
    };

    // Act
    await runWithConcurrency([1, 2, 3, 4], 2.9, worker);

    // Assert
    expect(peak).toBe(2);
  });

  it('should not call the worker when items are empty', async () => {
    // Arrange
    const worker = vi.fn(async (): Promise<void> => undefined);

    // Act
    await runWithConcurrency([], 4, worker);

    // Assert
    expect(worker).not.toHaveBeenCalled();
  });

  it('should reject when a worker rejects', async () => {
    // Arrange
    const worker = async (item: number): Promise<void> => {
      if (item === 2) {
        throw new Error('boom');
      }
    };

    // Act & Assert
    await expect(runWithConcurrency([1, 2, 3], 1, worker)).rejects.toThrow('boom');
  });
});
