import { describe, expect, it } from 'vitest';

import { createUnionFind } from './union-find';

describe('createUnionFind', () => {
  it('should start with every element in its own set', () => {
    // Arrange
    const sets = createUnionFind(3);

    // Act & Assert
    expect([sets.find(0), sets.find(1), sets.find(2)]).toEqual([0, 1, 2]);
  });

  it('should join sets transitively', () => {
    // Arrange
    const sets = createUnionFind(5);

    // Act
    sets.union(0, 1);
    sets.union(3, 4);
    sets.union(1, 4);

    // Assert
    expect(sets.find(0)).toBe(sets.find(3));
    expect(sets.find(2)).toBe(2);
  });

  it('should ignore a union of elements already together', () => {
    // Arrange
    const sets = createUnionFind(2);

    sets.union(0, 1);

    // Act
    sets.union(1, 0);

    // Assert
    expect(sets.find(0)).toBe(sets.find(1));
  });

  it('should throw for an element outside the range', () => {
    // Arrange
    const sets = createUnionFind(2);

    // Act & Assert
    expect(() => sets.find(2)).toThrow(RangeError);
    expect(() => sets.union(-1, 0)).toThrow('Element -1 is outside 0..1');
  });
});
