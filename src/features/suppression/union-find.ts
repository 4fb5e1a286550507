export interface UnionFind {
  readonly size: number;
  find(element: number): number;
  union(left: number, right: number): void;
}

/** Disjoint sets over `0..size-1` with path halving and union by rank. */
export const createUnionFind = (size: number): UnionFind => {
  const parent = Array.from({ length: size }, (_, index) => index);
  const rank = new Array<number>(size).fill(0);

  const find = (element: number): number => {
    if (element < 0 || element >= size) {
      throw new RangeError(`Element ${element} is outside 0..${size - 1}`);
    }

    let current = element;

    while (true) {
      const up = parent[current] ?? current;

      if (up === current) {
        return current;
      }

      const grand = parent[up] ?? up;

      parent[current] = grand;
      current = grand;
    }
  };

  const union = (left: number, right: number): void => {
    const rootLeft = find(left);
    const rootRight = find(right);

    if (rootLeft === rootRight) {
      return;
    }

    const rankLeft = rank[rootLeft] ?? 0;
    const rankRight = rank[rootRight] ?? 0;

    if (rankLeft < rankRight) {
      parent[rootLeft] = rootRight;
    } else if (rankLeft > rankRight) {
      parent[rootRight] = rootLeft;
    } else {
      parent[rootRight] = rootLeft;
      rank[rootLeft] = rankLeft + 1;
    }
  };

  return { size, find, union };
};
