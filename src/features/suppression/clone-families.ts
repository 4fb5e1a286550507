import type { CloneGroup, CloneOccurrence } from '../../types';

import { createUnionFind } from './union-find';

export interface CloneFamily {
  /** Indices into the group list the families were built from, ascending. */
  readonly groupIndices: ReadonlyArray<number>;
  /** Distinct locations the family's groups touch. */
  readonly locationCount: number;
}

interface OccurrenceRef {
  readonly groupIndex: number;
  readonly side: 0 | 1;
  readonly occurrence: CloneOccurrence;
}

/**
 * Maps every group side to a location id. Occurrences in one file whose token
 * ranges overlap, directly or through a chain, share a location.
 * Result is indexed `[groupIndex][side]`.
 */
export const assignLocations = (groups: ReadonlyArray<CloneGroup>): { locations: [number, number][]; count: number } => {
  const byFile = new Map<number, OccurrenceRef[]>();

  groups.forEach((group, groupIndex) => {
    const sides: ReadonlyArray<OccurrenceRef> = [
      { groupIndex, side: 0, occurrence: group.occurrenceA },
      { groupIndex, side: 1, occurrence: group.occurrenceB },
    ];

    for (const ref of sides) {
      const list = byFile.get(ref.occurrence.fileId);

      if (list) {
        list.push(ref);
      } else {
        byFile.set(ref.occurrence.fileId, [ref]);
      }
    }
  });

  const locations: [number, number][] = groups.map(() => [-1, -1]);
  const fileIds = [...byFile.keys()].sort((left, right) => left - right);
  let count = 0;

  for (const fileId of fileIds) {
    const refs = [...(byFile.get(fileId) ?? [])].sort(
      (left, right) =>
        left.occurrence.tokenRange.start - right.occurrence.tokenRange.start ||
        left.occurrence.tokenRange.end - right.occurrence.tokenRange.end,
    );
    let clusterEnd = -1;

    for (const ref of refs) {
      const { start, end } = ref.occurrence.tokenRange;

      if (start >= clusterEnd) {
        count += 1;
      }

      clusterEnd = Math.max(clusterEnd, end);

      const slot = locations[ref.groupIndex];

      if (slot) {
        slot[ref.side] = count - 1;
      }
    }
  }

  return { locations, count };
};

/**
 * Connected components of the "shares a location" relation. Families come back
 * ordered by their smallest group index.
 */
export const buildCloneFamilies = (groups: ReadonlyArray<CloneGroup>): CloneFamily[] => {
  const { locations, count } = assignLocations(groups);
  const sets = createUnionFind(count);

  for (const [left, right] of locations) {
    sets.union(left, right);
  }

  const members = new Map<number, { groupIndices: number[]; locations: Set<number> }>();

  locations.forEach(([left, right], groupIndex) => {
    const root = sets.find(left);
    let family = members.get(root);

    if (!family) {
      family = { groupIndices: [], locations: new Set() };

      members.set(root, family);
    }

    family.groupIndices.push(groupIndex);
    family.locations.add(left);
    family.locations.add(right);
  });

  return [...members.values()].map(family => ({
    groupIndices: family.groupIndices,
    locationCount: family.locations.size,
  }));
};
