import type { CloneGroup, CloneOccurrence } from '../../types';
import type { SuppressionRule } from './suppression-rule';

import { buildCloneFamilies } from './clone-families';
import { extractContextLines } from './context';

export const DEFAULT_MIN_FAMILY_SIZE = 3;

export interface SuppressOptions {
  /** Distinct locations a family needs before one marked member suppresses the rest. */
  readonly minFamilySize?: number;
  readonly contextAbove?: number;
}

export interface SuppressionResult<TGroup extends CloneGroup> {
  readonly kept: TGroup[];
  readonly suppressedByRule: number;
  readonly suppressedByFamily: number;
}

const occurrenceMatches = (
  occurrence: CloneOccurrence,
  rules: ReadonlyArray<SuppressionRule>,
  rawSources: ReadonlyMap<number, ReadonlyArray<string>>,
  contextAbove: number,
): boolean => {
  const lines = rawSources.get(occurrence.fileId);

  if (lines === undefined) {
    return false;
  }

  const context = extractContextLines(lines, occurrence.lineRange, contextAbove);

  return context.some(line => rules.some(rule => rule.matches(line)));
};

export const groupMatchesRules = (
  group: CloneGroup,
  rules: ReadonlyArray<SuppressionRule>,
  rawSources: ReadonlyMap<number, ReadonlyArray<string>>,
  contextAbove = 1,
): boolean => {
  if (rules.length === 0) {
    return false;
  }

  return (
    occurrenceMatches(group.occurrenceA, rules, rawSources, contextAbove) ||
    occurrenceMatches(group.occurrenceB, rules, rawSources, contextAbove)
  );
};

/**
 * Removes every group whose context on either side matches a rule, then every
 * group belonging to a large enough family that has at least one such match.
 * Surviving groups keep their input order.
 */
export const suppressClones = <TGroup extends CloneGroup>(
  groups: ReadonlyArray<TGroup>,
  rules: ReadonlyArray<SuppressionRule>,
  rawSources: ReadonlyMap<number, ReadonlyArray<string>>,
  options: SuppressOptions = {},
): SuppressionResult<TGroup> => {
  const minFamilySize = Math.max(2, Math.floor(options.minFamilySize ?? DEFAULT_MIN_FAMILY_SIZE));
  const contextAbove = options.contextAbove ?? 1;

  if (rules.length === 0 || groups.length === 0) {
    return { kept: [...groups], suppressedByRule: 0, suppressedByFamily: 0 };
  }

  const ruleMatched = groups.map(group => groupMatchesRules(group, rules, rawSources, contextAbove));
  const familySuppressed = new Array<boolean>(groups.length).fill(false);

  for (const family of buildCloneFamilies(groups)) {
    if (family.locationCount < minFamilySize) {
      continue;
    }

    if (!family.groupIndices.some(index => ruleMatched[index] === true)) {
      continue;
    }

    for (const index of family.groupIndices) {
      familySuppressed[index] = ruleMatched[index] !== true;
    }
  }

  const kept: TGroup[] = [];
  let suppressedByRule = 0;
  let suppressedByFamily = 0;

  groups.forEach((group, index) => {
    if (ruleMatched[index] === true) {
      suppressedByRule += 1;
    } else if (familySuppressed[index] === true) {
      suppressedByFamily += 1;
    } else {
      kept.push(group);
    }
  });

  return { kept, suppressedByRule, suppressedByFamily };
};
