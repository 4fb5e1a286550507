export { buildCloneFamilies, type CloneFamily } from './clone-families';
export { extractContextLines, splitLines } from './context';
export { compileSuppressionRule, compileSuppressionRules, type SuppressionRule } from './suppression-rule';
export {
  DEFAULT_MIN_FAMILY_SIZE,
  groupMatchesRules,
  suppressClones,
  type SuppressOptions,
  type SuppressionResult,
} from './suppressor';
export { createUnionFind, type UnionFind } from './union-find';
