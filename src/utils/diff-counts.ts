import type { DiffCounts, DiffKind } from '../types/diff-result.js';

export const ZERO_COUNTS: DiffCounts = { additions: 0, deletions: 0, modifications: 0 };

export function addCounts(left: DiffCounts, right: DiffCounts): DiffCounts {
  return {
    additions: left.additions + right.additions,
    deletions: left.deletions + right.deletions,
    modifications: left.modifications + right.modifications,
  };
}

/** Counts a single entry of the given kind. */
export function countOf(kind: DiffKind): DiffCounts {
  switch (kind) {
    case 'added':
      return { additions: 1, deletions: 0, modifications: 0 };
    case 'removed':
      return { additions: 0, deletions: 1, modifications: 0 };
    case 'changed':
      return { additions: 0, deletions: 0, modifications: 1 };
  }
}
