import { ScoreEntry } from '../../common/interfaces/leaderboard.interface';

export type EntryComparator = (a: ScoreEntry, b: ScoreEntry) => number;

/**
 * Per-mode order: raw score descending, then fewer questions first.
 */
export const compareModeEntries: EntryComparator = (a, b) => {
  if (b.score !== a.score) return b.score - a.score;
  return a.total - b.total;
};

/**
 * Cross-mode order: percentage correct descending, then raw score.
 */
export const compareTopEntries: EntryComparator = (a, b) => {
  // score/total compared by cross-multiplying (totals are positive)
  const byRatio = b.score * a.total - a.score * b.total;
  if (byRatio !== 0) return byRatio;
  return b.score - a.score;
};

/**
 * Sort (stable: equal entries keep insertion order) and keep the best `limit`.
 */
export function rankEntries(
  entries: readonly ScoreEntry[],
  compare: EntryComparator,
  limit: number,
): ScoreEntry[] {
  return [...entries].sort(compare).slice(0, limit);
}
