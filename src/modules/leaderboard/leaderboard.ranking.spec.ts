import { ScoreEntry } from '../../common/interfaces/leaderboard.interface';
import { isRanked } from '../../test/ranking.helpers';
import {
  compareModeEntries,
  compareTopEntries,
  rankEntries,
} from './leaderboard.ranking';

const entry = (
  playerName: string,
  score: number,
  total: number,
  mode = 'short',
): ScoreEntry => ({
  playerName,
  score,
  total,
  mode,
  timestamp: '2026-10-19T09:00:00.000Z',
});

const names = (entries: ScoreEntry[]) => entries.map((e) => e.playerName);

describe('leaderboard ranking', () => {
  it('orders a mode by score, then by fewer questions', () => {
    const ranked = rankEntries(
      [entry('a', 3, 5), entry('b', 5, 5), entry('c', 5, 4), entry('d', 4, 5)],
      compareModeEntries,
      10,
    );

    expect(names(ranked)).toEqual(['c', 'b', 'd', 'a']);
    expect(isRanked(ranked, compareModeEntries)).toBe(true);
  });

  it('orders top scores by percentage, then by raw score', () => {
    const ranked = rankEntries(
      [
        entry('medium75', 15, 20, 'medium'),
        entry('short80', 4, 5),
        entry('short100', 5, 5),
        entry('long100', 50, 50, 'long'),
      ],
      compareTopEntries,
      10,
    );

    expect(names(ranked)).toEqual(['long100', 'short100', 'short80', 'medium75']);
  });

  it('keeps insertion order for ties', () => {
    const ranked = rankEntries(
      [entry('first', 4, 5), entry('second', 4, 5), entry('third', 4, 5)],
      compareModeEntries,
      10,
    );

    expect(names(ranked)).toEqual(['first', 'second', 'third']);
  });

  it('truncates to the limit', () => {
    const entries = Array.from({ length: 12 }, (_, i) =>
      entry(`p${i}`, i % 6, 5),
    );

    const ranked = rankEntries(entries, compareModeEntries, 10);

    expect(ranked).toHaveLength(10);
    expect(ranked.map((e) => e.score)).toEqual([5, 5, 4, 4, 3, 3, 2, 2, 1, 1]);
  });

  it('detects an unranked list', () => {
    expect(
      isRanked([entry('a', 1, 5), entry('b', 2, 5)], compareModeEntries),
    ).toBe(false);
  });
});
