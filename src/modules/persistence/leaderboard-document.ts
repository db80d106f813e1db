import {
  Leaderboard,
  ScoreEntry,
  StoredLeaderboard,
  StoredScoreEntry,
} from '../../common/interfaces/leaderboard.interface';
import { PersistenceError } from '../../common/errors/trivia.errors';

export const TOP_SCORES_KEY = 'top_scores';
export const PLAYER_PROGRESS_KEY = 'player_progress';

// Layout written before per-player progress had its own key
const LEGACY_PLAYER_DATA_KEY = 'player_data';

type PlainObject = Record<string, unknown>;

export interface ParsedLeaderboard {
  leaderboard: Leaderboard;
  dropped: number;
}

export function emptyLeaderboard(modeKeys: string[]): Leaderboard {
  return {
    modes: Object.fromEntries(modeKeys.map((key) => [key, []])),
    topScores: [],
    playerProgress: new Map(),
  };
}

export function toDocument(leaderboard: Leaderboard): StoredLeaderboard {
  const document: StoredLeaderboard = {};

  for (const [mode, entries] of Object.entries(leaderboard.modes)) {
    document[mode] = entries.map(toStoredEntry);
  }
  document[TOP_SCORES_KEY] = leaderboard.topScores.map(toStoredEntry);
  document[PLAYER_PROGRESS_KEY] = Object.fromEntries(
    [...leaderboard.playerProgress].map(([player, ids]) => [player, [...ids]]),
  );

  return document;
}

/**
 * Turn a parsed document into a Leaderboard. Absent keys are back-filled
 * and legacy layouts are migrated. Malformed entries, and entries whose
 * mode is not configured, are dropped and counted.
 */
export function fromDocument(
  raw: unknown,
  modeKeys: string[],
): ParsedLeaderboard {
  if (!isPlainObject(raw)) {
    throw new PersistenceError('Leaderboard document must be an object');
  }

  let dropped = 0;
  const readEntries = (
    value: unknown,
    accepts: (mode: string) => boolean,
    defaultMode?: string,
  ): ScoreEntry[] => {
    if (!Array.isArray(value)) return [];

    const entries: ScoreEntry[] = [];
    for (const item of value) {
      const entry = toScoreEntry(item, defaultMode);
      if (entry && accepts(entry.mode)) {
        entries.push(entry);
      } else {
        dropped += 1;
      }
    }
    return entries;
  };

  const leaderboard = emptyLeaderboard(modeKeys);
  for (const mode of modeKeys) {
    // An entry filed under the wrong mode list is dropped
    leaderboard.modes[mode] = readEntries(
      raw[mode],
      (entryMode) => entryMode === mode,
      mode,
    );
  }
  leaderboard.topScores = readEntries(raw[TOP_SCORES_KEY], (entryMode) =>
    modeKeys.includes(entryMode),
  );
  leaderboard.playerProgress =
    PLAYER_PROGRESS_KEY in raw
      ? readProgress(raw[PLAYER_PROGRESS_KEY])
      : readLegacyProgress(raw[LEGACY_PLAYER_DATA_KEY]);

  return { leaderboard, dropped };
}

function toStoredEntry(entry: ScoreEntry): StoredScoreEntry {
  return {
    player_name: entry.playerName,
    score: entry.score,
    total: entry.total,
    mode: entry.mode,
    timestamp: entry.timestamp,
  };
}

function toScoreEntry(
  value: unknown,
  defaultMode?: string,
): ScoreEntry | null {
  if (!isPlainObject(value)) return null;

  const playerName = value.player_name ?? value.name;
  const mode = value.mode ?? defaultMode;
  const timestamp = value.timestamp ?? value.date ?? '';
  const { score, total } = value;

  if (typeof playerName !== 'string' || playerName.trim() === '') return null;
  if (typeof mode !== 'string' || typeof timestamp !== 'string') return null;
  if (!Number.isInteger(score) || !Number.isInteger(total)) return null;
  if (typeof score !== 'number' || typeof total !== 'number') return null;
  if (score < 0 || total <= 0 || score > total) return null;

  return Object.freeze({ playerName, score, total, mode, timestamp });
}

// Player names are arbitrary keys (`__proto__` included), hence the Map
function readProgress(value: unknown): Map<string, string[]> {
  const progress = new Map<string, string[]>();
  if (!isPlainObject(value)) return progress;

  for (const [player, ids] of Object.entries(value)) {
    progress.set(player, toIdList(ids));
  }
  return progress;
}

function readLegacyProgress(value: unknown): Map<string, string[]> {
  const progress = new Map<string, string[]>();
  if (!isPlainObject(value)) return progress;

  for (const [player, data] of Object.entries(value)) {
    const answered =
      isPlainObject(data) && Object.hasOwn(data, 'answered_questions')
        ? data.answered_questions
        : undefined;
    progress.set(player, toIdList(answered));
  }
  return progress;
}

function toIdList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];

  const ids = value
    .filter(
      (id): id is string | number =>
        typeof id === 'string' || typeof id === 'number',
    )
    .map((id) => String(id));
  return [...new Set(ids)];
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
