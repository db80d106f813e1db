export interface ScoreEntry {
  playerName: string;
  score: number;
  total: number;
  mode: string;
  timestamp: string;
}

export interface Leaderboard {
  modes: Record<string, ScoreEntry[]>;
  topScores: ScoreEntry[];
  playerProgress: Map<string, string[]>; // player -> answered question ids
}

/**
 * On-disk shape. Every mode key sits at the top level next to
 * `top_scores` and `player_progress`.
 */
export interface StoredScoreEntry {
  player_name: string;
  score: number;
  total: number;
  mode: string;
  timestamp: string;
}

export type StoredLeaderboard = Record<
  string,
  StoredScoreEntry[] | Record<string, string[]>
>;
