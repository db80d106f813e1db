export const GAME_CONFIG = {
  LEADERBOARD_SIZE: 10,

  OPTION_LABELS: ['A', 'B', 'C', 'D'] as const,

  // Player names
  MIN_PLAYER_NAME_LENGTH: 1,
  MAX_PLAYER_NAME_LENGTH: 20,
  PLAYER_NAME_PATTERN: /^[A-Za-z0-9 _.-]+$/,

  // Mode keys double as top-level keys of the persisted document
  MODE_KEY_PATTERN: /^[a-z][a-z0-9_-]*$/,
  RESERVED_KEYS: ['top_scores', 'player_progress'],

  MODES: [
    {
      key: 'short',
      name: 'Short Game',
      description: 'A quick 5-question challenge',
      questionCount: 5,
    },
    {
      key: 'medium',
      name: 'Medium Game',
      description: 'A standard 20-question challenge',
      questionCount: 20,
    },
    {
      key: 'long',
      name: 'Long Game',
      description: 'An epic 50-question challenge',
      questionCount: 50,
    },
  ],

  FILES: {
    QUESTIONS: 'questions.json',
    ANSWERS: 'answers.json',
    LEADERBOARD: 'leaderboard.json',
  },

  JSON_INDENT: 2,
};

export type OptionLabel = (typeof GAME_CONFIG.OPTION_LABELS)[number];

export function isOptionLabel(value: string): value is OptionLabel {
  return GAME_CONFIG.OPTION_LABELS.some((label) => label === value);
}
