import { GAME_CONFIG } from '../../common/constants/game.constants';
import { ScoreEntry } from '../../common/interfaces/leaderboard.interface';
import {
  AnswerResult,
  ModeAvailability,
  QuestionPrompt,
  RoundResult,
} from '../../common/interfaces/round-state.interface';

const WIDTH = 60;
const NAME_WIDTH = 20;

export const NO_SCORES_MESSAGE = 'No scores yet. Be the first to play!';

export function renderHeader(title: string): string[] {
  const padding = Math.max(0, Math.floor((WIDTH - title.length) / 2));
  return [
    '',
    '='.repeat(WIDTH),
    `${' '.repeat(padding)}${title}`,
    '='.repeat(WIDTH),
    '',
  ];
}

/**
 * Numbered menu, options start at 1
 */
export function renderMenu(title: string, options: string[]): string[] {
  return [
    ...renderHeader(title),
    ...options.map((label, index) => `${index + 1}. ${label}`),
  ];
}

export function renderModeOption(availability: ModeAvailability): string {
  const { mode, playable } = availability;
  const label = `${mode.name} - ${mode.description}`;
  return playable ? label : `${label} (not enough questions)`;
}

export function renderQuestion(prompt: QuestionPrompt): string[] {
  const { question } = prompt;
  const options = GAME_CONFIG.OPTION_LABELS.flatMap((label) => {
    const text = question.options[label];
    return text === undefined ? [] : [`${label}. ${text}`];
  });

  return [
    `Question ${prompt.number} of ${prompt.total}`,
    '-'.repeat(WIDTH),
    question.text,
    '',
    ...options,
  ];
}

export function renderAnswerFeedback(result: AnswerResult): string {
  return result.correct
    ? 'Correct!'
    : `Incorrect! The correct answer was ${result.correctAnswer}.`;
}

export function formatPercentage(score: number, total: number): string {
  const percentage = total > 0 ? (score / total) * 100 : 0;
  return `${percentage.toFixed(1)}%`;
}

export function performanceMessage(percentage: number): string {
  if (percentage >= 90) return "Amazing! You're a trivia expert!";
  if (percentage >= 70) return 'Great job! You really know your stuff!';
  if (percentage >= 50) return 'Not bad! Keep practicing!';
  return 'Keep studying and try again!';
}

export function renderResults(result: RoundResult): string[] {
  return [
    '',
    '='.repeat(WIDTH),
    'GAME OVER!',
    '='.repeat(WIDTH),
    `Your score: ${result.score} out of ${result.total} (${formatPercentage(result.score, result.total)})`,
    performanceMessage(result.percentage),
  ];
}

/**
 * ISO timestamps shown as `YYYY-MM-DD HH:MM` (UTC)
 */
export function formatTimestamp(timestamp: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2})/.exec(timestamp);
  if (match) return `${match[1]} ${match[2]}`;
  return timestamp || 'N/A';
}

export function renderLeaderboardTable(
  entries: readonly ScoreEntry[],
  showMode: boolean,
): string[] {
  if (entries.length === 0) {
    return [NO_SCORES_MESSAGE];
  }

  const header = [
    'Rank',
    'Name'.padEnd(NAME_WIDTH),
    'Score',
    'Total',
    ...(showMode ? ['Mode'.padEnd(6)] : []),
    '%'.padStart(6),
    'Date',
  ];

  const rows = entries.map((entry, index) =>
    [
      String(index + 1).padStart(4),
      entry.playerName.slice(0, NAME_WIDTH).padEnd(NAME_WIDTH),
      String(entry.score).padStart(5),
      String(entry.total).padStart(5),
      ...(showMode ? [capitalize(entry.mode).padEnd(6)] : []),
      formatPercentage(entry.score, entry.total).padStart(6),
      formatTimestamp(entry.timestamp),
    ].join(' | '),
  );

  return [header.join(' | '), '-'.repeat(WIDTH + 20), ...rows];
}

export function renderLeaderboard(
  title: string,
  entries: readonly ScoreEntry[],
  showMode: boolean,
): string[] {
  return [
    ...renderHeader('Leaderboard'),
    title,
    '',
    ...renderLeaderboardTable(entries, showMode),
  ];
}

function capitalize(value: string): string {
  return value ? `${value[0].toUpperCase()}${value.slice(1)}` : value;
}
