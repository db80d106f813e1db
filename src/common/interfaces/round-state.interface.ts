import { GameMode } from './game-mode.interface';
import { ScoreEntry } from './leaderboard.interface';
import { Question } from './question.interface';
import { OptionLabel } from '../constants/game.constants';

export enum RoundPhase {
  MODE_SELECT = 'MODE_SELECT',
  PLAYING = 'PLAYING',
  SCORING = 'SCORING',
  DONE = 'DONE',
}

export interface ModeAvailability {
  mode: GameMode;
  eligible: number;
  total: number;
  playable: boolean;
  resetRequired: boolean;
}

export type ModeSelection =
  | {
      accepted: true;
      mode: GameMode;
      questionCount: number;
      historyReset: boolean;
    }
  | { accepted: false; reason: string };

export interface QuestionPrompt {
  number: number; // 1-based position within the round
  total: number;
  question: Question;
}

export interface AnswerResult {
  correct: boolean;
  correctAnswer: OptionLabel;
  score: number;
  answered: number;
  total: number;
}

export interface RoundResult {
  roundId: string;
  mode: GameMode;
  score: number;
  total: number;
  percentage: number;
  entry: ScoreEntry;
  historyReset: boolean;
}

export type AnswerProvider = (prompt: QuestionPrompt) => Promise<string>;
