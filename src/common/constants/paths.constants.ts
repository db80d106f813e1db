import * as path from 'path';
import { GAME_CONFIG } from './game.constants';

// Resolves to the package root from both src/ and dist/
export const PROJECT_ROOT = path.resolve(__dirname, '..', '..', '..');

export const DATA_DIR = path.join(PROJECT_ROOT, 'data');

export const DEFAULT_PATHS = {
  QUESTIONS: path.join(DATA_DIR, GAME_CONFIG.FILES.QUESTIONS),
  ANSWERS: path.join(DATA_DIR, GAME_CONFIG.FILES.ANSWERS),
  LEADERBOARD: path.join(DATA_DIR, GAME_CONFIG.FILES.LEADERBOARD),
};
