import { Injectable, Logger } from '@nestjs/common';
import { GameMode } from '../../common/interfaces/game-mode.interface';
import { QuestionOutOfRangeError } from '../../common/errors/trivia.errors';
import { LeaderboardService } from '../leaderboard/leaderboard.service';
import { QuestionService } from '../question/question.service';

export interface RoundSelection {
  questionIds: number[];
  historyReset: boolean;
}

export interface ProgressSummary {
  answered: number;
  remaining: number;
  total: number;
}

/**
 * Tracks which questions each player has already seen. Answered ids live
 * in the leaderboard document under `player_progress`.
 */
@Injectable()
export class ProgressService {
  private readonly logger = new Logger(ProgressService.name);

  constructor(
    private readonly questionService: QuestionService,
    private readonly leaderboardService: LeaderboardService,
  ) {}

  /**
   * Question ids the player has not answered yet, ascending
   */
  eligibleQuestions(playerName: string): number[] {
    const answered = new Set(
      this.leaderboardService.getAnsweredQuestions(playerName),
    );
    return this.questionService
      .questionIds()
      .filter((id) => !answered.has(String(id)));
  }

  progressSummary(playerName: string): ProgressSummary {
    const total = this.questionService.questionCount();
    const remaining = this.eligibleQuestions(playerName).length;
    return { answered: total - remaining, remaining, total };
  }

  /**
   * Draw the questions for a round, in presentation order. When too few
   * unanswered questions remain, the player's whole history is wiped first.
   */
  async selectRound(
    playerName: string,
    mode: GameMode,
  ): Promise<RoundSelection> {
    const need = mode.questionCount;
    let eligible = this.eligibleQuestions(playerName);
    let historyReset = false;

    if (eligible.length < need) {
      this.logger.log(
        `${playerName} has ${eligible.length} unanswered questions, ${mode.key} needs ${need}: resetting history`,
      );
      await this.resetProgress(playerName);
      eligible = this.questionService.questionIds();
      historyReset = true;
    }

    return {
      questionIds: sampleWithoutReplacement(eligible, need),
      historyReset,
    };
  }

  /**
   * Add a finished round's questions to the player's history. Covering
   * every question clears the history so the next round starts fresh.
   */
  async recordAnswered(
    playerName: string,
    questionIds: number[],
  ): Promise<{ historyReset: boolean }> {
    for (const id of questionIds) {
      if (!this.questionService.hasQuestion(id)) {
        throw new QuestionOutOfRangeError(
          id,
          this.questionService.questionCount(),
        );
      }
    }

    const answered = new Set(
      this.leaderboardService.getAnsweredQuestions(playerName),
    );
    questionIds.forEach((id) => answered.add(String(id)));

    const coversAll = this.questionService
      .questionIds()
      .every((id) => answered.has(String(id)));

    if (coversAll) {
      this.logger.log(`${playerName} has answered every question: resetting`);
      await this.leaderboardService.setAnsweredQuestions(playerName, []);
      return { historyReset: true };
    }

    await this.leaderboardService.setAnsweredQuestions(playerName, [
      ...answered,
    ]);
    return { historyReset: false };
  }

  async resetProgress(playerName: string): Promise<void> {
    await this.leaderboardService.setAnsweredQuestions(playerName, []);
  }
}

/**
 * Uniform draw of `count` items (or all of them, if fewer) via a partial
 * Fisher-Yates shuffle
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: () => number = Math.random,
): T[] {
  const pool = [...items];
  const take = Math.min(count, pool.length);

  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, take);
}
