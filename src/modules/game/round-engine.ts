import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { GameMode } from '../../common/interfaces/game-mode.interface';
import {
  AnswerProvider,
  AnswerResult,
  ModeAvailability,
  ModeSelection,
  QuestionPrompt,
  RoundPhase,
  RoundResult,
} from '../../common/interfaces/round-state.interface';
import { RoundStateError } from '../../common/errors/trivia.errors';
import { GameModeService } from '../game-mode/game-mode.service';
import { LeaderboardService } from '../leaderboard/leaderboard.service';
import { ProgressService } from '../progress/progress.service';
import { QuestionService } from '../question/question.service';

export interface RoundDependencies {
  questionService: QuestionService;
  progressService: ProgressService;
  leaderboardService: LeaderboardService;
  gameModeService: GameModeService;
}

export type AnswerListener = (
  result: AnswerResult,
  prompt: QuestionPrompt,
) => void | Promise<void>;

/**
 * A mode can be played once the bank holds enough questions for it; a
 * player short on unanswered questions gets a history reset instead.
 */
export function describeAvailability(
  mode: GameMode,
  eligible: number,
  total: number,
): ModeAvailability {
  const playable = total >= mode.questionCount;
  return {
    mode,
    eligible,
    total,
    playable,
    resetRequired: playable && eligible < mode.questionCount,
  };
}

/**
 * One round for one player: MODE_SELECT -> PLAYING -> SCORING -> DONE.
 * Create a new engine for every round.
 */
export class RoundEngine {
  readonly id = uuidv4();

  private readonly logger = new Logger(RoundEngine.name);
  private phase = RoundPhase.MODE_SELECT;
  private mode: GameMode | null = null;
  private questionIds: number[] = [];
  private index = 0;
  private score = 0;

  constructor(
    readonly playerName: string,
    private readonly deps: RoundDependencies,
  ) {}

  get currentPhase(): RoundPhase {
    return this.phase;
  }

  get selectedMode(): GameMode | null {
    return this.mode;
  }

  /**
   * Accept a mode and draw its questions. A rejected mode leaves the
   * round in MODE_SELECT with nothing changed.
   */
  async selectMode(modeKey: string): Promise<ModeSelection> {
    this.assertPhase(RoundPhase.MODE_SELECT);
    const { gameModeService, progressService, questionService } = this.deps;

    if (!gameModeService.has(modeKey)) {
      return { accepted: false, reason: `Unknown game mode: ${modeKey}` };
    }

    const mode = gameModeService.get(modeKey);
    const availability = describeAvailability(
      mode,
      progressService.eligibleQuestions(this.playerName).length,
      questionService.questionCount(),
    );

    if (!availability.playable) {
      return {
        accepted: false,
        reason: `Not enough unique questions available for ${mode.name}.`,
      };
    }

    const selection = await progressService.selectRound(this.playerName, mode);

    this.mode = mode;
    this.questionIds = selection.questionIds;
    this.phase = RoundPhase.PLAYING;

    this.logger.log(
      `Round ${this.id} started: ${this.playerName} playing ${mode.key} (${this.questionIds.length} questions)`,
    );

    return {
      accepted: true,
      mode,
      questionCount: this.questionIds.length,
      historyReset: selection.historyReset,
    };
  }

  currentQuestion(): QuestionPrompt {
    this.assertPhase(RoundPhase.PLAYING);

    return {
      number: this.index + 1,
      total: this.questionIds.length,
      question: this.deps.questionService.getQuestion(
        this.questionIds[this.index],
      ),
    };
  }

  /**
   * Score the answer to the current question and move on
   */
  submitAnswer(label: string): AnswerResult {
    this.assertPhase(RoundPhase.PLAYING);

    const correctAnswer = this.deps.questionService.getCorrectAnswer(
      this.questionIds[this.index],
    );
    const correct = label.trim().toUpperCase() === correctAnswer;

    if (correct) {
      this.score += 1;
    }
    this.index += 1;

    if (this.index >= this.questionIds.length) {
      this.phase = RoundPhase.SCORING;
    }

    return {
      correct,
      correctAnswer,
      score: this.score,
      answered: this.index,
      total: this.questionIds.length,
    };
  }

  /**
   * Commit the round to the player's history and the leaderboard
   */
  async finish(): Promise<RoundResult> {
    this.assertPhase(RoundPhase.SCORING);
    if (!this.mode) {
      throw new RoundStateError('Round has no mode');
    }

    const total = this.questionIds.length;
    const { historyReset } = await this.deps.progressService.recordAnswered(
      this.playerName,
      this.questionIds,
    );
    const entry = await this.deps.leaderboardService.recordScore({
      playerName: this.playerName,
      score: this.score,
      total,
      mode: this.mode.key,
      timestamp: new Date().toISOString(),
    });

    this.phase = RoundPhase.DONE;
    this.logger.log(
      `Round ${this.id} finished: ${this.playerName} scored ${this.score}/${total}`,
    );

    return {
      roundId: this.id,
      mode: this.mode,
      score: this.score,
      total,
      percentage: (this.score / total) * 100,
      entry,
      historyReset,
    };
  }

  /**
   * Ask every remaining question through `answerFor`, then finish
   */
  async play(
    answerFor: AnswerProvider,
    onAnswer?: AnswerListener,
  ): Promise<RoundResult> {
    while (this.phase === RoundPhase.PLAYING) {
      const prompt = this.currentQuestion();
      const answer = await answerFor(prompt);
      const result = this.submitAnswer(answer);

      if (onAnswer) {
        await onAnswer(result, prompt);
      }
    }

    return this.finish();
  }

  private assertPhase(expected: RoundPhase): void {
    if (this.phase !== expected) {
      throw new RoundStateError(
        `Round ${this.id} is in ${this.phase}, expected ${expected}`,
      );
    }
  }
}
