import { Injectable } from '@nestjs/common';
import { ModeAvailability } from '../../common/interfaces/round-state.interface';
import { GameModeService } from '../game-mode/game-mode.service';
import { LeaderboardService } from '../leaderboard/leaderboard.service';
import { ProgressService } from '../progress/progress.service';
import { QuestionService } from '../question/question.service';
import { RoundEngine, describeAvailability } from './round-engine';

@Injectable()
export class GameService {
  constructor(
    private readonly questionService: QuestionService,
    private readonly progressService: ProgressService,
    private readonly leaderboardService: LeaderboardService,
    private readonly gameModeService: GameModeService,
  ) {}

  /**
   * Start a new round for a player, in mode selection
   */
  createRound(playerName: string): RoundEngine {
    return new RoundEngine(playerName, {
      questionService: this.questionService,
      progressService: this.progressService,
      leaderboardService: this.leaderboardService,
      gameModeService: this.gameModeService,
    });
  }

  checkMode(playerName: string, modeKey: string): ModeAvailability {
    return describeAvailability(
      this.gameModeService.get(modeKey),
      this.progressService.eligibleQuestions(playerName).length,
      this.questionService.questionCount(),
    );
  }

  /**
   * Availability of every configured mode, in menu order
   */
  availableModes(playerName: string): ModeAvailability[] {
    const eligible = this.progressService.eligibleQuestions(playerName).length;
    const total = this.questionService.questionCount();

    return this.gameModeService
      .list()
      .map((mode) => describeAvailability(mode, eligible, total));
  }
}
