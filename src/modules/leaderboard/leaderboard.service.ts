import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import {
  Leaderboard,
  ScoreEntry,
} from '../../common/interfaces/leaderboard.interface';
import {
  InvalidScoreError,
  UnknownGameModeError,
} from '../../common/errors/trivia.errors';
import { configuredInt } from '../../common/utils/config.util';
import { GameModeService } from '../game-mode/game-mode.service';
import { PersistenceService } from '../persistence/persistence.service';
import { emptyLeaderboard } from '../persistence/leaderboard-document';
import {
  compareModeEntries,
  compareTopEntries,
  rankEntries,
} from './leaderboard.ranking';

@Injectable()
export class LeaderboardService implements OnModuleInit {
  private readonly logger = new Logger(LeaderboardService.name);
  private readonly size: number;
  private board: Leaderboard;

  constructor(
    private readonly configService: ConfigService,
    private readonly persistenceService: PersistenceService,
    private readonly gameModeService: GameModeService,
  ) {
    this.size = configuredInt(
      this.configService,
      'TRIVIA_LEADERBOARD_SIZE',
      GAME_CONFIG.LEADERBOARD_SIZE,
    );
    this.board = emptyLeaderboard(this.gameModeService.keys());
  }

  async onModuleInit(): Promise<void> {
    const loaded = await this.persistenceService.load();

    // Hand-edited documents may be out of order or too long
    const modes: Record<string, ScoreEntry[]> = {};
    for (const mode of this.gameModeService.keys()) {
      modes[mode] = rankEntries(
        loaded.modes[mode] ?? [],
        compareModeEntries,
        this.size,
      );
    }

    this.board = {
      modes,
      topScores: rankEntries(loaded.topScores, compareTopEntries, this.size),
      playerProgress: loaded.playerProgress,
    };
  }

  /**
   * Insert a finished round into its mode ranking and the cross-mode
   * ranking, then persist.
   */
  async recordScore(input: ScoreEntry): Promise<ScoreEntry> {
    const entry = this.validateEntry(input);

    this.board.modes[entry.mode] = rankEntries(
      [...(this.board.modes[entry.mode] ?? []), entry],
      compareModeEntries,
      this.size,
    );
    this.board.topScores = rankEntries(
      [...this.board.topScores, entry],
      compareTopEntries,
      this.size,
    );

    await this.persist();

    this.logger.log(
      `Recorded ${entry.playerName} ${entry.score}/${entry.total} in ${entry.mode}`,
    );
    return entry;
  }

  /**
   * Best entries for one mode, or across all modes when no mode is given
   */
  topScores(mode?: string): ScoreEntry[] {
    if (mode === undefined) {
      return [...this.board.topScores];
    }
    if (!this.gameModeService.has(mode)) {
      throw new UnknownGameModeError(mode);
    }
    return [...(this.board.modes[mode] ?? [])];
  }

  getAnsweredQuestions(playerName: string): string[] {
    return [...(this.board.playerProgress.get(playerName) ?? [])];
  }

  async setAnsweredQuestions(
    playerName: string,
    questionIds: string[],
  ): Promise<void> {
    this.board.playerProgress.set(playerName, [...questionIds]);
    await this.persist();
  }

  snapshot(): Leaderboard {
    return structuredClone(this.board);
  }

  /**
   * Persist the current state (used on shutdown)
   */
  async flush(): Promise<void> {
    await this.persist();
  }

  private async persist(): Promise<void> {
    await this.persistenceService.save(this.board);
  }

  private validateEntry(input: ScoreEntry): ScoreEntry {
    const { playerName, score, total, mode, timestamp } = input;

    if (
      playerName.length < GAME_CONFIG.MIN_PLAYER_NAME_LENGTH ||
      playerName.length > GAME_CONFIG.MAX_PLAYER_NAME_LENGTH ||
      !GAME_CONFIG.PLAYER_NAME_PATTERN.test(playerName)
    ) {
      throw new InvalidScoreError(`Invalid player name: "${playerName}"`);
    }
    if (!Number.isInteger(total) || total <= 0) {
      throw new InvalidScoreError(`Total must be a positive integer: ${total}`);
    }
    if (!Number.isInteger(score) || score < 0 || score > total) {
      throw new InvalidScoreError(
        `Score must be an integer between 0 and ${total}: ${score}`,
      );
    }
    if (!this.gameModeService.has(mode)) {
      throw new UnknownGameModeError(mode);
    }

    return Object.freeze({ playerName, score, total, mode, timestamp });
  }
}
