import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import { DEFAULT_PATHS } from '../../common/constants/paths.constants';
import { Leaderboard } from '../../common/interfaces/leaderboard.interface';
import { PersistenceError } from '../../common/errors/trivia.errors';
import { configuredPath } from '../../common/utils/config.util';
import {
  errorMessage,
  isErrnoException,
} from '../../common/utils/error.util';
import { GameModeService } from '../game-mode/game-mode.service';
import {
  emptyLeaderboard,
  fromDocument,
  toDocument,
} from './leaderboard-document';

@Injectable()
export class PersistenceService {
  private readonly logger = new Logger(PersistenceService.name);
  private readonly primaryPath: string;
  private readonly fallbackPath: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly gameModeService: GameModeService,
  ) {
    this.primaryPath = configuredPath(
      this.configService,
      'TRIVIA_LEADERBOARD_PATH',
      DEFAULT_PATHS.LEADERBOARD,
    );
    this.fallbackPath = configuredPath(
      this.configService,
      'TRIVIA_LEADERBOARD_FALLBACK_PATH',
      path.resolve(GAME_CONFIG.FILES.LEADERBOARD),
    );
  }

  /**
   * Load the leaderboard document. A missing file yields an empty
   * leaderboard; an unreadable or corrupt one is replaced by an empty
   * leaderboard with a warning.
   */
  async load(): Promise<Leaderboard> {
    const modeKeys = this.gameModeService.keys();

    for (const filePath of this.locations()) {
      let content: string;
      try {
        content = await fs.readFile(filePath, 'utf-8');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') continue;

        this.logger.warn(
          `Error reading leaderboard ${filePath}: ${errorMessage(error)}. Starting with a fresh leaderboard.`,
        );
        return emptyLeaderboard(modeKeys);
      }

      try {
        const { leaderboard, dropped } = fromDocument(
          JSON.parse(content),
          modeKeys,
        );
        if (dropped > 0) {
          this.logger.warn(
            `Dropped ${dropped} malformed score entries from ${filePath}`,
          );
        }
        this.logger.log(`Leaderboard loaded from ${filePath}`);
        return leaderboard;
      } catch (error) {
        this.logger.warn(
          `Leaderboard file ${filePath} is corrupted (${errorMessage(error)}). Creating a new one.`,
        );
        return emptyLeaderboard(modeKeys);
      }
    }

    this.logger.log('No leaderboard file found, starting fresh');
    return emptyLeaderboard(modeKeys);
  }

  /**
   * Write the whole aggregate. Falls back to the secondary location when
   * the primary one cannot be written. Returns the path written.
   */
  async save(leaderboard: Leaderboard): Promise<string> {
    const content = `${JSON.stringify(
      toDocument(leaderboard),
      null,
      GAME_CONFIG.JSON_INDENT,
    )}\n`;

    try {
      await this.writeAtomically(this.primaryPath, content);
      this.logger.debug(`Leaderboard saved to ${this.primaryPath}`);
      return this.primaryPath;
    } catch (error) {
      if (!this.fallbackPath || this.fallbackPath === this.primaryPath) {
        throw new PersistenceError(
          `Error saving leaderboard to ${this.primaryPath}: ${errorMessage(error)}`,
          { cause: error },
        );
      }

      this.logger.warn(
        `Could not save leaderboard to ${this.primaryPath} (${errorMessage(error)}), trying ${this.fallbackPath}`,
      );
    }

    try {
      await this.writeAtomically(this.fallbackPath, content);
      this.logger.debug(`Leaderboard saved to ${this.fallbackPath}`);
      return this.fallbackPath;
    } catch (error) {
      throw new PersistenceError(
        `Error saving leaderboard to ${this.fallbackPath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Primary location first, then the fallback (if configured)
   */
  locations(): string[] {
    return this.fallbackPath && this.fallbackPath !== this.primaryPath
      ? [this.primaryPath, this.fallbackPath]
      : [this.primaryPath];
  }

  // The target is only ever replaced by a complete file
  private async writeAtomically(
    filePath: string,
    content: string,
  ): Promise<void> {
    const tempPath = `${filePath}.tmp`;

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  }
}
