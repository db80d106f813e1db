import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import { GameMode } from '../../common/interfaces/game-mode.interface';
import {
  ConfigurationError,
  UnknownGameModeError,
} from '../../common/errors/trivia.errors';

@Injectable()
export class GameModeService {
  private readonly logger = new Logger(GameModeService.name);
  private readonly modes: GameMode[];

  constructor(private readonly configService: ConfigService) {
    const configured = this.configService.get<string>('TRIVIA_MODES', '');

    this.modes = configured.trim()
      ? parseGameModes(configured)
      : GAME_CONFIG.MODES.map((mode) => ({ ...mode }));

    this.logger.debug(
      `Game modes: ${this.modes.map((m) => `${m.key}(${m.questionCount})`).join(', ')}`,
    );
  }

  /**
   * All modes, in menu order
   */
  list(): GameMode[] {
    return this.modes.map((mode) => ({ ...mode }));
  }

  keys(): string[] {
    return this.modes.map((mode) => mode.key);
  }

  has(key: string): boolean {
    return this.modes.some((mode) => mode.key === key);
  }

  get(key: string): GameMode {
    const mode = this.modes.find((m) => m.key === key);
    if (!mode) {
      throw new UnknownGameModeError(key);
    }
    return { ...mode };
  }
}

/**
 * Parse `key:count[,key:count...]`. Known keys keep their display name.
 */
export function parseGameModes(value: string): GameMode[] {
  const modes: GameMode[] = [];

  for (const part of value.split(',')) {
    const [rawKey, rawCount, ...rest] = part.split(':').map((s) => s.trim());

    if (!rawKey || rawCount === undefined || rest.length > 0) {
      throw new ConfigurationError(
        `Invalid game mode "${part.trim()}", expected key:questionCount`,
      );
    }

    if (
      !GAME_CONFIG.MODE_KEY_PATTERN.test(rawKey) ||
      GAME_CONFIG.RESERVED_KEYS.includes(rawKey)
    ) {
      throw new ConfigurationError(`Invalid game mode key "${rawKey}"`);
    }

    const questionCount = Number(rawCount);
    if (!Number.isInteger(questionCount) || questionCount <= 0) {
      throw new ConfigurationError(
        `Invalid question count for mode ${rawKey}: ${rawCount}`,
      );
    }

    if (modes.some((mode) => mode.key === rawKey)) {
      throw new ConfigurationError(`Duplicate game mode "${rawKey}"`);
    }

    const preset = GAME_CONFIG.MODES.find((mode) => mode.key === rawKey);
    modes.push({
      key: rawKey,
      name: preset?.name ?? `${rawKey[0].toUpperCase()}${rawKey.slice(1)} Game`,
      description: `A ${questionCount}-question challenge`,
      questionCount,
    });
  }

  return modes;
}
