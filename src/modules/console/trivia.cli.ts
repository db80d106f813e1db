import { Injectable, Logger } from '@nestjs/common';
import { isNumberString, max, min } from 'class-validator';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import { AnswerDto, PlayerNameDto } from '../../common/dto/player-input.dto';
import {
  ModeSelection,
  QuestionPrompt,
} from '../../common/interfaces/round-state.interface';
import { validateInput } from '../../common/utils/validate-input';
import { GameService } from '../game/game.service';
import { RoundEngine } from '../game/round-engine';
import { GameModeService } from '../game-mode/game-mode.service';
import { LeaderboardService } from '../leaderboard/leaderboard.service';
import { ProgressService } from '../progress/progress.service';
import { ConsoleService } from './console.service';
import {
  renderAnswerFeedback,
  renderHeader,
  renderLeaderboard,
  renderMenu,
  renderModeOption,
  renderQuestion,
  renderResults,
} from './console.renderer';

export const GAME_TITLE = 'TERMINAL TRIVIA';

const MAIN_MENU = {
  PLAY: 1,
  LEADERBOARDS: 2,
  RESET_HISTORY: 3,
  EXIT: 4,
};

/**
 * Menu-driven game session on top of the console. Every value handed to
 * the game services has been validated here first.
 */
@Injectable()
export class TriviaCli {
  private readonly logger = new Logger(TriviaCli.name);

  constructor(
    private readonly console: ConsoleService,
    private readonly gameService: GameService,
    private readonly gameModeService: GameModeService,
    private readonly leaderboardService: LeaderboardService,
    private readonly progressService: ProgressService,
  ) {}

  async run(): Promise<void> {
    this.console.clear();
    this.console.print(
      ...renderHeader(GAME_TITLE),
      'Welcome to Terminal Trivia! Test your general knowledge.',
    );

    const playerName = await this.askPlayerName();
    this.logger.log(`Session started for ${playerName}`);

    await this.mainMenu(playerName);
  }

  private async mainMenu(playerName: string): Promise<void> {
    for (;;) {
      this.console.clear();
      const choice = await this.choose('Main Menu', [
        'Play Game',
        'View Leaderboards',
        'Reset My Question History',
        'Exit',
      ]);

      switch (choice) {
        case MAIN_MENU.PLAY:
          await this.playRound(playerName);
          break;
        case MAIN_MENU.LEADERBOARDS:
          await this.leaderboardMenu();
          break;
        case MAIN_MENU.RESET_HISTORY:
          await this.progressService.resetProgress(playerName);
          this.console.print('', 'Your question history has been reset.');
          await this.pause();
          break;
        case MAIN_MENU.EXIT:
          this.console.print('', 'Thanks for playing Terminal Trivia!');
          return;
      }
    }
  }

  private async playRound(playerName: string): Promise<void> {
    const round = this.gameService.createRound(playerName);
    const selection = await this.selectMode(round);
    if (!selection) return;

    if (selection.historyReset) {
      this.console.print(
        '',
        "You've answered most questions! Your question history has been reset for a fresh start.",
      );
    }
    this.console.print(
      '',
      `Starting ${selection.mode.name} with ${selection.questionCount} questions!`,
    );

    const result = await round.play(
      async (prompt) => {
        this.console.print('', ...renderQuestion(prompt));
        return this.askAnswer(prompt);
      },
      async (answer, prompt) => {
        this.console.print('', renderAnswerFeedback(answer));
        if (prompt.number < prompt.total) {
          await this.pause('Press Enter to continue to the next question...');
        }
      },
    );

    this.console.clear();
    this.console.print(...renderResults(result));
    if (result.historyReset) {
      this.console.print(
        "You've answered every question! Your question history starts over next round.",
      );
    }
    await this.pause();
  }

  /**
   * Mode menu; re-prompts until a mode is accepted. Null means "back".
   */
  private async selectMode(
    round: RoundEngine,
  ): Promise<Extract<ModeSelection, { accepted: true }> | null> {
    for (;;) {
      this.console.clear();
      const { answered, total } = this.progressService.progressSummary(
        round.playerName,
      );
      this.console.print(`You have answered ${answered} of ${total} questions.`);

      const modes = this.gameService.availableModes(round.playerName);
      const choice = await this.choose('Select Game Mode', [
        ...modes.map(renderModeOption),
        'Back to Main Menu',
      ]);

      if (choice > modes.length) return null;

      const selection = await round.selectMode(modes[choice - 1].mode.key);
      if (selection.accepted) return selection;

      this.console.print('', selection.reason, 'Please choose a different mode.');
      await this.pause();
    }
  }

  private async leaderboardMenu(): Promise<void> {
    const modes = this.gameModeService.list();

    for (;;) {
      this.console.clear();
      const choice = await this.choose('Leaderboards', [
        'Top Scores (All Modes)',
        ...modes.map((mode) => `${mode.name} Leaderboard`),
        'Back to Main Menu',
      ]);

      if (choice > modes.length + 1) return;

      this.console.clear();
      if (choice === 1) {
        this.console.print(
          ...renderLeaderboard(
            'Top Scores (All Modes)',
            this.leaderboardService.topScores(),
            true,
          ),
        );
      } else {
        const mode = modes[choice - 2];
        this.console.print(
          ...renderLeaderboard(
            `${mode.name} Leaderboard`,
            this.leaderboardService.topScores(mode.key),
            false,
          ),
        );
      }
      await this.pause();
    }
  }

  private async choose(title: string, options: string[]): Promise<number> {
    this.console.print(...renderMenu(title, options));

    for (;;) {
      const raw = (
        await this.console.prompt(`\nEnter your choice (1-${options.length}): `)
      ).trim();
      const choice = Number(raw);

      if (
        isNumberString(raw, { no_symbols: true }) &&
        min(choice, 1) &&
        max(choice, options.length)
      ) {
        return choice;
      }
      this.console.print(
        `Please enter a number between 1 and ${options.length}.`,
      );
    }
  }

  private async askPlayerName(): Promise<string> {
    for (;;) {
      const raw = await this.console.prompt('\nEnter your name: ');
      const result = validateInput(PlayerNameDto, { name: raw });

      if (result.valid) return result.value.name;
      this.console.print(result.message);
    }
  }

  /**
   * Only labels the current question actually offers are accepted
   */
  private async askAnswer(prompt: QuestionPrompt): Promise<string> {
    const { options } = prompt.question;
    const labels = GAME_CONFIG.OPTION_LABELS.filter(
      (label) => options[label] !== undefined,
    );

    for (;;) {
      const raw = await this.console.prompt(
        `\nYour answer (${labels.join('/')}): `,
      );
      const result = validateInput(AnswerDto, { answer: raw });

      if (result.valid && labels.includes(result.value.answer)) {
        return result.value.answer;
      }
      this.console.print(
        `Please enter a valid answer (${labels.join(', ')}).`,
      );
    }
  }

  private async pause(message = 'Press Enter to continue...'): Promise<void> {
    await this.console.prompt(`\n${message}`);
  }
}
