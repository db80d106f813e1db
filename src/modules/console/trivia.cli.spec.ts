import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { GameInterruptedError } from '../../common/errors/trivia.errors';
import { Question } from '../../common/interfaces/question.interface';
import { GameService } from '../game/game.service';
import { GameModeService } from '../game-mode/game-mode.service';
import { LeaderboardService } from '../leaderboard/leaderboard.service';
import { emptyLeaderboard } from '../persistence/leaderboard-document';
import { PersistenceService } from '../persistence/persistence.service';
import { ProgressService } from '../progress/progress.service';
import { QuestionService } from '../question/question.service';
import { NO_SCORES_MESSAGE } from './console.renderer';
import { ConsoleService } from './console.service';
import { TriviaCli } from './trivia.cli';

/**
 * Replays typed lines; running out of input behaves like Ctrl+D.
 */
class ScriptedConsole {
  readonly output: string[] = [];
  readonly prompts: string[] = [];

  constructor(private readonly inputs: string[]) {}

  async prompt(query: string): Promise<string> {
    this.prompts.push(query);
    const next = this.inputs.shift();
    if (next === undefined) {
      throw new GameInterruptedError();
    }
    return next;
  }

  print(...lines: string[]): void {
    this.output.push(...lines);
  }

  clear(): void {}

  interrupt(): void {}

  get remaining(): number {
    return this.inputs.length;
  }
}

// Five questions, every one answered by A
const questions: Question[] = Array.from({ length: 5 }, (_, i) => ({
  id: i + 1,
  text: `Question ${i + 1}?`,
  options: { A: 'right', B: 'wrong', C: 'also wrong', D: 'nope' },
}));

describe('TriviaCli', () => {
  let terminal: ScriptedConsole;
  let leaderboard: LeaderboardService;
  let save: jest.Mock;

  const run = async (inputs: string[], bank: Question[] = questions) => {
    terminal = new ScriptedConsole(inputs);
    save = jest.fn().mockResolvedValue('/tmp/leaderboard.json');

    const moduleRef = await Test.createTestingModule({
      providers: [
        TriviaCli,
        GameService,
        ProgressService,
        LeaderboardService,
        GameModeService,
        { provide: ConfigService, useValue: new ConfigService({}) },
        { provide: ConsoleService, useValue: terminal },
        {
          provide: QuestionService,
          useValue: {
            questionIds: () => bank.map((q) => q.id),
            questionCount: () => bank.length,
            hasQuestion: (id: number) => id >= 1 && id <= bank.length,
            getQuestion: (id: number) => bank[id - 1],
            getCorrectAnswer: () => 'A',
          },
        },
        {
          provide: PersistenceService,
          useValue: {
            load: jest
              .fn()
              .mockResolvedValue(emptyLeaderboard(['short', 'medium', 'long'])),
            save,
          },
        },
      ],
    }).compile();

    leaderboard = moduleRef.get(LeaderboardService);
    await leaderboard.onModuleInit();
    return moduleRef.get(TriviaCli).run();
  };

  it('plays a short game from start to finish', async () => {
    await run([
      'Test Player',
      '1', // Play
      '1', // Short Game
      'a', '',
      'a', '',
      'a', '',
      'a', '',
      'a',
      '', // results
      '4', // Exit
    ]);

    expect(terminal.remaining).toBe(0);
    expect(terminal.output).toContain('You have answered 0 of 5 questions.');
    expect(terminal.output).toContain('Starting Short Game with 5 questions!');
    expect(terminal.output.filter((line) => line === 'Correct!')).toHaveLength(
      5,
    );
    expect(terminal.output).toContain('Your score: 5 out of 5 (100.0%)');
    expect(terminal.output).toContain("Amazing! You're a trivia expert!");
    expect(terminal.output).toContain(
      "You've answered every question! Your question history starts over next round.",
    );
    expect(terminal.output[terminal.output.length - 1]).toBe(
      'Thanks for playing Terminal Trivia!',
    );
    expect(leaderboard.topScores('short')).toEqual([
      expect.objectContaining({ playerName: 'Test Player', score: 5, total: 5 }),
    ]);
  });

  it('pauses between questions but not after the last one', async () => {
    await run(['Ada', '1', '1', 'b', '', 'b', '', 'b', '', 'b', '', 'b', '', '4']);

    const nextPrompts = terminal.prompts.filter((query) =>
      query.includes('continue to the next question'),
    );
    expect(nextPrompts).toHaveLength(4);
    expect(terminal.output).toContain('Incorrect! The correct answer was A.');
    expect(terminal.output).toContain('Keep studying and try again!');
  });

  it('re-prompts for an invalid name', async () => {
    await run(['Bad!', 'x'.repeat(21), 'Ada', '4']);

    expect(terminal.output).toContain(
      'Name can only contain letters, numbers, spaces and these characters: _ - .',
    );
    expect(terminal.output).toContain(
      'Name must be between 1 and 20 characters long.',
    );
    expect(terminal.remaining).toBe(0);
  });

  it('re-prompts for an invalid menu choice', async () => {
    await run(['Ada', '9', 'x', '4']);

    expect(
      terminal.output.filter(
        (line) => line === 'Please enter a number between 1 and 4.',
      ),
    ).toHaveLength(2);
  });

  it('re-prompts for an invalid answer', async () => {
    await run(['Ada', '1', '1', 'e', 'a', '', 'a', '', 'a', '', 'a', '', 'a', '', '4']);

    expect(terminal.output).toContain('Please enter a valid answer (A, B, C, D).');
    expect(terminal.output).toContain('Your score: 5 out of 5 (100.0%)');
  });

  it('only accepts labels the question offers', async () => {
    const twoOptions = questions.map((q) => ({
      ...q,
      options: { A: 'right', B: 'wrong' },
    }));

    await run(
      ['Ada', '1', '1', 'c', 'a', '', 'a', '', 'a', '', 'a', '', 'a', '', '4'],
      twoOptions,
    );

    expect(terminal.prompts).toContain('\nYour answer (A/B): ');
    expect(terminal.output).toContain('Please enter a valid answer (A, B).');
    expect(terminal.output).toContain('Your score: 5 out of 5 (100.0%)');
    expect(terminal.remaining).toBe(0);
  });

  it('explains why a mode cannot be played', async () => {
    await run(['Ada', '1', '2', '', '4', '4']);

    expect(terminal.output).toContain(
      '2. Medium Game - A standard 20-question challenge (not enough questions)',
    );
    expect(terminal.output).toContain(
      'Not enough unique questions available for Medium Game.',
    );
    expect(terminal.output).not.toContain('Starting Medium Game with 20 questions!');
  });

  it('shows an empty leaderboard', async () => {
    await run(['Ada', '2', '1', '', '5', '4']);

    expect(terminal.output).toContain('Top Scores (All Modes)');
    expect(terminal.output).toContain(NO_SCORES_MESSAGE);
  });

  it('resets the question history on request', async () => {
    await run(['Ada', '3', '', '4']);

    expect(terminal.output).toContain('Your question history has been reset.');
    expect(save).toHaveBeenCalledTimes(1);
    expect(leaderboard.getAnsweredQuestions('Ada')).toEqual([]);
  });

  it('stops when the input ends', async () => {
    await expect(run(['Ada', '1'])).rejects.toThrow(GameInterruptedError);
  });
});
