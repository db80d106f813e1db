import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { QuestionOutOfRangeError } from '../../common/errors/trivia.errors';
import { GameMode } from '../../common/interfaces/game-mode.interface';
import { GameModeService } from '../game-mode/game-mode.service';
import { LeaderboardService } from '../leaderboard/leaderboard.service';
import { emptyLeaderboard } from '../persistence/leaderboard-document';
import { PersistenceService } from '../persistence/persistence.service';
import { QuestionService } from '../question/question.service';
import {
  ProgressService,
  sampleWithoutReplacement,
} from './progress.service';

const SHORT: GameMode = {
  key: 'short',
  name: 'Short Game',
  description: 'A quick 5-question challenge',
  questionCount: 5,
};

describe('ProgressService', () => {
  let progress: ProgressService;
  let leaderboard: LeaderboardService;
  let save: jest.Mock;

  const create = async (questionCount: number) => {
    const ids = Array.from({ length: questionCount }, (_, i) => i + 1);
    const questions = {
      questionIds: () => [...ids],
      questionCount: () => ids.length,
      hasQuestion: (id: number) => ids.includes(id),
    };
    save = jest.fn().mockResolvedValue('/tmp/leaderboard.json');

    const moduleRef = await Test.createTestingModule({
      providers: [
        ProgressService,
        LeaderboardService,
        GameModeService,
        { provide: ConfigService, useValue: new ConfigService({}) },
        { provide: QuestionService, useValue: questions },
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
    progress = moduleRef.get(ProgressService);
  };

  it('deals a permutation of a five-question bank and then resets', async () => {
    await create(5);

    const round = await progress.selectRound('Ada', SHORT);

    expect(round.historyReset).toBe(false);
    expect([...round.questionIds].sort((a, b) => a - b)).toEqual([
      1, 2, 3, 4, 5,
    ]);

    const recorded = await progress.recordAnswered('Ada', round.questionIds);

    expect(recorded).toEqual({ historyReset: true });
    expect(leaderboard.getAnsweredQuestions('Ada')).toEqual([]);
    expect(progress.eligibleQuestions('Ada')).toEqual([1, 2, 3, 4, 5]);
  });

  it('shrinks eligibility by the questions played', async () => {
    await create(12);

    const first = await progress.selectRound('Ada', SHORT);
    await progress.recordAnswered('Ada', first.questionIds);
    expect(progress.eligibleQuestions('Ada')).toHaveLength(7);

    const second = await progress.selectRound('Ada', SHORT);
    expect(second.historyReset).toBe(false);
    expect(second.questionIds.some((id) => first.questionIds.includes(id))).toBe(
      false,
    );
    await progress.recordAnswered('Ada', second.questionIds);
    expect(progress.progressSummary('Ada')).toEqual({
      answered: 10,
      remaining: 2,
      total: 12,
    });
  });

  it('resets the history when too few questions remain', async () => {
    await create(12);
    await leaderboard.setAnsweredQuestions(
      'Ada',
      ['1', '2', '3', '4', '5', '6', '7', '8', '9', '10'],
    );

    const round = await progress.selectRound('Ada', SHORT);

    expect(round.historyReset).toBe(true);
    expect(round.questionIds).toHaveLength(5);
    expect(new Set(round.questionIds).size).toBe(5);
    expect(leaderboard.getAnsweredQuestions('Ada')).toEqual([]);
  });

  it('never draws more questions than the bank holds', async () => {
    await create(3);

    const round = await progress.selectRound('Ada', SHORT);

    expect(round.historyReset).toBe(true);
    expect(round.questionIds).toHaveLength(3);
  });

  it('keeps players apart', async () => {
    await create(12);
    await progress.recordAnswered('Ada', [1, 2, 3]);

    expect(progress.eligibleQuestions('Ada')).toEqual([
      4, 5, 6, 7, 8, 9, 10, 11, 12,
    ]);
    expect(progress.eligibleQuestions('Bob')).toHaveLength(12);
  });

  it.each(['constructor', 'toString', 'valueOf', 'hasOwnProperty', '__proto__'])(
    'tracks a player named %p',
    async (name) => {
      await create(10);

      expect(progress.eligibleQuestions(name)).toHaveLength(10);
      await expect(progress.recordAnswered(name, [1, 2])).resolves.toEqual({
        historyReset: false,
      });

      expect(progress.eligibleQuestions(name)).toEqual([3, 4, 5, 6, 7, 8, 9, 10]);
      expect(progress.progressSummary(name)).toEqual({
        answered: 2,
        remaining: 8,
        total: 10,
      });
      expect(progress.eligibleQuestions('Ada')).toHaveLength(10);
    },
  );

  it('rejects ids outside the bank', async () => {
    await create(5);

    await expect(progress.recordAnswered('Ada', [2, 6])).rejects.toThrow(
      QuestionOutOfRangeError,
    );
    expect(save).not.toHaveBeenCalled();
  });

  it('resets on request', async () => {
    await create(12);
    await progress.recordAnswered('Ada', [1, 2]);

    await progress.resetProgress('Ada');

    expect(progress.eligibleQuestions('Ada')).toHaveLength(12);
    expect(save).toHaveBeenCalledTimes(2);
  });
});

describe('sampleWithoutReplacement', () => {
  it('takes items in shuffled order', () => {
    expect(sampleWithoutReplacement([1, 2, 3, 4], 2, () => 0)).toEqual([1, 2]);
    expect(sampleWithoutReplacement([1, 2, 3, 4], 2, () => 0.999)).toEqual([
      4, 1,
    ]);
  });

  it('returns everything when asked for more than there is', () => {
    expect(sampleWithoutReplacement(['a', 'b'], 5, () => 0)).toEqual([
      'a',
      'b',
    ]);
  });

  it('never repeats an item', () => {
    const sample = sampleWithoutReplacement(
      Array.from({ length: 50 }, (_, i) => i),
      20,
    );

    expect(new Set(sample).size).toBe(20);
  });

  it('leaves the input untouched', () => {
    const items = [1, 2, 3];
    sampleWithoutReplacement(items, 3, () => 0.999);

    expect(items).toEqual([1, 2, 3]);
  });
});
