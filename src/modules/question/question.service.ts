import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { OptionLabel } from '../../common/constants/game.constants';
import { DEFAULT_PATHS } from '../../common/constants/paths.constants';
import {
  Question,
  QuestionBank,
} from '../../common/interfaces/question.interface';
import {
  AnswerNotFoundError,
  QuestionDataError,
  QuestionOutOfRangeError,
} from '../../common/errors/trivia.errors';
import { configuredPath } from '../../common/utils/config.util';
import {
  errorMessage,
  isErrnoException,
} from '../../common/utils/error.util';
import { buildQuestionBank } from './question-bank';

@Injectable()
export class QuestionService implements OnModuleInit {
  private readonly logger = new Logger(QuestionService.name);
  private bank: QuestionBank = { questions: [], answers: {} };

  constructor(private readonly configService: ConfigService) {}

  /**
   * Load and cross-check the question bank. Any failure aborts startup.
   */
  async onModuleInit(): Promise<void> {
    const questionsPath = configuredPath(
      this.configService,
      'TRIVIA_QUESTIONS_PATH',
      DEFAULT_PATHS.QUESTIONS,
    );
    const answersPath = configuredPath(
      this.configService,
      'TRIVIA_ANSWERS_PATH',
      DEFAULT_PATHS.ANSWERS,
    );

    const [rawQuestions, rawAnswers] = await Promise.all([
      this.readDocument(questionsPath),
      this.readDocument(answersPath),
    ]);

    this.bank = buildQuestionBank(rawQuestions, rawAnswers);
    this.logger.log(
      `Loaded ${this.bank.questions.length} questions from ${questionsPath}`,
    );
  }

  questionCount(): number {
    return this.bank.questions.length;
  }

  /**
   * All question ids, ascending
   */
  questionIds(): number[] {
    return this.bank.questions.map((q) => q.id);
  }

  hasQuestion(id: number): boolean {
    return Number.isInteger(id) && id >= 1 && id <= this.questionCount();
  }

  getQuestion(id: number): Question {
    if (!this.hasQuestion(id)) {
      throw new QuestionOutOfRangeError(id, this.questionCount());
    }
    return this.bank.questions[id - 1];
  }

  getCorrectAnswer(id: number): OptionLabel {
    const answer = this.bank.answers[String(id)];
    if (!answer) {
      throw new AnswerNotFoundError(id);
    }
    return answer;
  }

  /**
   * Case-insensitive comparison against the answer key
   */
  isCorrect(id: number, label: string): boolean {
    return this.getCorrectAnswer(id) === label.trim().toUpperCase();
  }

  private async readDocument(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new QuestionDataError(`Required file not found: ${filePath}`);
      }
      throw new QuestionDataError(
        `Error reading ${filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new QuestionDataError(
        `Invalid JSON in ${filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
