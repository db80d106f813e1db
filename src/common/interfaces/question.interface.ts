import { OptionLabel } from '../constants/game.constants';

export type QuestionOptions = Partial<Record<OptionLabel, string>>;

export interface Question {
  id: number; // 1-based position in the questions document
  text: string;
  options: QuestionOptions;
}

export type AnswerKey = Record<string, OptionLabel>;

export interface QuestionBank {
  questions: readonly Question[];
  answers: AnswerKey;
}
