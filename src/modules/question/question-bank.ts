import {
  GAME_CONFIG,
  isOptionLabel,
} from '../../common/constants/game.constants';
import { QuestionRecordDto } from '../../common/dto/question-data.dto';
import {
  AnswerKey,
  Question,
  QuestionBank,
  QuestionOptions,
} from '../../common/interfaces/question.interface';
import {
  DataIntegrityError,
  QuestionDataError,
} from '../../common/errors/trivia.errors';
import { validateInput } from '../../common/utils/validate-input';

/**
 * Validate the raw questions and answers documents and cross-check them.
 * Question ids are 1-based positions in the questions document.
 */
export function buildQuestionBank(
  rawQuestions: unknown,
  rawAnswers: unknown,
): QuestionBank {
  const questions = parseQuestions(rawQuestions);
  const answers = parseAnswers(rawAnswers);

  const missing = questions
    .map((q) => String(q.id))
    .filter((id) => !(id in answers));
  if (missing.length > 0) {
    throw new DataIntegrityError(
      `Answer key has no entry for question(s) ${missing.join(', ')}`,
    );
  }

  const unknown = Object.keys(answers).filter((id) => {
    const n = Number(id);
    return !Number.isInteger(n) || n < 1 || n > questions.length;
  });
  if (unknown.length > 0) {
    throw new DataIntegrityError(
      `Answer key references unknown question(s) ${unknown.join(', ')}`,
    );
  }

  for (const question of questions) {
    const label = answers[String(question.id)];
    if (question.options[label] === undefined) {
      throw new DataIntegrityError(
        `Answer ${label} for question ${question.id} is not one of its options`,
      );
    }
  }

  return { questions, answers };
}

function parseQuestions(raw: unknown): Question[] {
  if (!Array.isArray(raw)) {
    throw new QuestionDataError('Questions document must be a list');
  }
  if (raw.length === 0) {
    throw new QuestionDataError('Questions document contains no questions');
  }

  return raw.map((record: unknown, index) => {
    const id = index + 1;

    if (typeof record !== 'object' || record === null) {
      throw new QuestionDataError(`Question ${id} is not an object`);
    }

    const result = validateInput(QuestionRecordDto, record);
    if (!result.valid) {
      throw new QuestionDataError(`Question ${id}: ${result.message}`);
    }

    const options: QuestionOptions = {};
    for (const [label, text] of Object.entries(result.value.options)) {
      if (!isOptionLabel(label)) {
        throw new QuestionDataError(
          `Question ${id}: option label "${label}" is not one of ${GAME_CONFIG.OPTION_LABELS.join(', ')}`,
        );
      }
      if (typeof text !== 'string' || text.trim() === '') {
        throw new QuestionDataError(
          `Question ${id}: option ${label} must be non-empty text`,
        );
      }
      options[label] = text;
    }

    return Object.freeze({
      id,
      text: result.value.question,
      options: Object.freeze(options),
    });
  });
}

function parseAnswers(raw: unknown): AnswerKey {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new QuestionDataError('Answers document must be an object');
  }

  const answers: AnswerKey = {};
  for (const [id, value] of Object.entries(raw)) {
    const label: unknown =
      typeof value === 'string' ? value.trim().toUpperCase() : value;

    if (typeof label !== 'string' || !isOptionLabel(label)) {
      throw new QuestionDataError(
        `Answer for question ${id} must be one of ${GAME_CONFIG.OPTION_LABELS.join(', ')}`,
      );
    }
    answers[id] = label;
  }

  return answers;
}
