export class TriviaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Questions or answers document missing, unreadable or malformed.
 */
export class QuestionDataError extends TriviaError {}

/**
 * The questions and answers documents disagree with each other.
 */
export class DataIntegrityError extends TriviaError {}

export class ConfigurationError extends TriviaError {}

export class QuestionOutOfRangeError extends TriviaError {
  public readonly questionId: number;

  constructor(questionId: number, questionCount: number) {
    super(
      `Question id must be between 1 and ${questionCount}, got ${questionId}`,
    );
    this.questionId = questionId;
  }
}

export class AnswerNotFoundError extends TriviaError {
  public readonly questionId: number;

  constructor(questionId: number) {
    super(`No answer found for question ${questionId}`);
    this.questionId = questionId;
  }
}

export class UnknownGameModeError extends TriviaError {
  public readonly mode: string;

  constructor(mode: string) {
    super(`Unknown game mode: ${mode}`);
    this.mode = mode;
  }
}

export class InvalidScoreError extends TriviaError {}

export class RoundStateError extends TriviaError {}

export class PersistenceError extends TriviaError {}

/**
 * Raised when the operator interrupts a prompt (Ctrl+C or end of input).
 */
export class GameInterruptedError extends TriviaError {
  constructor() {
    super('Game interrupted by user');
  }
}
