// src/utils/errors.ts

export type Violation = {
  path: string;
  message: string;
  code?: string;
};

/** Base for every failure the quiz core reports. `exitCode` is what the CLI exits with. */
export class QuizError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class LoadError extends QuizError {
  readonly source: string;

  constructor(source: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not load question bank from ${source}: ${reason}`, 66, options);
    this.source = source;
  }
}

export class ValidationError extends QuizError {
  readonly source: string;
  readonly violations: readonly Violation[];

  constructor(source: string, violations: readonly Violation[]) {
    super(
      `Question bank ${source} failed validation with ${violations.length} violation(s)`,
      65
    );
    this.source = source;
    this.violations = violations;
  }
}

export class UnknownTopicError extends QuizError {
  readonly topic: string;
  readonly available: readonly string[];

  constructor(topic: string, available: readonly string[]) {
    super(`Unknown topic "${topic}". Available: ${available.join(", ") || "none"}`, 64);
    this.topic = topic;
    this.available = available;
  }
}

export class NoQuestionsAvailableError extends QuizError {
  constructor(criteria: string) {
    super(`No questions found for ${criteria}`, 3);
  }
}

export class InvalidInputError extends QuizError {
  readonly input: number;
  readonly max: number;

  constructor(input: number, max: number) {
    super(`Please enter a number between 1 and ${max}`, 64);
    this.input = input;
    this.max = max;
  }
}

export class SessionStateError extends QuizError {
  constructor(message: string) {
    super(message, 70);
  }
}

export class ExportError extends QuizError {
  constructor(file: string, options?: { cause?: unknown }) {
    super(`Error exporting results to ${file}`, 73, options);
  }
}
