import {
  DIFFICULTY_LEVELS,
  OPTION_LETTERS,
  type OptionLetter,
  type Question,
  type QuestionDifficulty,
} from '../types/question.interface';

/** Question fields as the model sends them, before any checking. */
export type RawQuestionPayload = {
  question_text?: unknown;
  options?: unknown;
  correct_option?: unknown;
  needs_diagram?: unknown;
};

const OPTION_LABEL_PATTERN = /^\(?[A-D](?:\)|\.|:)\s*/;
const PLACEHOLDER_TEXT_PATTERN = /sample question|^option\s*\d+$/i;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function coerceString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0
    ? value.trim()
    : null;
}

export function isOptionLetter(value: unknown): value is OptionLetter {
  return OPTION_LETTERS.some((letter) => letter === value);
}

export function isDifficulty(value: unknown): value is QuestionDifficulty {
  return DIFFICULTY_LEVELS.some((level) => level === value);
}

/** Removes a leading option label such as `A)`, `(B)`, `C.` or `D:`. */
export function stripOptionLabel(option: string): string {
  return option.trim().replace(OPTION_LABEL_PATTERN, '').trim();
}

export function coerceOptionLetter(value: unknown): OptionLetter | null {
  const letter = coerceString(value)?.toUpperCase();
  return isOptionLetter(letter) ? letter : null;
}

/**
 * Keeps the first four options. Fewer than four, an empty or duplicate
 * option, or a placeholder such as "Option 1" makes the set unusable.
 */
export function sanitizeOptions(
  optionsInput: unknown,
): [string, string, string, string] | null {
  if (!Array.isArray(optionsInput)) {
    return null;
  }

  const options = optionsInput.map((option) =>
    typeof option === 'string' || typeof option === 'number'
      ? stripOptionLabel(String(option))
      : '',
  );

  if (options.length < 4) {
    return null;
  }

  const [a, b, c, d] = options;
  const firstFour: [string, string, string, string] = [a, b, c, d];
  if (firstFour.some((option) => option.length === 0)) {
    return null;
  }
  if (new Set(firstFour).size !== 4) {
    return null;
  }
  if (firstFour.some((option) => PLACEHOLDER_TEXT_PATTERN.test(option))) {
    return null;
  }

  return firstFour;
}

/**
 * Builds a Question from model output, or returns null when the payload
 * cannot give exactly four distinct options with one valid correct
 * letter. `id` and `difficulty` come from the caller, never the model.
 */
export function normalizeQuestion(
  raw: RawQuestionPayload,
  meta: { id: string; difficulty: QuestionDifficulty },
): Question | null {
  const text = coerceString(raw.question_text);
  const correctOption = coerceOptionLetter(raw.correct_option);

  if (!text || !correctOption) {
    return null;
  }
  if (PLACEHOLDER_TEXT_PATTERN.test(text)) {
    return null;
  }

  const options = sanitizeOptions(raw.options);
  if (!options) {
    return null;
  }

  return {
    id: meta.id,
    text,
    options,
    correctOption,
    difficulty: meta.difficulty,
    needsDiagram: raw.needs_diagram === true,
  };
}

/** Applies a partial correction from the validator over a question. */
export function applyCorrection(
  question: Question,
  corrections: Record<string, unknown>,
): Question | null {
  const merged: RawQuestionPayload = {
    question_text: corrections.question_text ?? question.text,
    options: corrections.options ?? question.options,
    correct_option: corrections.correct_option ?? question.correctOption,
    needs_diagram: question.needsDiagram,
  };

  return normalizeQuestion(merged, {
    id: question.id,
    difficulty: question.difficulty,
  });
}
