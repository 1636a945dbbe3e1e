import type { Question } from '../types/question.interface';

export function framedPayload(
  text: string,
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    question_text: text,
    options: ['1/2', '1/3', '2/3', '3/4'],
    correct_option: 'C',
    needs_diagram: false,
    ...overrides,
  };
}

export const VALID = { is_valid: true, feedback: 'Looks correct.' };

export function invalid(
  feedback: string,
  suggestedCorrections: Record<string, unknown> | null = null,
): Record<string, unknown> {
  return {
    is_valid: false,
    feedback,
    suggested_corrections: suggestedCorrections,
  };
}

export function buildQuestion(overrides: Partial<Question> = {}): Question {
  return {
    id: 'Q01',
    text: 'Which fraction is the largest?',
    options: ['1/2', '1/3', '2/3', '3/4'],
    correctOption: 'D',
    difficulty: 'basic',
    needsDiagram: false,
    ...overrides,
  };
}
