import type { QuestionDifficulty } from './types/question.interface';

export interface DifficultyRatios {
  basic: number;
  intermediate: number;
}

export const DEFAULT_DIFFICULTY_RATIOS: DifficultyRatios = {
  basic: 0.32,
  intermediate: 0.4,
};

/**
 * Difficulty for each output slot: the basic share first, then the
 * intermediate share, the remainder advanced.
 */
export function planDifficulties(
  target: number,
  ratios: DifficultyRatios = DEFAULT_DIFFICULTY_RATIOS,
): QuestionDifficulty[] {
  const basic = Math.floor(target * ratios.basic);
  const intermediate = Math.floor(target * ratios.intermediate);
  const advanced = Math.max(0, target - basic - intermediate);

  return [
    ...Array<QuestionDifficulty>(basic).fill('basic'),
    ...Array<QuestionDifficulty>(intermediate).fill('intermediate'),
    ...Array<QuestionDifficulty>(advanced).fill('advanced'),
  ];
}

export function questionId(position: number): string {
  return `Q${String(position).padStart(2, '0')}`;
}
