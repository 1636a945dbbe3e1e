export type QuestionDifficulty = 'basic' | 'intermediate' | 'advanced';

export type OptionLetter = 'A' | 'B' | 'C' | 'D';

export const OPTION_LETTERS: readonly OptionLetter[] = ['A', 'B', 'C', 'D'];

export const DIFFICULTY_LEVELS: readonly QuestionDifficulty[] = [
  'basic',
  'intermediate',
  'advanced',
];

export interface Question {
  id: string;
  text: string;
  options: [string, string, string, string];
  correctOption: OptionLetter;
  difficulty: QuestionDifficulty;
  needsDiagram: boolean;
  diagramCode?: string;
  imagePath?: string;
}

export interface ValidationResult {
  isValid: boolean;
  feedback: string;
  correctedQuestion?: Question;
}

export type AnswerKeyEntry = [id: string, correctOption: OptionLetter];

export interface OutputRecord {
  questions: Question[];
  answerKey: AnswerKeyEntry[];
}

export interface QuestionPaperContext {
  topic: string;
  level: string;
}

export interface QuestionPaperMetadata extends QuestionPaperContext {
  generatedAt: string;
  totalQuestions: number;
  questions: Question[];
  answerKey: AnswerKeyEntry[];
}

export interface RunReport extends QuestionPaperContext {
  target: number;
  produced: number;
  shortfall: number;
  discarded: {
    framing: number;
    validation: number;
  };
  documentPath: string;
  metadataPath?: string;
  imagesDir?: string;
}
