import type {
  AnswerKeyEntry,
  Question,
  QuestionPaperContext,
} from '../types/question.interface';

const LATEX_SPECIAL_CHARACTERS: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '{': '\\{',
  '}': '\\}',
  $: '\\$',
  '&': '\\&',
  '%': '\\%',
  '#': '\\#',
  _: '\\_',
  '^': '\\textasciicircum{}',
  '~': '\\textasciitilde{}',
};

const MATH_SPAN_PATTERN = /(\$[^$]+\$)/;

export function escapeLatex(text: string): string {
  return text.replace(
    /[\\{}$&%#_^~]/g,
    (character) => LATEX_SPECIAL_CHARACTERS[character] ?? character,
  );
}

/** Escapes prose while leaving `$...$` math spans untouched. */
export function escapeOutsideMath(text: string): string {
  return text
    .split(MATH_SPAN_PATTERN)
    .map((segment) =>
      MATH_SPAN_PATTERN.test(segment) ? segment : escapeLatex(segment),
    )
    .join('');
}

export function renderPreamble(context: QuestionPaperContext): string {
  return [
    '\\documentclass[a4paper,12pt]{article}',
    '',
    '\\usepackage{worksheet}',
    '',
    '\\setsubject{Mathematics}',
    `\\setclass{${escapeLatex(context.level)}}`,
    `\\setworksheettitle{${escapeLatex(context.topic)}}`,
    '',
    '\\begin{document}',
    '',
    '\\makeworksheetheader',
    '',
    '',
  ].join('\n');
}

function renderDiagram(question: Question): string[] {
  if (question.diagramCode) {
    return ['\\begin{center}', question.diagramCode, '\\end{center}'];
  }
  if (question.imagePath) {
    return [
      '\\begin{center}',
      `\\includegraphics[width=0.8\\textwidth]{${question.imagePath}}`,
      '\\end{center}',
    ];
  }
  return [];
}

export function renderQuestionBlock(
  question: Question,
  position: number,
): string {
  const options = question.options
    .map((option) => `{${escapeOutsideMath(option)}}`)
    .join('');

  return [
    `% Question ${position} (${question.id})`,
    '\\begin{mcq}',
    escapeOutsideMath(question.text),
    ...renderDiagram(question),
    `\\equidistantoptions${options}`,
    '\\end{mcq}',
    '',
    '',
  ].join('\n');
}

export function renderFooter(answerKey: readonly AnswerKeyEntry[]): string {
  return [
    '\\answerkey',
    ...answerKey.map(
      ([id, correctOption]) => `\\answerkeyentry{${id}}{${correctOption}}`,
    ),
    '',
    '\\end{document}',
    '',
  ].join('\n');
}
