import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type {
  Question,
  QuestionDifficulty,
  QuestionPaperContext,
} from '../types/question.interface';

const SYSTEM_PROMPT =
  'You are an experienced mathematics teacher who writes multiple-choice question papers. ' +
  'Write mathematics in LaTeX inline math ($...$). ' +
  'Reply with a single JSON object only, without code fences or commentary.';

function system(): ChatCompletionMessageParam {
  return { role: 'system', content: SYSTEM_PROMPT };
}

export function buildIdeaMessages(
  context: QuestionPaperContext,
): ChatCompletionMessageParam[] {
  const userPrompt = `
Collect 40-50 creative question ideas for the topic "${context.topic}", suitable for ${context.level}.

Favour higher-order thinking, application problems, conceptual understanding and problem-solving scenarios.
Each idea is one short phrase describing a question concept.

Return this JSON:
{
  "ideas": ["Comparing fractions with unlike denominators", "..."]
}
`;

  return [system(), { role: 'user', content: userPrompt }];
}

export function buildFramingMessages(
  idea: string,
  context: QuestionPaperContext,
  difficulty: QuestionDifficulty,
): ChatCompletionMessageParam[] {
  const userPrompt = `
Turn this idea into one complete multiple-choice question.

Idea: ${idea}
Topic: ${context.topic}
Class level: ${context.level}
Difficulty: ${difficulty}

Rules:
1. A clear question statement that does not repeat the options.
2. Exactly 4 options given as plain text, without "A)" or similar labels.
3. Exactly one correct option, named by its letter "A", "B", "C" or "D".
4. The wrong options must be plausible.
5. Set "needs_diagram" to true only if the question cannot be answered without a figure.

Return this JSON:
{
  "question_text": "Which fraction is equivalent to $\\\\frac{2}{3}$?",
  "options": ["$\\\\frac{4}{6}$", "$\\\\frac{3}{2}$", "$\\\\frac{2}{6}$", "$\\\\frac{4}{3}$"],
  "correct_option": "A",
  "needs_diagram": false
}
`;

  return [system(), { role: 'user', content: userPrompt }];
}

export function buildValidationMessages(
  question: Question,
  context: QuestionPaperContext,
  previousFeedback?: string,
): ChatCompletionMessageParam[] {
  const payload = {
    question_text: question.text,
    options: question.options,
    correct_option: question.correctOption,
    difficulty: question.difficulty,
  };

  const feedbackBlock = previousFeedback
    ? `\nYour previous review of this question said: ${previousFeedback}\nCheck again whether that still applies.\n`
    : '';

  const userPrompt = `
Review this multiple-choice question.

${JSON.stringify(payload, null, 2)}

Topic: ${context.topic}
Class level: ${context.level}
${feedbackBlock}
Check that:
1. The mathematics is correct.
2. Exactly one option is correct and it is the one marked.
3. The wording is clear, unambiguous and grammatical.
4. The difficulty suits the class level.
5. It is a real question, not a placeholder such as "Sample question" or "Option 1".

Return this JSON:
{
  "is_valid": true,
  "feedback": "One or two sentences.",
  "suggested_corrections": null
}
When the question is not valid and you can fix it, give "suggested_corrections" as an object with any of
"question_text", "options" and "correct_option".
`;

  return [system(), { role: 'user', content: userPrompt }];
}

export function buildDiagramMessages(
  question: Question,
  context: QuestionPaperContext,
): ChatCompletionMessageParam[] {
  const userPrompt = `
Draw the figure this question needs as LaTeX TikZ or PGFPlots code.

Question: ${question.text}
Topic: ${context.topic}

For simple figures (graphs, basic geometry) give the code in "diagram_code".
If the figure is too complex for TikZ (data visualisation, detailed drawings), set "too_complex" to true,
leave "diagram_code" empty and describe the figure in "description".

Return this JSON:
{
  "diagram_code": "\\\\begin{tikzpicture}...\\\\end{tikzpicture}",
  "too_complex": false,
  "description": ""
}
`;

  return [system(), { role: 'user', content: userPrompt }];
}
