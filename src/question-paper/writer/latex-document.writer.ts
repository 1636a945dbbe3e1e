import fs from 'fs/promises';
import type {
  AnswerKeyEntry,
  OutputRecord,
  Question,
  QuestionPaperContext,
} from '../types/question.interface';
import { renderFooter, renderPreamble, renderQuestionBlock } from './latex';

/**
 * Append-only LaTeX document for one run.
 *
 * The file is laid out as preamble, question blocks, then the footer
 * (answer key and `\end{document}`). Appending overwrites the old footer
 * with the new block followed by the new footer in one write, so the
 * file is a complete document between any two appends.
 */
export class LatexDocumentWriter {
  private readonly questions: Question[] = [];
  private readonly answerKey: AnswerKeyEntry[] = [];
  private closed = false;

  private constructor(
    readonly documentPath: string,
    readonly context: QuestionPaperContext,
    private bodyBytes: number,
  ) {}

  static async create(
    documentPath: string,
    context: QuestionPaperContext,
  ): Promise<LatexDocumentWriter> {
    const preamble = renderPreamble(context);
    await fs.writeFile(documentPath, preamble + renderFooter([]), 'utf8');
    return new LatexDocumentWriter(
      documentPath,
      context,
      Buffer.byteLength(preamble, 'utf8'),
    );
  }

  get questionCount(): number {
    return this.questions.length;
  }

  get record(): OutputRecord {
    return {
      questions: [...this.questions],
      answerKey: [...this.answerKey],
    };
  }

  async append(question: Question): Promise<void> {
    if (this.closed) {
      throw new Error(`Document ${this.documentPath} is already closed`);
    }

    const written: Question = { ...question, options: [...question.options] };
    const entry: AnswerKeyEntry = [written.id, written.correctOption];
    const block = renderQuestionBlock(written, this.questions.length + 1);
    const tail = block + renderFooter([...this.answerKey, entry]);

    const handle = await fs.open(this.documentPath, 'r+');
    try {
      const { bytesWritten } = await handle.write(tail, this.bodyBytes, 'utf8');
      await handle.truncate(this.bodyBytes + bytesWritten);
    } finally {
      await handle.close();
    }

    this.bodyBytes += Buffer.byteLength(block, 'utf8');
    this.questions.push(Object.freeze(written));
    this.answerKey.push(entry);
  }

  /** Stops further appends and returns what was written. */
  close(): OutputRecord {
    this.closed = true;
    return this.record;
  }
}
