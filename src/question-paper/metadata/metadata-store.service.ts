import { Injectable, Logger } from '@nestjs/common';
import fs from 'fs/promises';
import {
  InvalidMetadataError,
  MetadataNotFoundError,
} from '../../common/errors';
import {
  coerceString,
  isDifficulty,
  isOptionLetter,
  isRecord,
} from '../agents/question-normalizer';
import type {
  AnswerKeyEntry,
  OutputRecord,
  Question,
  QuestionPaperContext,
  QuestionPaperMetadata,
} from '../types/question.interface';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function parseStoredQuestion(value: unknown, index: number): Question {
  const where = `questions[${index}]`;
  if (!isRecord(value)) {
    throw new InvalidMetadataError(`${where} is not an object`);
  }

  const id = coerceString(value.id);
  const text = coerceString(value.text);
  if (!id || !text) {
    throw new InvalidMetadataError(`${where} needs a non-empty id and text`);
  }

  const options = value.options;
  if (
    !Array.isArray(options) ||
    options.length !== 4 ||
    !options.every((option): option is string => typeof option === 'string')
  ) {
    throw new InvalidMetadataError(`${where} must have exactly four options`);
  }
  if (!isOptionLetter(value.correctOption)) {
    throw new InvalidMetadataError(`${where} has an invalid correctOption`);
  }
  if (!isDifficulty(value.difficulty)) {
    throw new InvalidMetadataError(`${where} has an invalid difficulty`);
  }

  const [a, b, c, d] = options;
  const question: Question = {
    id,
    text,
    options: [a, b, c, d],
    correctOption: value.correctOption,
    difficulty: value.difficulty,
    needsDiagram: value.needsDiagram === true,
  };

  const diagramCode = coerceString(value.diagramCode);
  if (diagramCode) question.diagramCode = diagramCode;
  const imagePath = coerceString(value.imagePath);
  if (imagePath) question.imagePath = imagePath;

  return question;
}

@Injectable()
export class MetadataStoreService {
  private readonly logger = new Logger(MetadataStoreService.name);

  async write(
    metadataPath: string,
    record: OutputRecord,
    context: QuestionPaperContext,
  ): Promise<QuestionPaperMetadata> {
    const metadata: QuestionPaperMetadata = {
      topic: context.topic,
      level: context.level,
      generatedAt: new Date().toISOString(),
      totalQuestions: record.questions.length,
      questions: record.questions,
      answerKey: record.answerKey,
    };

    await fs.writeFile(
      metadataPath,
      `${JSON.stringify(metadata, null, 2)}\n`,
      'utf8',
    );
    this.logger.log(`Wrote metadata ${metadataPath}`);
    return metadata;
  }

  /**
   * Loads a metadata file for re-rendering. The answer key is rebuilt
   * from the questions, so a hand-edited key cannot drift from them.
   */
  async read(metadataPath: string): Promise<QuestionPaperMetadata> {
    let raw: string;
    try {
      raw = await fs.readFile(metadataPath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new MetadataNotFoundError(
          `Metadata file not found: ${metadataPath}`,
        );
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw) as unknown;
    } catch (error) {
      throw new InvalidMetadataError('Metadata file is not valid JSON', {
        cause: error,
      });
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.questions)) {
      throw new InvalidMetadataError('Metadata has no "questions" array');
    }
    if (parsed.questions.length === 0) {
      throw new InvalidMetadataError('Metadata contains no questions');
    }

    const questions = parsed.questions.map((question, index) =>
      parseStoredQuestion(question, index),
    );

    return {
      topic: coerceString(parsed.topic) ?? 'Unknown Topic',
      level: coerceString(parsed.level) ?? 'Unknown Class',
      generatedAt: coerceString(parsed.generatedAt) ?? '',
      totalQuestions: questions.length,
      questions,
      answerKey: questions.map((question): AnswerKeyEntry => [
        question.id,
        question.correctOption,
      ]),
    };
  }
}
