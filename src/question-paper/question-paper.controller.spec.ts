import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { Test } from '@nestjs/testing';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  DocumentBusyError,
  IdeaGenerationError,
  InvalidMetadataError,
  MetadataNotFoundError,
  QuestionPaperError,
} from '../common/errors';
import { QuestionPaperController } from './question-paper.controller';
import { QuestionPaperService } from './question-paper.service';
import { MetadataStoreService } from './metadata/metadata-store.service';
import { buildQuestion } from './testing/fixtures';
import { createQuestionPaperTestbed } from './testing/testing-module';
import type { RunReport } from './types/question.interface';

describe('QuestionPaperController', () => {
  const service = {
    generate: jest.fn(),
    render: jest.fn(),
    resolveStoredMetadataPath: jest.fn((metadataPath: string) => metadataPath),
  };
  let controller: QuestionPaperController;

  const report: RunReport = {
    topic: 'Fractions',
    level: 'Class 5',
    target: 3,
    produced: 3,
    shortfall: 0,
    discarded: { framing: 0, validation: 0 },
    documentPath: 'question_paper/fractions_class_5.tex',
    metadataPath: 'question_paper/fractions_class_5.json',
    imagesDir: 'question_paper/images',
  };

  beforeEach(async () => {
    service.generate.mockReset();
    service.render.mockReset();
    const moduleRef = await Test.createTestingModule({
      controllers: [QuestionPaperController],
      providers: [{ provide: QuestionPaperService, useValue: service }],
    }).compile();
    controller = moduleRef.get(QuestionPaperController);
  });

  it('returns the run report', async () => {
    service.generate.mockResolvedValue(report);

    await expect(
      controller.generate({ topic: 'Fractions', level: 'Class 5', count: 3 }),
    ).resolves.toEqual(report);
    expect(service.generate).toHaveBeenCalledWith({
      topic: 'Fractions',
      level: 'Class 5',
      count: 3,
    });
  });

  it.each([
    [new IdeaGenerationError('No ideas'), BadGatewayException],
    [
      new DocumentBusyError('Document fractions_class_5.tex is busy'),
      ConflictException,
    ],
    [
      new QuestionPaperError('Topic and level must not be empty'),
      BadRequestException,
    ],
  ])('maps %p from a generation run', async (error, expected) => {
    service.generate.mockRejectedValue(error);

    await expect(
      controller.generate({ topic: 'Fractions', level: 'Class 5' }),
    ).rejects.toBeInstanceOf(expected);
  });

  it.each([
    [
      new MetadataNotFoundError('Metadata file not found: missing.json'),
      NotFoundException,
    ],
    [
      new InvalidMetadataError('Metadata contains no questions'),
      BadRequestException,
    ],
  ])('maps %p from a render run', async (error, expected) => {
    service.render.mockRejectedValue(error);

    await expect(
      controller.render({ metadataPath: 'missing.json' }),
    ).rejects.toBeInstanceOf(expected);
  });

  it('rethrows errors it does not know', async () => {
    const failure = new Error('disk full');
    service.render.mockRejectedValue(failure);

    await expect(
      controller.render({ metadataPath: 'paper.json' }),
    ).rejects.toBe(failure);
  });
});

describe('QuestionPaperController render paths', () => {
  const { QUESTION_PAPER_OUTPUT_DIR } = process.env;
  let controller: QuestionPaperController;
  let outputDir: string;
  let outsideDir: string;

  beforeEach(async () => {
    delete process.env.QUESTION_PAPER_OUTPUT_DIR;
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'render-paths-'));
    outsideDir = await fs.mkdtemp(path.join(os.tmpdir(), 'render-outside-'));
    const { moduleRef } = await createQuestionPaperTestbed({
      QUESTION_PAPER_OUTPUT_DIR: outputDir,
    });
    controller = new QuestionPaperController(
      moduleRef.get(QuestionPaperService),
    );
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
    await fs.rm(outsideDir, { recursive: true, force: true });
  });

  afterAll(() => {
    if (QUESTION_PAPER_OUTPUT_DIR !== undefined) {
      process.env.QUESTION_PAPER_OUTPUT_DIR = QUESTION_PAPER_OUTPUT_DIR;
    }
  });

  async function renderFailure(metadataPath: string): Promise<unknown> {
    try {
      await controller.render({ metadataPath });
    } catch (error) {
      return error;
    }
    throw new Error(`render of ${metadataPath} did not fail`);
  }

  it('renders a metadata file named relative to the output directory', async () => {
    await new MetadataStoreService().write(
      path.join(outputDir, 'fractions_class_5.json'),
      { questions: [buildQuestion()], answerKey: [['Q01', 'D']] },
      { topic: 'Fractions', level: 'Class 5' },
    );

    const report = await controller.render({
      metadataPath: 'fractions_class_5.json',
    });

    expect(report.documentPath).toBe(
      path.join(outputDir, 'fractions_class_5.tex'),
    );
    expect(report.produced).toBe(1);
  });

  it.each([
    ['an absolute path elsewhere', () => path.join(outsideDir, 'credentials')],
    ['a relative path that climbs out', () => '../credentials'],
    ['the output directory itself', () => '.'],
  ])('refuses %s without reading it', async (_label, metadataPath) => {
    await fs.writeFile(
      path.join(outsideDir, 'credentials'),
      'DB_PASSWORD=placeholder',
      'utf8',
    );

    const error = await renderFailure(metadataPath());

    expect(error).toBeInstanceOf(BadRequestException);
    expect(error).toHaveProperty(
      'message',
      'Metadata path must point to a file inside the output directory',
    );
  });

  it('does not echo the content of a file that is not JSON', async () => {
    await fs.writeFile(
      path.join(outputDir, 'notes.json'),
      'DB_PASSWORD=placeholder',
      'utf8',
    );

    const error = await renderFailure('notes.json');

    expect(error).toBeInstanceOf(BadRequestException);
    expect(error).toHaveProperty('message', 'Metadata file is not valid JSON');
  });
});
