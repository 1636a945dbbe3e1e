import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import path from 'path';
import { IdeaGenerationError, QuestionPaperError } from '../common/errors';
import { DiagramPlannerService } from './agents/diagram-planner.service';
import { IdeaSourceService } from './agents/idea-source.service';
import { QuestionFramerService } from './agents/question-framer.service';
import { QuestionValidatorService } from './agents/question-validator.service';
import {
  DEFAULT_DIFFICULTY_RATIOS,
  type DifficultyRatios,
  planDifficulties,
  questionId,
} from './difficulty-plan';
import { MetadataStoreService } from './metadata/metadata-store.service';
import type {
  Question,
  QuestionDifficulty,
  QuestionPaperContext,
  RunReport,
} from './types/question.interface';
import {
  DocumentWriterService,
  type QuestionPaperPaths,
  resolvePaths,
} from './writer/document-writer.service';

export interface GenerateQuestionPaperOptions {
  topic: string;
  level: string;
  count?: number;
  outputDir?: string;
}

export interface RenderQuestionPaperOptions {
  metadataPath: string;
  topic?: string;
  level?: string;
  outputDir?: string;
}

export const MAX_TARGET_COUNT = 100;

type IdeaOutcome =
  | { status: 'written'; question: Question }
  | { status: 'discarded'; stage: 'framing' | 'validation' };

@Injectable()
export class QuestionPaperService {
  private readonly logger = new Logger(QuestionPaperService.name);
  private readonly defaultTarget: number;
  private readonly defaultOutputDir: string;
  private readonly ratios: DifficultyRatios;

  constructor(
    private readonly configService: ConfigService,
    private readonly ideaSource: IdeaSourceService,
    private readonly framer: QuestionFramerService,
    private readonly validator: QuestionValidatorService,
    private readonly diagramPlanner: DiagramPlannerService,
    private readonly documentWriter: DocumentWriterService,
    private readonly metadataStore: MetadataStoreService,
  ) {
    this.defaultTarget =
      this.configService.get<number>('QUESTION_TARGET_COUNT') ?? 25;
    this.defaultOutputDir =
      this.configService.get<string>('QUESTION_PAPER_OUTPUT_DIR') ??
      'question_paper';
    this.ratios = {
      basic:
        this.configService.get<number>('DIFFICULTY_BASIC_RATIO') ??
        DEFAULT_DIFFICULTY_RATIOS.basic,
      intermediate:
        this.configService.get<number>('DIFFICULTY_INTERMEDIATE_RATIO') ??
        DEFAULT_DIFFICULTY_RATIOS.intermediate,
    };
  }

  /**
   * Runs the full pipeline until `count` questions are written or the
   * ideas run out. Only an empty idea list aborts the run.
   */
  async generate(options: GenerateQuestionPaperOptions): Promise<RunReport> {
    const context = this.resolveContext(options.topic, options.level);
    const target = options.count ?? this.defaultTarget;
    if (
      !Number.isInteger(target) ||
      target < 1 ||
      target > MAX_TARGET_COUNT
    ) {
      throw new QuestionPaperError(
        `Question count must be an integer between 1 and ${MAX_TARGET_COUNT}`,
      );
    }

    this.logger.log(
      `Starting question paper for ${context.topic} - ${context.level} (target ${target})`,
    );

    const ideas = await this.ideaSource.generateIdeas(context);
    if (!ideas.length) {
      throw new IdeaGenerationError(
        `No question ideas were generated for "${context.topic}"`,
      );
    }
    this.logger.log(`Generated ${ideas.length} question ideas`);

    const paths = resolvePaths(
      options.outputDir ?? this.defaultOutputDir,
      context,
    );
    const writer = await this.documentWriter.open(paths, context);
    const difficulties = planDifficulties(target, this.ratios);
    const discarded = { framing: 0, validation: 0 };

    try {
      for (const idea of ideas) {
        if (writer.questionCount >= target) {
          break;
        }

        const position = writer.questionCount + 1;
        const outcome = await this.processIdea(
          idea,
          { id: questionId(position), difficulty: difficulties[position - 1] },
          context,
          paths,
        );

        if (outcome.status === 'discarded') {
          discarded[outcome.stage] += 1;
          continue;
        }

        await writer.append(outcome.question);
        this.logger.log(
          `Question ${writer.questionCount}/${target} written (${outcome.question.id})`,
        );
      }

      const record = writer.close();
      const produced = record.questions.length;
      const shortfall = target - produced;

      if (shortfall > 0) {
        this.logger.warn(
          `Ideas exhausted: produced ${produced} of ${target} questions ` +
            `(shortfall ${shortfall}; ${discarded.framing} discarded at ` +
            `framing, ${discarded.validation} at validation)`,
        );
      }

      await this.metadataStore.write(paths.metadataPath, record, context);
      this.logger.log(`Question paper complete: ${paths.documentPath}`);

      return {
        ...context,
        target,
        produced,
        shortfall,
        discarded,
        documentPath: paths.documentPath,
        metadataPath: paths.metadataPath,
        imagesDir: paths.imagesDir,
      };
    } finally {
      this.documentWriter.release(paths.documentPath);
    }
  }

  /**
   * Re-renders the document from a metadata file without any model call.
   * The same metadata always yields the same document bytes.
   */
  async render(options: RenderQuestionPaperOptions): Promise<RunReport> {
    this.logger.log(`Loading questions from ${options.metadataPath}`);
    const metadata = await this.metadataStore.read(options.metadataPath);
    const context: QuestionPaperContext = {
      topic: options.topic?.trim() || metadata.topic,
      level: options.level?.trim() || metadata.level,
    };

    const paths = resolvePaths(
      options.outputDir ?? this.defaultOutputDir,
      context,
    );
    const writer = await this.documentWriter.open(paths, context);

    try {
      for (const question of metadata.questions) {
        const hasDiagram = Boolean(question.diagramCode || question.imagePath);
        if (question.needsDiagram && !hasDiagram) {
          this.logger.warn(
            `${question.id} needs a diagram but none is stored; ` +
              'rendering without it',
          );
        }
        await writer.append(question);
      }

      const record = writer.close();
      this.logger.log(
        `Rendered ${record.questions.length} questions to ${paths.documentPath}`,
      );

      return {
        ...context,
        target: metadata.questions.length,
        produced: record.questions.length,
        shortfall: 0,
        discarded: { framing: 0, validation: 0 },
        documentPath: paths.documentPath,
      };
    } finally {
      this.documentWriter.release(paths.documentPath);
    }
  }

  /**
   * Resolves a metadata path sent by a remote caller against the
   * configured output directory. Paths outside that directory are refused.
   */
  resolveStoredMetadataPath(metadataPath: string): string {
    const root = path.resolve(this.defaultOutputDir);
    const resolved = path.resolve(root, metadataPath);
    const relative = path.relative(root, resolved);

    const escapes =
      relative === '..' ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative);
    if (!relative || escapes) {
      throw new QuestionPaperError(
        'Metadata path must point to a file inside the output directory',
      );
    }
    return resolved;
  }

  private async processIdea(
    idea: string,
    slot: { id: string; difficulty: QuestionDifficulty },
    context: QuestionPaperContext,
    paths: QuestionPaperPaths,
  ): Promise<IdeaOutcome> {
    const candidate = await this.framer.frameQuestion(
      { idea, ...slot },
      context,
    );
    if (!candidate) {
      this.logger.warn(
        `Discarded idea "${idea}": question could not be framed`,
      );
      return { status: 'discarded', stage: 'framing' };
    }

    const validation = await this.validator.validateWithRetries(
      candidate,
      context,
    );
    if (validation.status === 'discarded') {
      this.logger.warn(
        `Discarded ${candidate.id} for idea "${idea}" after ` +
          `${validation.attempts} failed validation attempts`,
      );
      return { status: 'discarded', stage: 'validation' };
    }

    const question = await this.diagramPlanner.attachDiagram(
      validation.question,
      context,
      { documentDir: paths.outputDir, imagesDir: paths.imagesDir },
    );
    return { status: 'written', question };
  }

  private resolveContext(topic: string, level: string): QuestionPaperContext {
    const context = { topic: topic.trim(), level: level.trim() };
    if (!context.topic || !context.level) {
      throw new QuestionPaperError('Topic and level must not be empty');
    }
    return context;
  }
}
