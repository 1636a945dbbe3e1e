import { Injectable, Logger } from '@nestjs/common';
import path from 'path';
import { toErrorMessage } from '../../common/errors';
import { GeneratorService } from '../generator/generator.service';
import { ImageGeneratorService } from '../generator/image-generator.service';
import { buildDiagramMessages } from '../generator/prompts';
import type {
  Question,
  QuestionPaperContext,
} from '../types/question.interface';
import { coerceString, isRecord } from './question-normalizer';

export interface DiagramTarget {
  /** Directory of the document; image paths are stored relative to it. */
  documentDir: string;
  imagesDir: string;
}

type DiagramPlan =
  | { kind: 'vector'; code: string }
  | { kind: 'raster'; description: string }
  | { kind: 'none' };

@Injectable()
export class DiagramPlannerService {
  private readonly logger = new Logger(DiagramPlannerService.name);

  constructor(
    private readonly generator: GeneratorService,
    private readonly imageGenerator: ImageGeneratorService,
  ) {}

  /**
   * Attaches `diagramCode` or `imagePath` to a question that needs a
   * figure. Every failure leaves the question as it was.
   */
  async attachDiagram(
    question: Question,
    context: QuestionPaperContext,
    target: DiagramTarget,
  ): Promise<Question> {
    if (!question.needsDiagram) {
      return question;
    }

    const plan = await this.planDiagram(question, context);

    if (plan.kind === 'vector') {
      return { ...question, diagramCode: plan.code };
    }

    if (plan.kind === 'raster') {
      try {
        const imagePath = await this.imageGenerator.generate({
          description: plan.description,
          fileStem: `diagram_${question.id.toLowerCase()}`,
          imagesDir: target.imagesDir,
        });
        const relative = path
          .relative(target.documentDir, imagePath)
          .split(path.sep)
          .join('/');
        return { ...question, imagePath: relative };
      } catch (error) {
        this.logger.error(
          `Image generation failed for ${question.id}: ${toErrorMessage(error)}`,
        );
      }
    }

    this.logger.warn(`${question.id} is kept without a diagram`);
    return question;
  }

  private async planDiagram(
    question: Question,
    context: QuestionPaperContext,
  ): Promise<DiagramPlan> {
    let payload: unknown;
    try {
      payload = await this.generator.generateJson(
        'diagram',
        buildDiagramMessages(question, context),
      );
    } catch (error) {
      this.logger.error(
        `Diagram generation failed for ${question.id}: ${toErrorMessage(error)}`,
      );
      return { kind: 'none' };
    }

    if (!isRecord(payload)) {
      this.logger.error(`Diagram response for ${question.id} is not an object`);
      return { kind: 'none' };
    }

    if (payload.too_complex === true) {
      return {
        kind: 'raster',
        description: coerceString(payload.description) ?? question.text,
      };
    }

    const code = coerceString(payload.diagram_code);
    return code ? { kind: 'vector', code } : { kind: 'none' };
  }
}
