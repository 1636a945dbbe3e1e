import { Injectable, Logger } from '@nestjs/common';
import { toErrorMessage } from '../../common/errors';
import { GeneratorService } from '../generator/generator.service';
import { buildFramingMessages } from '../generator/prompts';
import type {
  Question,
  QuestionDifficulty,
  QuestionPaperContext,
} from '../types/question.interface';
import { isRecord, normalizeQuestion } from './question-normalizer';

export interface FramingRequest {
  idea: string;
  id: string;
  difficulty: QuestionDifficulty;
}

@Injectable()
export class QuestionFramerService {
  private readonly logger = new Logger(QuestionFramerService.name);

  constructor(private readonly generator: GeneratorService) {}

  /**
   * Frames one idea into a candidate question. `null` means the model
   * output was unusable and the idea is spent.
   */
  async frameQuestion(
    request: FramingRequest,
    context: QuestionPaperContext,
  ): Promise<Question | null> {
    let payload: unknown;
    try {
      payload = await this.generator.generateJson(
        'framing',
        buildFramingMessages(request.idea, context, request.difficulty),
      );
    } catch (error) {
      this.logger.warn(
        `Framing failed for "${request.idea}": ${toErrorMessage(error)}`,
      );
      return null;
    }

    const question = isRecord(payload)
      ? normalizeQuestion(payload, {
          id: request.id,
          difficulty: request.difficulty,
        })
      : null;

    if (!question) {
      this.logger.warn(`Malformed question for "${request.idea}"`);
    }
    return question;
  }
}
