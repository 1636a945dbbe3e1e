import { Injectable, Logger } from '@nestjs/common';
import { toErrorMessage } from '../../common/errors';
import { GeneratorService } from '../generator/generator.service';
import { buildIdeaMessages } from '../generator/prompts';
import type { QuestionPaperContext } from '../types/question.interface';
import { coerceString, isRecord } from './question-normalizer';

@Injectable()
export class IdeaSourceService {
  private readonly logger = new Logger(IdeaSourceService.name);

  constructor(private readonly generator: GeneratorService) {}

  /**
   * Asks the model for question ideas. Returns an empty list when the
   * stage fails; deciding whether that is fatal is up to the caller.
   */
  async generateIdeas(context: QuestionPaperContext): Promise<string[]> {
    let payload: unknown;
    try {
      payload = await this.generator.generateJson(
        'ideas',
        buildIdeaMessages(context),
      );
    } catch (error) {
      this.logger.error(`Idea generation failed: ${toErrorMessage(error)}`);
      return [];
    }

    if (!isRecord(payload) || !Array.isArray(payload.ideas)) {
      this.logger.error('Idea generation returned no "ideas" array');
      return [];
    }

    const ideas = payload.ideas
      .map((idea) => coerceString(idea))
      .filter((idea): idea is string => idea !== null);

    const unique = Array.from(new Set(ideas));
    if (unique.length < ideas.length) {
      this.logger.warn(
        `Dropped ${ideas.length - unique.length} duplicate ideas ` +
          `(${unique.length} left)`,
      );
    }
    return unique;
  }
}
