import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { GeneratorError, toErrorMessage } from '../../common/errors';

export type GenerationStage = 'ideas' | 'framing' | 'validation' | 'diagram';

const STAGE_TEMPERATURE: Record<GenerationStage, number> = {
  ideas: 0.9,
  framing: 0.7,
  validation: 0.2,
  diagram: 0.3,
};

/**
 * Strips the code fences some models wrap around JSON even in JSON mode,
 * then parses what is left.
 */
export function parseJsonContent(content: string): unknown {
  const cleaned = content.replace(/```json|```/gi, '').trim();
  if (!cleaned) {
    throw new GeneratorError('Model response was empty');
  }

  try {
    return JSON.parse(cleaned) as unknown;
  } catch (error) {
    throw new GeneratorError(
      `Model response is not valid JSON: ${toErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Some newer models (the gpt-5 family) only accept the default
 * temperature, so the parameter is left out for them.
 */
export function shouldUseCustomTemperature(model: string | undefined): boolean {
  if (!model) return true;
  return !model.toLowerCase().startsWith('gpt-5');
}

@Injectable()
export class GeneratorService {
  private readonly logger = new Logger(GeneratorService.name);
  private readonly openai?: OpenAI;
  private readonly model: string;

  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    this.model =
      this.configService.get<string>('OPENAI_MODEL') ?? 'gpt-4o-mini';

    if (apiKey) {
      this.openai = new OpenAI({ apiKey });
      this.logger.log(`Generator enabled with model "${this.model}"`);
    } else {
      this.logger.warn(
        'OPENAI_API_KEY is missing. Every generation stage will fail until it is set.',
      );
    }
  }

  /**
   * Sends one stage's prompt and returns the parsed JSON value of the
   * reply. Throws {@link GeneratorError} on every failure mode.
   */
  async generateJson(
    stage: GenerationStage,
    messages: ChatCompletionMessageParam[],
  ): Promise<unknown> {
    if (!this.openai) {
      throw new GeneratorError('Generator is not configured (OPENAI_API_KEY)');
    }

    const baseParams: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages,
      response_format: { type: 'json_object' },
    };
    const params = shouldUseCustomTemperature(this.model)
      ? { ...baseParams, temperature: STAGE_TEMPERATURE[stage] }
      : baseParams;

    let content: string | null | undefined;
    try {
      const completion = await this.openai.chat.completions.create(params);
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw new GeneratorError(
        `${stage} request failed: ${toErrorMessage(error)}`,
        { cause: error },
      );
    }

    if (!content) {
      throw new GeneratorError(`${stage} response had no content`);
    }

    this.logger.debug(`${stage} response: ${content.slice(0, 200)}`);
    return parseJsonContent(content);
  }
}
