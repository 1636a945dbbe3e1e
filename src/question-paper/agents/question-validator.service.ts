import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toErrorMessage } from '../../common/errors';
import { GeneratorService } from '../generator/generator.service';
import { buildValidationMessages } from '../generator/prompts';
import type {
  Question,
  QuestionPaperContext,
  ValidationResult,
} from '../types/question.interface';
import { applyCorrection, coerceString, isRecord } from './question-normalizer';

export type ValidationOutcome =
  | { status: 'validated'; question: Question; attempts: number }
  | { status: 'discarded'; attempts: number; feedback: string };

const DEFAULT_MAX_ATTEMPTS = 5;

@Injectable()
export class QuestionValidatorService {
  private readonly logger = new Logger(QuestionValidatorService.name);
  readonly maxAttempts: number;

  constructor(
    private readonly generator: GeneratorService,
    private readonly configService: ConfigService,
  ) {
    this.maxAttempts =
      this.configService.get<number>('VALIDATION_MAX_ATTEMPTS') ??
      DEFAULT_MAX_ATTEMPTS;
  }

  /**
   * One review of the candidate. A generator failure is an invalid
   * result without a correction.
   */
  async validate(
    question: Question,
    context: QuestionPaperContext,
    previousFeedback?: string,
  ): Promise<ValidationResult> {
    let payload: unknown;
    try {
      payload = await this.generator.generateJson(
        'validation',
        buildValidationMessages(question, context, previousFeedback),
      );
    } catch (error) {
      return { isValid: false, feedback: toErrorMessage(error) };
    }

    if (!isRecord(payload) || typeof payload.is_valid !== 'boolean') {
      return {
        isValid: false,
        feedback: 'Validator response had no "is_valid" flag',
      };
    }

    const feedback = coerceString(payload.feedback) ?? '';
    if (payload.is_valid) {
      return { isValid: true, feedback };
    }

    const corrections = payload.suggested_corrections;
    const correctedQuestion = isRecord(corrections)
      ? applyCorrection(question, corrections)
      : null;

    return correctedQuestion
      ? { isValid: false, feedback, correctedQuestion }
      : { isValid: false, feedback };
  }

  /**
   * Validates up to `maxAttempts` times. A correction replaces the
   * candidate for the next attempt; without one the same candidate goes
   * back with the last feedback.
   */
  async validateWithRetries(
    question: Question,
    context: QuestionPaperContext,
  ): Promise<ValidationOutcome> {
    let candidate = question;
    let feedback: string | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const result = await this.validate(candidate, context, feedback);

      if (result.isValid) {
        return { status: 'validated', question: candidate, attempts: attempt };
      }

      feedback = result.feedback;
      this.logger.warn(
        `${candidate.id} failed validation (attempt ${attempt}/${this.maxAttempts}): ${feedback.slice(0, 80)}`,
      );

      if (result.correctedQuestion) {
        candidate = result.correctedQuestion;
      }
    }

    return {
      status: 'discarded',
      attempts: this.maxAttempts,
      feedback: feedback ?? '',
    };
  }
}
