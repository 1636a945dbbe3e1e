import {
  BadGatewayException,
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  HttpCode,
  NotFoundException,
  Post,
} from '@nestjs/common';
import {
  DocumentBusyError,
  IdeaGenerationError,
  InvalidMetadataError,
  MetadataNotFoundError,
  QuestionPaperError,
} from '../common/errors';
import { CreateQuestionPaperDto } from './dto/create-question-paper.dto';
import { RenderQuestionPaperDto } from './dto/render-question-paper.dto';
import { QuestionPaperService } from './question-paper.service';
import type { RunReport } from './types/question.interface';

function toHttpException(error: unknown): unknown {
  if (error instanceof MetadataNotFoundError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof DocumentBusyError) {
    return new ConflictException(error.message);
  }
  if (error instanceof IdeaGenerationError) {
    return new BadGatewayException(error.message);
  }
  if (
    error instanceof InvalidMetadataError ||
    error instanceof QuestionPaperError
  ) {
    return new BadRequestException(error.message);
  }
  return error;
}

@Controller('question-papers')
export class QuestionPaperController {
  constructor(private readonly questionPaperService: QuestionPaperService) {}

  @Post()
  async generate(@Body() dto: CreateQuestionPaperDto): Promise<RunReport> {
    try {
      return await this.questionPaperService.generate(dto);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('render')
  @HttpCode(200)
  async render(@Body() dto: RenderQuestionPaperDto): Promise<RunReport> {
    try {
      return await this.questionPaperService.render({
        ...dto,
        metadataPath: this.questionPaperService.resolveStoredMetadataPath(
          dto.metadataPath,
        ),
      });
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
