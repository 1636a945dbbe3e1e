import { ConfigService } from '@nestjs/config';
import { Test, type TestingModule } from '@nestjs/testing';
import { DiagramPlannerService } from '../agents/diagram-planner.service';
import { IdeaSourceService } from '../agents/idea-source.service';
import { QuestionFramerService } from '../agents/question-framer.service';
import { QuestionValidatorService } from '../agents/question-validator.service';
import { GeneratorService } from '../generator/generator.service';
import { ImageGeneratorService } from '../generator/image-generator.service';
import { MetadataStoreService } from '../metadata/metadata-store.service';
import { QuestionPaperService } from '../question-paper.service';
import { DocumentWriterService } from '../writer/document-writer.service';
import { FakeGenerator, FakeImageGenerator } from './fake-generator';

export interface QuestionPaperTestbed {
  moduleRef: TestingModule;
  generator: FakeGenerator;
  images: FakeImageGenerator;
}

/**
 * The question-paper providers with both model collaborators replaced
 * by in-process fakes.
 */
export async function createQuestionPaperTestbed(
  config: Record<string, unknown> = {},
): Promise<QuestionPaperTestbed> {
  const generator = new FakeGenerator();
  const images = new FakeImageGenerator();

  const moduleRef = await Test.createTestingModule({
    providers: [
      { provide: ConfigService, useValue: new ConfigService(config) },
      GeneratorService,
      ImageGeneratorService,
      IdeaSourceService,
      QuestionFramerService,
      QuestionValidatorService,
      DiagramPlannerService,
      DocumentWriterService,
      MetadataStoreService,
      QuestionPaperService,
    ],
  })
    .overrideProvider(GeneratorService)
    .useValue(generator)
    .overrideProvider(ImageGeneratorService)
    .useValue(images)
    .compile();

  return { moduleRef, generator, images };
}
