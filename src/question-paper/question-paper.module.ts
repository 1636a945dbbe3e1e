import { Module } from '@nestjs/common';
import { DiagramPlannerService } from './agents/diagram-planner.service';
import { IdeaSourceService } from './agents/idea-source.service';
import { QuestionFramerService } from './agents/question-framer.service';
import { QuestionValidatorService } from './agents/question-validator.service';
import { GeneratorService } from './generator/generator.service';
import { ImageGeneratorService } from './generator/image-generator.service';
import { MetadataStoreService } from './metadata/metadata-store.service';
import { QuestionPaperController } from './question-paper.controller';
import { QuestionPaperService } from './question-paper.service';
import { DocumentWriterService } from './writer/document-writer.service';

@Module({
  controllers: [QuestionPaperController],
  providers: [
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
  exports: [QuestionPaperService],
})
export class QuestionPaperModule {}
