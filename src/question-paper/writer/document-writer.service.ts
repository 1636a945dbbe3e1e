import { Injectable, Logger } from '@nestjs/common';
import fs from 'fs/promises';
import path from 'path';
import { DocumentBusyError } from '../../common/errors';
import type { QuestionPaperContext } from '../types/question.interface';
import { LatexDocumentWriter } from './latex-document.writer';

const WORKSHEET_STYLE_PATH = path.resolve(
  __dirname,
  '../../../templates/worksheet.sty',
);

export interface QuestionPaperPaths {
  outputDir: string;
  documentPath: string;
  metadataPath: string;
  imagesDir: string;
}

function slug(value: string): string {
  const cleaned = value
    .toLowerCase()
    .replace(/,/g, '')
    .replace(/[\s-]+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
  return cleaned || 'untitled';
}

/**
 * `Congruence of Triangles, Area` + `Class 7` becomes
 * `congruence_of_triangles_area_class_7`.
 */
export function baseFilename(context: QuestionPaperContext): string {
  return `${slug(context.topic)}_${slug(context.level)}`;
}

export function resolvePaths(
  outputDir: string,
  context: QuestionPaperContext,
): QuestionPaperPaths {
  const base = baseFilename(context);
  return {
    outputDir,
    documentPath: path.join(outputDir, `${base}.tex`),
    metadataPath: path.join(outputDir, `${base}.json`),
    imagesDir: path.join(outputDir, 'images'),
  };
}

@Injectable()
export class DocumentWriterService {
  // Shared by every instance: two writers on one file corrupt it.
  private static readonly activeDocuments = new Set<string>();

  private readonly logger = new Logger(DocumentWriterService.name);

  /**
   * Creates the output directory, places `worksheet.sty` beside the
   * document and starts a fresh document, replacing any earlier one.
   * The document stays claimed until `release` is called with its path.
   */
  async open(
    paths: QuestionPaperPaths,
    context: QuestionPaperContext,
  ): Promise<LatexDocumentWriter> {
    const key = path.resolve(paths.documentPath);
    if (DocumentWriterService.activeDocuments.has(key)) {
      throw new DocumentBusyError(
        `Document ${paths.documentPath} is being written by another run`,
      );
    }
    DocumentWriterService.activeDocuments.add(key);

    try {
      await fs.mkdir(paths.outputDir, { recursive: true });
      await fs.copyFile(
        WORKSHEET_STYLE_PATH,
        path.join(paths.outputDir, 'worksheet.sty'),
      );

      const writer = await LatexDocumentWriter.create(
        paths.documentPath,
        context,
      );
      this.logger.log(`Initialized document ${paths.documentPath}`);
      return writer;
    } catch (error) {
      DocumentWriterService.activeDocuments.delete(key);
      throw error;
    }
  }

  release(documentPath: string): void {
    DocumentWriterService.activeDocuments.delete(path.resolve(documentPath));
  }
}
