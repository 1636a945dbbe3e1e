export class QuestionPaperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised by the generator when a model call fails in transport, returns
 * nothing, or returns something that is not JSON.
 */
export class GeneratorError extends QuestionPaperError {}

/** The idea stage produced no ideas, so the run has nothing to process. */
export class IdeaGenerationError extends QuestionPaperError {}

export class InvalidMetadataError extends QuestionPaperError {}

export class MetadataNotFoundError extends QuestionPaperError {}

/** Another run is still writing the document at the same path. */
export class DocumentBusyError extends QuestionPaperError {}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
