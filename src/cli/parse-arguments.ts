import { plainToInstance } from 'class-transformer';
import { validateSync, type ValidationError } from 'class-validator';
import { QuestionPaperError } from '../common/errors';
import { CreateQuestionPaperDto } from '../question-paper/dto/create-question-paper.dto';
import { RenderQuestionPaperDto } from '../question-paper/dto/render-question-paper.dto';
import type {
  GenerateQuestionPaperOptions,
  RenderQuestionPaperOptions,
} from '../question-paper/question-paper.service';

export const USAGE = `Usage: question-paper <topic> <level> [options]

Options:
  --count <n>          Number of questions to produce (default: QUESTION_TARGET_COUNT or 25)
  --from-json <path>   Re-render the document from an existing metadata file; topic and level become optional overrides
  --output-dir <dir>   Directory for the document, metadata and images
  -h, --help           Show this message`;

export type CliCommand =
  | { mode: 'generate'; options: GenerateQuestionPaperOptions }
  | { mode: 'render'; options: RenderQuestionPaperOptions }
  | { mode: 'help' };

export class CliUsageError extends QuestionPaperError {}

function describeErrors(errors: ValidationError[]): string {
  return errors
    .flatMap((error) => Object.values(error.constraints ?? {}))
    .join('; ');
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} needs a value`);
  }
  return value;
}

export function parseArguments(args: string[]): CliCommand {
  const positionals: string[] = [];
  let count: string | undefined;
  let fromJson: string | undefined;
  let outputDir: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        return { mode: 'help' };
      case '--count':
        count = takeValue(args, i, arg);
        i++;
        break;
      case '--from-json':
        fromJson = takeValue(args, i, arg);
        i++;
        break;
      case '--output-dir':
        outputDir = takeValue(args, i, arg);
        i++;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new CliUsageError(`Unknown option ${arg}`);
        }
        positionals.push(arg);
    }
  }

  if (positionals.length > 2) {
    throw new CliUsageError(
      `Expected at most a topic and a level, got ${positionals.length} arguments`,
    );
  }
  const [topic, level] = positionals;

  if (fromJson !== undefined) {
    const dto = plainToInstance(RenderQuestionPaperDto, {
      metadataPath: fromJson,
      topic,
      level,
    });
    const errors = validateSync(dto);
    if (errors.length > 0) {
      throw new CliUsageError(describeErrors(errors));
    }
    return {
      mode: 'render',
      options: {
        metadataPath: dto.metadataPath,
        topic: dto.topic,
        level: dto.level,
        outputDir,
      },
    };
  }

  const dto = plainToInstance(CreateQuestionPaperDto, { topic, level, count });
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new CliUsageError(describeErrors(errors));
  }

  return {
    mode: 'generate',
    options: {
      topic: dto.topic,
      level: dto.level,
      count: dto.count,
      outputDir,
    },
  };
}
