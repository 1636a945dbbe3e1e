#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import {
  type CliCommand,
  CliUsageError,
  USAGE,
  parseArguments,
} from './cli/parse-arguments';
import { QuestionPaperService } from './question-paper/question-paper.service';

async function run(): Promise<void> {
  const logger = new Logger('Cli');

  let command: CliCommand;
  try {
    command = parseArguments(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      logger.error(error.message);
      process.stderr.write(`${USAGE}\n`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (command.mode === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(logger);

  try {
    const questionPapers = app.get(QuestionPaperService);
    const report =
      command.mode === 'render'
        ? await questionPapers.render(command.options)
        : await questionPapers.generate(command.options);

    logger.log(
      `Processed ${report.produced} questions. Compile with: pdflatex ${report.documentPath}`,
    );
  } finally {
    await app.close();
  }
}

run().catch((error: unknown) => {
  const logger = new Logger('Cli');
  const stack =
    error instanceof Error ? (error.stack ?? error.message) : String(error);
  logger.error('Question paper generation failed', stack);
  process.exit(1);
});
