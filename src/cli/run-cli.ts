import { INestApplicationContext, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { BatchRunnerService } from '../batch/batch-runner.service';
import { extractionConfig } from '../settings/dotenv-options';
import { CliUsageError, parseCliArgs, USAGE } from './parse-cli-args';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const logger = new Logger('VideoMetadata');

export type ContextFactory = () => Promise<INestApplicationContext>;

export const createAppContext: ContextFactory = () =>
  NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });

/**
 * Runs one batch from command-line arguments and resolves to the process exit
 * status. A missing input directory is not a failure status.
 */
export async function runCli(
  argv: string[],
  createContext: ContextFactory = createAppContext,
): Promise<number> {
  try {
    const app = await createContext();
    try {
      const config = app.get(ConfigService);
      const command = parseCliArgs(argv, {
        input: extractionConfig.inputDir(config),
        output: extractionConfig.outputPath(config),
      });

      if (command.kind === 'help') {
        process.stdout.write(`${USAGE}\n`);
        return EXIT_OK;
      }

      await app
        .get(BatchRunnerService)
        .run(command.options.input, command.options.output);
      return EXIT_OK;
    } finally {
      await app.close();
    }
  } catch (err) {
    if (err instanceof CliUsageError) {
      logger.error(err.message);
      process.stderr.write(`${USAGE}\n`);
      return EXIT_USAGE;
    }
    logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
    return EXIT_FAILURE;
  }
}
