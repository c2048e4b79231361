import { validateSync } from 'class-validator';
import { parseArgs } from 'util';
import { BatchOptionsDto } from '../batch/dto/batch-options.dto';

export const USAGE = [
  'Usage: video-metadata [--input <dir>] [--output <file>]',
  '',
  '  --input <dir>    directory of video files to scan',
  '  --output <file>  CSV file to write',
  '  -h, --help       show this help',
].join('\n');

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; options: BatchOptionsDto };

export function parseCliArgs(
  argv: string[],
  defaults: { input: string; output: string },
): CliCommand {
  let values: { input?: string; output?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        input: { type: 'string' },
        output: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  if (values.help) {
    return { kind: 'help' };
  }

  const options = new BatchOptionsDto();
  options.input = values.input ?? defaults.input;
  options.output = values.output ?? defaults.output;

  const errors = validateSync(options);
  if (errors.length > 0) {
    const messages = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new CliUsageError(messages.join('; '));
  }

  return { kind: 'run', options };
}
