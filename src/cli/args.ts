import { parseArgs } from 'util';
import { SymbolStyle } from '../types/compliance';
import { ValidationError } from '../utils/errors';

export type OutputFormat = 'text' | 'slack';

interface CommonOptions {
  title: string;
  symbolStyle?: SymbolStyle;
  format: OutputFormat;
}

export type CliCommand =
  | ({ kind: 'commit' } & CommonOptions)
  | ({ kind: 'mr'; description?: string; descriptionFile?: string } & CommonOptions)
  | { kind: 'help' };

export const USAGE = `Usage:
  git-compliance commit <title> [options]
  git-compliance mr <title> [--description <text> | --description-file <path>] [options]

Options:
  -d, --description <text>     Merge request description to scan for links
      --description-file <path>
                               Read the description from a file
      --ascii                  Use [OK]/[X] instead of Unicode symbols
      --unicode                Force Unicode symbols
      --format <text|slack>    Output a text report or Slack blocks as JSON
  -h, --help                   Show this help`;

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'slack';
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        description: { type: 'string', short: 'd' },
        'description-file': { type: 'string' },
        ascii: { type: 'boolean' },
        unicode: { type: 'boolean' },
        format: { type: 'string' },
        help: { type: 'boolean', short: 'h' }
      }
    });
  } catch (error) {
    // Unknown options and missing option values
    throw new ValidationError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseRawArgs(argv);

  if (values.help) {
    return { kind: 'help' };
  }

  const [command, ...titleParts] = positionals;
  if (!command) {
    throw new ValidationError('Missing command: expected "commit" or "mr"');
  }
  if (command !== 'commit' && command !== 'mr') {
    throw new ValidationError(`Unknown command: ${command}`);
  }
  if (titleParts.length === 0) {
    throw new ValidationError('Missing title');
  }

  if (values.ascii && values.unicode) {
    throw new ValidationError('--ascii and --unicode cannot be combined');
  }
  const symbolStyle = values.ascii
    ? SymbolStyle.ASCII
    : values.unicode ? SymbolStyle.UNICODE : undefined;

  const format = values.format ?? 'text';
  if (!isOutputFormat(format)) {
    throw new ValidationError(`Unknown format: ${format} (expected text or slack)`);
  }

  const common: CommonOptions = {
    title: titleParts.join(' '),
    format,
    ...(symbolStyle ? { symbolStyle } : {})
  };

  if (command === 'commit') {
    if (values.description !== undefined || values['description-file'] !== undefined) {
      throw new ValidationError('Descriptions are only accepted by the "mr" command');
    }
    return { kind: 'commit', ...common };
  }

  if (values.description !== undefined && values['description-file'] !== undefined) {
    throw new ValidationError('Use either --description or --description-file, not both');
  }

  return {
    kind: 'mr',
    ...common,
    ...(values.description !== undefined ? { description: values.description } : {}),
    ...(values['description-file'] !== undefined ? { descriptionFile: values['description-file'] } : {})
  };
}
