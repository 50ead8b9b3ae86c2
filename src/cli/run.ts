import { readFileSync } from 'fs';
import { USAGE, parseCliArgs } from './args';
import type { CliCommand } from './args';
import { ComplianceService, complianceService } from '../services/complianceService';
import { buildComplianceBlocks } from '../slack/blocks';
import type { ReportSymbols } from '../config/env';
import { currentTerminal, resolveSymbolStyle } from '../utils/terminal';
import type { TerminalInfo } from '../utils/terminal';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

export enum ExitCode {
  COMPLIANT = 0,
  NON_COMPLIANT = 1,
  USAGE_ERROR = 2
}

export interface CliIo {
  write: (text: string) => void;
  readFile: (path: string) => string;
  terminal: TerminalInfo;
  reportSymbols: ReportSymbols;
  service?: ComplianceService;
}

export function defaultIo(reportSymbols: ReportSymbols): CliIo {
  return {
    write: (text) => { process.stdout.write(`${text}\n`); },
    readFile: (path) => readFileSync(path, 'utf8'),
    terminal: currentTerminal(),
    reportSymbols
  };
}

function loadDescription(command: Extract<CliCommand, { kind: 'mr' }>, io: CliIo): string | undefined {
  if (command.descriptionFile === undefined) {
    return command.description;
  }
  try {
    return io.readFile(command.descriptionFile);
  } catch (error) {
    logger.debug('Reading description file failed', {
      path: command.descriptionFile,
      reason: error instanceof Error ? error.message : String(error)
    });
    throw new AppError(`Cannot read description file: ${command.descriptionFile}`, 400, 'DESCRIPTION_FILE');
  }
}

/**
 * Run one CLI invocation and return the process exit code.
 * Usage and I/O errors are thrown for the caller to report.
 */
export function runCli(argv: string[], io: CliIo): ExitCode {
  const command = parseCliArgs(argv);
  const service = io.service ?? complianceService;

  if (command.kind === 'help') {
    io.write(USAGE);
    return ExitCode.COMPLIANT;
  }

  const description = command.kind === 'mr' ? loadDescription(command, io) : undefined;
  const { compliance, links } = command.kind === 'mr'
    ? service.checkMergeRequest(command.title, description)
    : { compliance: service.checkCommit(command.title), links: undefined };

  logger.info('Title checked', { kind: command.kind, status: compliance.status, hasLinks: Boolean(links) });

  if (command.format === 'slack') {
    const blocks = buildComplianceBlocks({
      title: command.title,
      compliance,
      ...(links ? { links } : {})
    });
    io.write(JSON.stringify({ blocks }, null, 2));
  } else {
    const symbolStyle = resolveSymbolStyle(command.symbolStyle, io.reportSymbols, io.terminal);
    io.write(service.formatReport(compliance, symbolStyle));
    if (links) {
      io.write('');
      io.write(service.formatLinks(links));
    }
  }

  return compliance.isValid ? ExitCode.COMPLIANT : ExitCode.NON_COMPLIANT;
}
