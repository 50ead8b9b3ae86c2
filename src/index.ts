#!/usr/bin/env node
import { env, isReportSymbols } from './config/env';
import { validateEnvironment } from './config/validateEnv';
import { USAGE } from './cli/args';
import { ExitCode, defaultIo, runCli } from './cli/run';
import { ValidationError, formatErrorMessage } from './utils/errors';
import { logger, parseLogLevel } from './utils/logger';

function fail(error: unknown, showUsage: boolean): void {
  logger.debug('git-compliance failed', { error: formatErrorMessage(error) });
  console.error(formatErrorMessage(error));
  if (showUsage) {
    console.error(`\n${USAGE}`);
  }
  process.exitCode = ExitCode.USAGE_ERROR;
}

function main(): void {
  logger.setLevel(parseLogLevel(env.LOG_LEVEL));

  try {
    // Validate environment first (fail fast)
    validateEnvironment();
  } catch (error) {
    fail(error, false);
    return;
  }

  const reportSymbols = isReportSymbols(env.REPORT_SYMBOLS) ? env.REPORT_SYMBOLS : 'auto';

  try {
    process.exitCode = runCli(process.argv.slice(2), defaultIo(reportSymbols));
  } catch (error) {
    fail(error, error instanceof ValidationError);
  }
}

main();
