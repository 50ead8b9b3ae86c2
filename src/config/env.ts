import dotenv from 'dotenv';

dotenv.config();

export type ReportSymbols = 'auto' | 'unicode' | 'ascii';

function opt(name: string, defaultValue: string = ''): string {
  return process.env[name] ?? defaultValue;
}

export interface EnvConfig {
  LOG_LEVEL: string;
  // Symbols used by the text report; 'auto' asks the terminal
  REPORT_SYMBOLS: string;
}

export const env: EnvConfig = {
  // Logging
  LOG_LEVEL: opt('LOG_LEVEL', 'WARN'),

  // Reporting
  REPORT_SYMBOLS: opt('REPORT_SYMBOLS', 'auto').toLowerCase()
};

export function isReportSymbols(value: string): value is ReportSymbols {
  return value === 'auto' || value === 'unicode' || value === 'ascii';
}
