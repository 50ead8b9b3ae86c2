// Decide whether the terminal can show the Unicode report symbols
import { SymbolStyle } from '../types/compliance';
import type { ReportSymbols } from '../config/env';

export interface TerminalInfo {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
}

const UTF8_RE = /utf-?8/i;

export function currentTerminal(): TerminalInfo {
  return { platform: process.platform, env: process.env };
}

export function detectSymbolStyle(terminal: TerminalInfo = currentTerminal()): SymbolStyle {
  const { platform, env } = terminal;

  if (platform === 'win32') {
    // Legacy conhost mangles ✓/✗; Windows Terminal and VS Code do not
    return env.WT_SESSION || env.TERM_PROGRAM === 'vscode'
      ? SymbolStyle.UNICODE
      : SymbolStyle.ASCII;
  }

  const locale = env.LC_ALL || env.LC_CTYPE || env.LANG;
  if (locale && !UTF8_RE.test(locale)) {
    return SymbolStyle.ASCII;
  }

  return SymbolStyle.UNICODE;
}

/**
 * Explicit flag first, then REPORT_SYMBOLS, then detection
 */
export function resolveSymbolStyle(
  flag: SymbolStyle | undefined,
  configured: ReportSymbols,
  terminal: TerminalInfo = currentTerminal()
): SymbolStyle {
  if (flag) return flag;
  if (configured === 'unicode') return SymbolStyle.UNICODE;
  if (configured === 'ascii') return SymbolStyle.ASCII;
  return detectSymbolStyle(terminal);
}
