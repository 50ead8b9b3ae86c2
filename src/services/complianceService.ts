// Compliance facade - title validation, link extraction and text reports
import { SymbolStyle } from '../types/compliance';
import type { ComplianceOutcome, ExtractedLinks, MergeRequestCheck } from '../types/compliance';
import { validateTitle } from '../utils/titleValidator';
import { extractLinks } from '../utils/linkExtractor';
import { logger } from '../utils/logger';

const SYMBOLS: Record<SymbolStyle, { ok: string; fail: string }> = {
  [SymbolStyle.UNICODE]: { ok: '✓', fail: '✗' },
  [SymbolStyle.ASCII]: { ok: '[OK]', fail: '[X]' }
};

export function statusSymbol(outcome: ComplianceOutcome, style: SymbolStyle): string {
  return outcome.isValid ? SYMBOLS[style].ok : SYMBOLS[style].fail;
}

export class ComplianceService {
  checkCommit(title: string): ComplianceOutcome {
    const compliance = validateTitle(title);
    logger.debug('Commit title checked', { title, status: compliance.status });
    return compliance;
  }

  /**
   * Links are only extracted when a description is supplied, so callers can
   * tell "no description" (links absent) from "no links found".
   */
  checkMergeRequest(title: string, description?: string | null): MergeRequestCheck {
    const compliance = validateTitle(title);
    logger.debug('Merge request title checked', { title, status: compliance.status });

    if (description === undefined || description === null) {
      return { compliance };
    }
    return { compliance, links: extractLinks(description) };
  }

  formatReport(outcome: ComplianceOutcome, symbolStyle: SymbolStyle = SymbolStyle.UNICODE): string {
    const symbol = statusSymbol(outcome, symbolStyle);
    const lines: string[] = [];

    if (outcome.isValid) {
      const fields = outcome.parsedFields;
      lines.push(`${symbol} COMPLIANT - Title follows the commit convention`);
      lines.push(`  Type: ${fields.type}`);
      lines.push(`  Summary: ${fields.summary}`);
      lines.push(`  Project: ${fields.project}`);
      lines.push(`  Ticket: ${fields.ticket}`);
    } else {
      lines.push(`${symbol} NON-COMPLIANT - Title does not follow the commit convention`);
      lines.push('');
      lines.push('Errors:');
      for (const error of outcome.errors) {
        lines.push(`  - ${error}`);
      }

      if (outcome.suggestions.length > 0) {
        lines.push('');
        lines.push('Suggestions:');
        for (const suggestion of outcome.suggestions) {
          lines.push(`  - ${suggestion}`);
        }
      }
    }

    return lines.join('\n');
  }

  formatLinks(links: ExtractedLinks): string {
    return [
      'Extracted Links:',
      `  Ticket: ${links.ticketLink ?? '(none)'}`,
      `  Documentation: ${links.documentationLink ?? '(none)'}`,
      `  Testing: ${links.testingLink ?? '(none)'}`
    ].join('\n');
  }
}

export const complianceService = new ComplianceService();
