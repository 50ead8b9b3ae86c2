import type { KnownBlock } from '@slack/bolt';
import type { ComplianceOutcome, ExtractedLinks } from '../types/compliance';
import { TITLE_FORMAT } from '../utils/titleValidator';

interface BuildComplianceBlocksArgs {
  title: string;
  compliance: ComplianceOutcome;
  links?: ExtractedLinks;
}

const HEADER_MAX_LENGTH = 150; // Slack limit for plain_text headers

// Slack treats &, < and > as control characters in text objects
export function escapeMrkdwn(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function headerText(symbol: string, title: string): string {
  const chars = Array.from(`${symbol} ${title.trim() || '(empty title)'}`);
  return chars.length > HEADER_MAX_LENGTH
    ? `${chars.slice(0, HEADER_MAX_LENGTH - 1).join('')}…`
    : chars.join('');
}

function bulletList(items: readonly string[]): string {
  return items.map(item => `• ${escapeMrkdwn(item)}`).join('\n');
}

// `|` separates the URL from its label inside <url|label>
function linkTarget(url: string): string {
  return escapeMrkdwn(url).replace(/\|/g, '%7C');
}

function linkLine(label: string, url: string | undefined): string {
  return url
    ? `*${label}:* <${linkTarget(url)}|${label}>`
    : `*${label}:* _not provided_`;
}

export function buildComplianceBlocks(args: BuildComplianceBlocksArgs): KnownBlock[] {
  const { title, compliance, links } = args;

  const blocks: KnownBlock[] = [
    {
      type: 'header',
      text: {
        type: 'plain_text',
        text: headerText(compliance.isValid ? '✅' : '❌', title)
      }
    }
  ];

  if (compliance.isValid) {
    const fields = compliance.parsedFields;
    blocks.push({
      type: 'section',
      fields: [
        { type: 'mrkdwn', text: `*Type:*\n${escapeMrkdwn(fields.type)}` },
        { type: 'mrkdwn', text: `*Project:*\n${escapeMrkdwn(fields.project)}` },
        { type: 'mrkdwn', text: `*Ticket:*\n${escapeMrkdwn(fields.ticket)}` },
        { type: 'mrkdwn', text: `*Summary:*\n${escapeMrkdwn(fields.summary)}` }
      ]
    });
  } else {
    blocks.push({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: `*Errors:*\n${bulletList(compliance.errors)}`
      }
    });

    if (compliance.suggestions.length > 0) {
      blocks.push({
        type: 'section',
        text: {
          type: 'mrkdwn',
          text: `*💡 Suggestions:*\n${bulletList(compliance.suggestions)}`
        }
      });
    }

    blocks.push({
      type: 'context',
      elements: [
        { type: 'mrkdwn', text: `Expected format: \`${escapeMrkdwn(TITLE_FORMAT)}\`` }
      ]
    });
  }

  if (links) {
    blocks.push({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: [
          '*🔗 Links:*',
          linkLine('Ticket', links.ticketLink),
          linkLine('Documentation', links.documentationLink),
          linkLine('Testing', links.testingLink)
        ].join('\n')
      }
    });
  }

  blocks.push({ type: 'divider' });

  return blocks;
}
