import type { ExtractedLinks } from '../types/compliance';

// Ticket Link: [(Taiga #DATB-456)](https://...)
const TICKET_LINK_RE = /Ticket\s+Link:\s*\[[^\]]+\]\((https?:\/\/[^)]+)\)/i;
// Documentation Link: [Figma](https://...)
const DOCUMENTATION_LINK_RE = /Documentation\s+Link:\s*\[[^\]]+\]\((https?:\/\/[^)]+)\)/i;
// Testing Link: [https://...]
const TESTING_LINK_RE = /Testing\s+Link:\s*\[(https?:\/\/[^\]]+)\]/i;

const ANY_URL_RE = /https?:\/\/[^\s)]+/g;

function firstUrl(description: string, re: RegExp): string | undefined {
  const m = description.match(re);
  return m?.[1].trim();
}

/**
 * Pull the ticket, documentation and testing links out of a description.
 * Only the bracketed forms count; the first declaration of each label wins.
 */
export function extractLinks(description?: string | null): ExtractedLinks {
  if (!description) {
    return Object.freeze({});
  }

  const ticketLink = firstUrl(description, TICKET_LINK_RE);
  const documentationLink = firstUrl(description, DOCUMENTATION_LINK_RE);
  const testingLink = firstUrl(description, TESTING_LINK_RE);

  return Object.freeze({
    ...(ticketLink ? { ticketLink } : {}),
    ...(documentationLink ? { documentationLink } : {}),
    ...(testingLink ? { testingLink } : {})
  });
}

/**
 * Every http(s) URL in the description, in order, duplicates included
 */
export function extractAllUrls(description?: string | null): string[] {
  if (!description) {
    return [];
  }
  return description.match(ANY_URL_RE) ?? [];
}
