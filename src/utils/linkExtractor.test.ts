import * as assert from 'assert';
import { extractLinks, extractAllUrls } from './linkExtractor';
import type { ExtractedLinks } from '../types/compliance';

const DESCRIPTION = [
  'Ticket Link: [(Taiga #DATB-456)](https://a.example/x)',
  'Testing Link: [https://b.example/y]'
].join('\n');

suite('extractLinks', () => {
  test('extracts ticket and testing links', () => {
    const links = extractLinks(DESCRIPTION);
    assert.deepStrictEqual<ExtractedLinks>(links, {
      ticketLink: 'https://a.example/x',
      testingLink: 'https://b.example/y'
    });
    assert.strictEqual(links.documentationLink, undefined);
  });

  test('keeps query strings and fragments', () => {
    const links = extractLinks(
      'Documentation Link: [Figma](https://design.example/file/abc?node=1#frame)'
    );
    assert.strictEqual(links.documentationLink, 'https://design.example/file/abc?node=1#frame');
  });

  test('returns no links for a missing or empty description', () => {
    assert.deepStrictEqual(extractLinks(undefined), {});
    assert.deepStrictEqual(extractLinks(null), {});
    assert.deepStrictEqual(extractLinks(''), {});
  });

  test('uses the first declaration of a label', () => {
    const links = extractLinks([
      'Ticket Link: [first](https://a.example/1)',
      'Ticket Link: [second](https://a.example/2)'
    ].join('\n'));
    assert.strictEqual(links.ticketLink, 'https://a.example/1');
  });

  test('matches labels case-insensitively', () => {
    const links = extractLinks('ticket link:[T-1](http://a.example/x)');
    assert.strictEqual(links.ticketLink, 'http://a.example/x');
  });

  test('ignores bare URLs after a label', () => {
    const links = extractLinks([
      'Ticket Link: https://a.example/x',
      'Documentation Link: https://d.example/y',
      'Testing Link: https://b.example/y'
    ].join('\n'));
    assert.deepStrictEqual(links, {});
  });

  test('requires the single-bracket form for testing links', () => {
    const links = extractLinks('Testing Link: [Results](https://c.example/run)');
    assert.strictEqual(links.testingLink, undefined);
  });

  test('ignores non-http targets', () => {
    const links = extractLinks('Documentation Link: [Spec](ftp://files.example/spec)');
    assert.strictEqual(links.documentationLink, undefined);
  });
});

suite('extractAllUrls', () => {
  test('stops at whitespace and closing parentheses only', () => {
    assert.deepStrictEqual(extractAllUrls(DESCRIPTION), [
      'https://a.example/x',
      'https://b.example/y]'
    ]);
  });

  test('keeps duplicates in order', () => {
    assert.deepStrictEqual(
      extractAllUrls('see https://a.example and http://b.example then https://a.example'),
      ['https://a.example', 'http://b.example', 'https://a.example']
    );
  });

  test('returns an empty list for a missing description', () => {
    assert.deepStrictEqual(extractAllUrls(undefined), []);
    assert.deepStrictEqual(extractAllUrls('no links here'), []);
  });
});
