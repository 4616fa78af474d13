/**
 * Tests for the content normalizer.
 *
 * @module services/normalizer/__tests__/normalizer.test
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeContent,
  stripQuotedLines,
  stripSignature,
  collapseWhitespace,
  removeTags,
  looksLikeHtml,
  TAG_PATTERN,
} from '../index';

describe('normalizeContent', () => {
  it('returns an empty string for missing or blank bodies', () => {
    expect(normalizeContent(null)).toBe('');
    expect(normalizeContent(undefined)).toBe('');
    expect(normalizeContent('   \n  ')).toBe('');
  });

  it('never throws and never returns tags', () => {
    const inputs = [
      '<script>alert(1)</script>Hello',
      '<<b>p>nested</p>',
      '<div><div><div>deep</div></div></div>',
      '<!doctype html><html><body><p>Hi</p></body></html>',
      '< not a tag > and a <b>bold</b> one',
      '<<<>>>',
      'plain text',
    ];

    for (const input of inputs) {
      const result = normalizeContent(input);
      expect(result.match(TAG_PATTERN)).toBeNull();
    }
  });

  it('converts HTML bodies to text', () => {
    const html =
      '<html><body><p>Hello <b>team</b>,</p><p>The release is ready.</p><img src="banner.png"></body></html>';

    const result = normalizeContent(html, 'text/html');

    expect(result).toContain('Hello team,');
    expect(result).toContain('The release is ready.');
    expect(result).not.toContain('banner.png');
  });

  it('removes an inline quote header and the quoted text', () => {
    const result = normalizeContent(
      'Hi John, On Mon, Jan 1, Jane wrote: > old reply\nPlease send the report by Friday.'
    );

    expect(result).not.toContain('old reply');
    expect(result).not.toContain('wrote:');
    expect(result).toContain('Please send the report by Friday.');
  });

  it('cuts the signature block', () => {
    expect(normalizeContent('Please review the draft.\n\nBest regards,\nJane')).toBe(
      'Please review the draft.'
    );
  });
});

describe('stripQuotedLines', () => {
  it('drops lines starting with >', () => {
    expect(stripQuotedLines('Thanks for the update.\n> earlier message\n> more')).toBe(
      'Thanks for the update.'
    );
  });

  it('cuts everything after an original message separator', () => {
    const result = stripQuotedLines('Sounds good.\n-----Original Message-----\nFrom: Bob\nOld text');
    expect(result.trim()).toBe('Sounds good.');
  });

  it('cuts a line at an inline "On … wrote:" header', () => {
    expect(
      stripQuotedLines('Hi John, On Mon, Jan 1, Jane wrote: > old reply\nPlease send the report by Friday.')
    ).toBe('Hi John,\nPlease send the report by Friday.');
  });
});

describe('stripSignature', () => {
  it('cuts at the first marker line', () => {
    expect(stripSignature('See you tomorrow.\n--\nJane Doe\nAcme')).toBe('See you tomorrow.');
  });

  it('keeps "Thanks," when it is not the whole line', () => {
    expect(stripSignature('Thanks, I will check.')).toBe('Thanks, I will check.');
  });

  it('keeps long text when the cut would remove most of it', () => {
    const text = `Hi\n--\n${'x'.repeat(250)}`;
    expect(stripSignature(text)).toBe(text);
  });
});

describe('whitespace', () => {
  it('collapses spaces, invisible characters and blank lines', () => {
    const nbsp = String.fromCharCode(0xa0);
    const zeroWidth = String.fromCharCode(0x200b);

    expect(collapseWhitespace(`a${nbsp}b  c${zeroWidth}d\r\n\n\n\n  e  `)).toBe('a b cd\n\ne');
  });

  it('removes tags until none is left', () => {
    expect(collapseWhitespace(removeTags('<di<b>v>Hi</div>'))).toBe('Hi');
  });
});

describe('looksLikeHtml', () => {
  it('trusts an HTML mime type', () => {
    expect(looksLikeHtml('plain words', 'text/html; charset=UTF-8')).toBe(true);
  });

  it('detects markup in untyped bodies', () => {
    expect(looksLikeHtml('<p>Hello</p>', null)).toBe(true);
    expect(looksLikeHtml('a < b and c > d', null)).toBe(false);
  });
});
