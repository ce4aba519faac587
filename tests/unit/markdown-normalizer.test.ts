/**
 * Unit tests for Markdown cleanup.
 */

import { describe, it, expect } from 'vitest';
import {
  MARKDOWN_RULES,
  applyMarkdownRules,
  normalizeMarkdown
} from '../../src/services/MarkdownNormalizer';

describe('applyMarkdownRules', () => {
  it('strips headings, emphasis and links without trimming', () => {
    const input = '# Title\n\nSome *bold* text with a [link](http://x).\n';
    expect(applyMarkdownRules(input)).toBe('Title\n\nSome bold text with a link.\n');
  });

  it('applies the rules in a fixed order', () => {
    expect(MARKDOWN_RULES.map((rule) => rule.name)).toEqual([
      'html-comments',
      'headings',
      'links',
      'bold-italic',
      'underline-italic',
      'code-blocks',
      'inline-code',
      'list-markers',
      'numbered-lists',
      'images',
      'html-tags',
      'excess-newlines',
      'trailing-whitespace'
    ]);
  });
});

describe('normalizeMarkdown', () => {
  it('trims the result', () => {
    const input = '# Title\n\nSome *bold* text with a [link](http://x).\n';
    expect(normalizeMarkdown(input)).toBe('Title\n\nSome bold text with a link.');
  });

  it('removes HTML comments spanning lines', () => {
    expect(normalizeMarkdown('Before <!-- hidden\nnote --> after')).toBe('Before  after');
  });

  it('removes heading markers of every level', () => {
    expect(normalizeMarkdown('## Section\n###### Deep')).toBe('Section\nDeep');
  });

  it('strips asterisk and underscore emphasis', () => {
    expect(normalizeMarkdown('**bold** and _it_ and __under__')).toBe('bold and it and under');
  });

  it('removes fenced code blocks with their content', () => {
    const input = 'Intro\n```ts\nconst secret = 1;\n```\nOutro\n';
    const output = normalizeMarkdown(input);

    expect(output).toBe('Intro\n\nOutro');
    expect(output).not.toContain('secret');
  });

  it('keeps the text of inline code', () => {
    expect(normalizeMarkdown('Use `npm` now')).toBe('Use npm now');
  });

  it('removes list markers', () => {
    expect(normalizeMarkdown('- one\n* two\n+ three\n1. first\n10. tenth')).toBe(
      'one\ntwo\nthree\nfirst\ntenth'
    );
  });

  it('removes images including alt text but keeps link labels', () => {
    expect(normalizeMarkdown('See ![logo](logo.png) and [docs](http://d).')).toBe('See  and docs.');
  });

  it('removes HTML tags', () => {
    expect(normalizeMarkdown('<p>Hello <b>there</b></p>')).toBe('Hello there');
  });

  it('collapses runs of blank lines', () => {
    expect(normalizeMarkdown('a\n\n\n\nb')).toBe('a\n\nb');
  });

  it('removes trailing whitespace before newlines', () => {
    expect(normalizeMarkdown('a  \nb\t\nc')).toBe('a\nb\nc');
  });

  it('is idempotent on plain text', () => {
    const plain = 'Plain sentence one.\nAnother line here.';
    const once = normalizeMarkdown(plain);

    expect(once).toBe(plain);
    expect(normalizeMarkdown(once)).toBe(once);
  });
});
