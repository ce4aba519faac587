import { applyRules, regexRule, type TextRule } from '../utils/textRules';

/**
 * Markdown cleanup rules, in application order.
 *
 * The link rule skips `![...](...)` so that images survive until the
 * image rule removes them together with their alt text.
 */
export const MARKDOWN_RULES: readonly TextRule[] = [
  regexRule('html-comments', /<!--[\s\S]*?-->/g, ''),
  regexRule('headings', /^#{1,6}[ \t]*/gm, ''),
  regexRule('links', /(?<!!)\[([^\]]+)\]\([^)]+\)/g, '$1'),
  regexRule('bold-italic', /\*{1,2}(.*?)\*{1,2}/g, '$1'),
  regexRule('underline-italic', /_{1,2}(.*?)_{1,2}/g, '$1'),
  regexRule('code-blocks', /```[\s\S]*?```/g, ''),
  regexRule('inline-code', /`([^`]+)`/g, '$1'),
  regexRule('list-markers', /^[ \t]*[-*+][ \t]*/gm, ''),
  regexRule('numbered-lists', /^[ \t]*[0-9]+\.[ \t]*/gm, ''),
  regexRule('images', /!\[.*?\]\(.*?\)/g, ''),
  regexRule('html-tags', /<[^>]+>/g, ''),
  regexRule('excess-newlines', /\n{3,}/g, '\n\n'),
  regexRule('trailing-whitespace', /[ \t]+\n/g, '\n')
];

/**
 * Runs the Markdown rules without the final trim.
 */
export function applyMarkdownRules(markdown: string): string {
  return applyRules(markdown, MARKDOWN_RULES);
}

/**
 * Converts Markdown into plain text ready for narration.
 */
export function normalizeMarkdown(markdown: string): string {
  return applyMarkdownRules(markdown).trim();
}
