import { applyRules, literalRule, type TextRule } from '../utils/textRules';
import { normalizeMarkdown } from './MarkdownNormalizer';

/** Spoken as a short silence at the start of every line after the first */
export const PAUSE_TOKEN = '....';

/**
 * Pause substitutions, in application order.
 *
 * Commas are doubled before any rule inserts new commas, so the inserted
 * ones stay single.
 */
export const PUNCTUATION_RULES: readonly TextRule[] = [
  literalRule('sentence-pause', '. ', '.. '),
  literalRule('comma-pause', ',', ',,'),
  literalRule('semicolon-pause', '; ', ';, '),
  literalRule('colon-pause', ': ', ':, '),
  literalRule('open-paren-pause', '(', ',('),
  literalRule('close-paren-pause', ')', '),'),
  literalRule('slash-pause', '/', ',,'),
  literalRule('eg-pause', 'e.g.', 'e.g.,'),
  literalRule('line-pause', '\n', `\n${PAUSE_TOKEN}`)
];

export function punctuate(text: string): string {
  return applyRules(text, PUNCTUATION_RULES);
}

/**
 * Markdown in, text for the speech synthesizer out.
 */
export function toNarrationText(markdown: string): string {
  return punctuate(normalizeMarkdown(markdown));
}
