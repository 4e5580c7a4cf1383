/**
 * LaTeX Output Parser
 *
 * Extracts the LaTeX document from a model reply. Replies come back as a
 * ```latex fenced block, a bare fenced block, or occasionally an unfenced
 * document surrounded by chatter.
 */

import { ErrorHandler } from '../errors';

const EXTRACTION_PATTERNS: RegExp[] = [
  // ```latex / ```tex fenced block
  /```(?:latex|tex)[ \t]*\r?\n?([\s\S]*?)```/i,
  // Generic fenced block starting with the document class
  /```\s*(\\documentclass[\s\S]*?)```/i,
  // Generic fenced block containing a document body
  /```[^\n]*\n([\s\S]*?\\begin\{document\}[\s\S]*?)```/i,
  // Unfenced document
  /(\\documentclass[\s\S]*\\end\{document\})/
];

const REQUIRED_MARKERS = ['\\documentclass', '\\begin{document}', '\\end{document}'];

/**
 * True when the text has the three markers of a complete LaTeX document
 */
export function looksLikeLatexDocument(content: string): boolean {
  return REQUIRED_MARKERS.every(marker => content.includes(marker));
}

export class LatexOutputParser {
  /**
   * Return the first candidate that is a complete document, or undefined
   */
  tryParse(text: string): string | undefined {
    for (const pattern of EXTRACTION_PATTERNS) {
      const match = pattern.exec(text);
      const candidate = match?.[1]?.trim();
      if (candidate && looksLikeLatexDocument(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  /**
   * Extract the LaTeX document or throw a parsing error
   */
  parse(text: string): string {
    const content = this.tryParse(text);
    if (content === undefined) {
      throw ErrorHandler.createParsingError(
        'The language model did not return a complete LaTeX document.',
        `No valid LaTeX content found in the output. Preview: ${text.slice(0, 200)}`,
        { outputLength: text.length }
      );
    }
    return content;
  }
}
