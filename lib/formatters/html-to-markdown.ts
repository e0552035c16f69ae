import TurndownService from 'turndown';

/**
 * Convert an extracted content region to Markdown
 * - Preserves headings, emphasis, lists, links, code blocks
 * - Leaves link and image URLs exactly as written (no base URL), so relative
 *   site links survive for the cleanup pipeline to recognise
 * - Drops forms and embedded UI elements
 */
export function htmlToMarkdown(html: string): string {
  if (!html) return '';

  const turndownService = new TurndownService({
    headingStyle: 'atx', // Use # for headings
    codeBlockStyle: 'fenced', // Use ``` for code blocks
    bulletListMarker: '-', // Use - for lists
    emDelimiter: '_', // Use _ for emphasis
    strongDelimiter: '**', // Use ** for strong
  });

  // Remove unwanted elements before conversion
  turndownService.remove([
    'script',
    'style',
    'form',
    'button',
    'input',
    'select',
    'textarea',
    'iframe',
    'noscript',
  ]);

  return turndownService.turndown(html).trim();
}

const escaper = new TurndownService();

/**
 * Backslash-escape text the way Turndown escapes text nodes, e.g.
 * `my_var [x]` → `my\_var \[x\]`
 */
export function escapeMarkdown(text: string): string {
  return escaper.escape(text);
}
