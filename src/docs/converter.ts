/**
 * HTML to Markdown Converter
 * Converts fetched HTML documentation to markdown with turndown
 */

import TurndownService from 'turndown';

const turndown = new TurndownService({
  headingStyle: 'atx',
  codeBlockStyle: 'fenced',
  bulletListMarker: '-',
});

turndown.remove(['script', 'style', 'noscript']);

/**
 * Convert HTML to Markdown
 */
export function htmlToMarkdown(html: string): string {
  return cleanMarkdown(turndown.turndown(html));
}

/**
 * Check if a media type denotes HTML
 */
export function isHtmlContentType(contentType: string | null | undefined): boolean {
  if (!contentType) {
    return false;
  }
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase();
  return mediaType === 'text/html' || mediaType === 'application/xhtml+xml';
}

/**
 * Sniff HTML from the document itself, for sources without a usable content type
 */
export function isHtmlContent(content: string): boolean {
  const head = content.slice(0, 1024);
  const htmlPattern = /<\s*html[^>]*>/i;
  const doctypePattern = /<!DOCTYPE\s+html/i;
  const bodyPattern = /<\s*body[^>]*>/i;

  return htmlPattern.test(head) || doctypePattern.test(head) || bodyPattern.test(head);
}

/**
 * Collapse runs of blank lines and trailing whitespace
 */
export function cleanMarkdown(markdown: string): string {
  return markdown
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
