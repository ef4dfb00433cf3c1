import { decodeHTML } from 'entities';

/**
 * Rich-text field to display text: decode entities, paragraphs become line
 * breaks, any other tag is dropped. Naive `<...>` scan, not an HTML parser.
 */
export function strip(text: string | null | undefined): string | undefined {
  if (text === undefined || text === null) return undefined;
  return decodeHTML(text)
    .replace(/<p(?:\s[^>]*)?>/gi, '')
    .replace(/<\/p\s*>/gi, '\n')
    .replace(/<[^>]*>/g, '');
}
