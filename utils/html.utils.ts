import { JSDOM } from 'jsdom';

// Rendered-page chrome that carries no article prose.
const NON_CONTENT_SELECTORS = [
  'style',
  'script',
  'link',
  'sup.reference',
  'span.mw-editsection',
  '.mw-references-wrap',
  'ol.references',
  '.navbox',
  '.metadata',
  '.noprint',
];

const BLOCK_SELECTORS = 'p, li, h1, h2, h3, h4, h5, h6, tr, dd, dt, div, table, blockquote, pre';
const CELL_SELECTORS = 'td, th';

export class HtmlUtils {
  /**
   * Reduces MediaWiki parser output to plain text: block elements end up on
   * their own lines, table cells are space-separated and runs of blank lines
   * collapse to one.
   */
  static toPlainText(html: string): string {
    const dom = new JSDOM(`<!DOCTYPE html><body>${html}</body>`);
    const document = dom.window.document;

    for (const element of Array.from(document.querySelectorAll(NON_CONTENT_SELECTORS.join(', ')))) {
      element.remove();
    }

    for (const element of Array.from(document.querySelectorAll(BLOCK_SELECTORS))) {
      element.append(document.createTextNode('\n'));
    }
    for (const element of Array.from(document.querySelectorAll(CELL_SELECTORS))) {
      element.append(document.createTextNode(' '));
    }
    for (const element of Array.from(document.querySelectorAll('br'))) {
      element.replaceWith(document.createTextNode('\n'));
    }

    const text = document.body.textContent ?? '';
    dom.window.close();

    return text
      .split('\n')
      .map((line) => line.replace(/[ \t\u00a0]+/g, ' ').trim())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}
