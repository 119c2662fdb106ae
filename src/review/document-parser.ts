import type { Checklist, ProjectDescription } from './review.types.js';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  mdash: '—',
  ndash: '–',
  laquo: '«',
  raquo: '»',
  hellip: '…',
};

const NON_CONTENT = /<!--[\s\S]*?-->|<(script|style|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const TITLE = /<title\b[^>]*>([\s\S]*?)<\/title\s*>/i;
const HEADER = /<(h[1-3])\b[^>]*>([\s\S]*?)<\/\1\s*>/gi;
/** Block text runs until the next block-level tag, so unclosed `<li>`/`<p>` still parse. */
const TEXT_BLOCK =
  /<(p|li)\b[^>]*>([\s\S]*?)(?=<\/?(?:p|li|ul|ol|div|h[1-6]|table|section|article|body|html)\b|$)/gi;
const LIST_ITEM =
  /<li\b[^>]*>([\s\S]*?)(?=<\/?(?:li|ul|ol|div|h[1-6]|table|section|article|body|html)\b|$)/gi;

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body.startsWith('#')) {
      const code =
        body[1] === 'x' || body[1] === 'X'
          ? parseInt(body.slice(2), 16)
          : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff
        ? String.fromCodePoint(code)
        : match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/** Text content of an HTML fragment with tags removed and whitespace collapsed. */
export function htmlToText(fragment: string): string {
  return decodeEntities(fragment.replace(/<[^>]*>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}

function stripNonContent(html: string): string {
  return html.replace(NON_CONTENT, ' ');
}

function collect(html: string, pattern: RegExp, group: number): string[] {
  const out: string[] = [];
  for (const match of html.matchAll(pattern)) {
    const text = htmlToText(match[group] ?? '');
    if (text) out.push(text);
  }
  return out;
}

function readTitle(html: string, headers: string[]): string {
  const match = TITLE.exec(html);
  const title = match ? htmlToText(match[1] ?? '') : '';
  return title || headers[0] || '';
}

export function parseProjectDescription(html: string): ProjectDescription {
  const clean = stripNonContent(html);
  const headers = collect(clean, HEADER, 2);
  return {
    title: readTitle(clean, headers),
    headers,
    content: collect(clean, TEXT_BLOCK, 2).join('\n'),
  };
}

export function parseChecklist(html: string): Checklist {
  const clean = stripNonContent(html);
  return {
    title: readTitle(clean, collect(clean, HEADER, 2)),
    items: collect(clean, LIST_ITEM, 1),
  };
}
