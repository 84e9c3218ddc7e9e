const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  rsquo: '’',
  lsquo: '‘',
  ldquo: '“',
  rdquo: '”',
};

const BLOCK_BREAK = /<(br|\/p|\/div|\/li|\/h[1-6]|\/section|\/article|\/tr|\/td|\/th)\b[^>]*>/gi;
const BLOCK_OPEN = /<(p|div|li|h[1-6]|section|article|tr|td|th)\b[^>]*>/gi;

function fromCodePoint(match: string, code: number): string {
  if (Number.isNaN(code)) {
    return match;
  }
  try {
    return String.fromCodePoint(code);
  } catch {
    return match;
  }
}

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }

  return value
    .replace(/&#(\d+);/g, (match, code: string) => fromCodePoint(match, Number.parseInt(code, 10)))
    .replace(/&#x([0-9a-fA-F]+);/g, (match, hex: string) => fromCodePoint(match, Number.parseInt(hex, 16)))
    .replace(/&([a-zA-Z]+);/g, (match, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? match);
}

const TAG = /<\/?[A-Za-z!][^>]*>/g;

function removeTags(value: string): string {
  return value
    .replace(BLOCK_BREAK, '\n')
    .replace(BLOCK_OPEN, '\n')
    .replace(TAG, '');
}

/**
 * Reduces provider HTML to plain text. Tags are stripped before entities are
 * decoded; escaped markup (`&lt;p&gt;`) is stripped after decoding, but only
 * where it looks like a tag, so text such as `3 &lt; 5` survives.
 */
export function stripHtml(value: string): string {
  if (!value) {
    return '';
  }

  let working = removeTags(decodeHtmlEntities(removeTags(value)));

  working = working.replace(/\r\n/g, '\n');
  working = working.replace(/[ \t]+\n/g, '\n');
  working = working.replace(/\n[ \t]+/g, '\n');
  working = working.replace(/\n{3,}/g, '\n\n');
  working = working.replace(/[ \t]{2,}/g, ' ');

  return working.trim();
}

export function toPlainText(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const text = stripHtml(value);
  return text.length > 0 ? text : null;
}
