import { Marked, lexer } from 'marked';
import type { Token, Tokens } from 'marked';

// Trailing `{#id .class key=value}` on an ATX heading
const HEADING_ATTRIBUTES_PATTERN = /\s*\{([^{}]*)\}\s*$/;

/**
 * Escape a value for use inside a double-quoted HTML attribute
 */
function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Turn the inside of a `{...}` heading suffix into an HTML attribute string.
 * Returns null when the suffix holds nothing recognisable.
 */
export function parseHeadingAttributes(spec: string): string | null {
  let id: string | undefined;
  const classes: string[] = [];
  const extra: string[] = [];

  for (const part of spec.trim().split(/\s+/)) {
    if (part.startsWith('#') && part.length > 1) {
      id = part.slice(1);
    } else if (part.startsWith('.') && part.length > 1) {
      classes.push(part.slice(1));
    } else if (/^[\w-]+=.+$/.test(part)) {
      const eq = part.indexOf('=');
      extra.push(`${part.slice(0, eq)}="${escapeAttribute(part.slice(eq + 1).replace(/^"|"$/g, ''))}"`);
    }
  }

  const attrs: string[] = [];
  if (id) attrs.push(`id="${escapeAttribute(id)}"`);
  if (classes.length > 0) attrs.push(`class="${escapeAttribute(classes.join(' '))}"`);
  attrs.push(...extra);

  return attrs.length > 0 ? ` ${attrs.join(' ')}` : null;
}

/**
 * Create a configured marked instance
 */
function createMarkedInstance(): Marked {
  const instance = new Marked({
    gfm: true,      // tables, strikethrough, task lists
    breaks: false
  });

  instance.use({
    renderer: {
      heading(text: string, level: number, raw: string): string | false {
        if (!HEADING_ATTRIBUTES_PATTERN.test(raw)) {
          return false;
        }
        const match = text.match(HEADING_ATTRIBUTES_PATTERN);
        const attrs = match ? parseHeadingAttributes(match[1]) : null;
        if (!match || attrs === null) {
          return false;
        }
        const content = text.slice(0, match.index).trim();
        return `<h${level}${attrs}>${content}</h${level}>\n`;
      }
    }
  });

  return instance;
}

const markedInstance = createMarkedInstance();

/**
 * Render a markdown body to HTML.
 * Raw HTML in the source is passed through as marked emits it.
 */
export function toHtml(markdown: string): string {
  return markedInstance.parse(markdown) as string;
}

function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

// marked escapes text and code span tokens while lexing
const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'"
};

function unescapeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, entity => ENTITIES[entity] ?? entity);
}

// Tokens whose text ends a run of words
const BLOCK_TYPES = new Set(['paragraph', 'blockquote', 'list_item', 'text']);

// Drop a `{...}` suffix that toHtml would turn into attributes
function stripHeadingAttributes(text: string): string {
  const match = text.match(HEADING_ATTRIBUTES_PATTERN);
  if (!match || parseHeadingAttributes(match[1]) === null) {
    return text;
  }
  return text.slice(0, match.index);
}

function collectText(tokens: Token[], out: string[]): void {
  for (const token of tokens) {
    switch (token.type) {
      case 'code':
      case 'html':
      case 'space':
      case 'hr':
      case 'def':
        // code blocks and raw markup carry no indexable prose
        break;
      case 'br':
        out.push(' ');
        break;
      case 'codespan':
      case 'escape':
      case 'image': {
        const text: string = token.text;
        out.push(text);
        break;
      }
      case 'table': {
        const header: Tokens.TableCell[] = token.header;
        const rows: Tokens.TableCell[][] = token.rows;
        for (const cell of [...header, ...rows.flat()]) {
          collectText(cell.tokens, out);
          out.push(' ');
        }
        break;
      }
      case 'heading': {
        const parts: string[] = [];
        collectText(token.tokens ?? [], parts);
        out.push(stripHeadingAttributes(parts.join('')), ' ');
        break;
      }
      case 'list': {
        const items: Tokens.ListItem[] = token.items;
        for (const item of items) {
          collectText(item.tokens, out);
          out.push(' ');
        }
        break;
      }
      default: {
        if ('tokens' in token && token.tokens) {
          collectText(token.tokens, out);
          if (BLOCK_TYPES.has(token.type)) {
            out.push(' ');
          }
        } else if ('text' in token && typeof token.text === 'string') {
          out.push(token.text);
        }
      }
    }
  }
}

function flattenOnce(markdown: string): string {
  let tokens: Token[];
  try {
    tokens = lexer(markdown, { gfm: true });
  } catch {
    return collapseWhitespace(markdown);
  }
  const out: string[] = [];
  collectText(tokens, out);
  return collapseWhitespace(unescapeEntities(out.join('')));
}

// Code spans and escapes can flatten into text that is markdown again
const MAX_FLATTEN_PASSES = 8;

/**
 * Flatten a markdown body into single-spaced text for search indexing.
 *
 * Prose, inline code, link text and table cells are kept; code blocks and
 * raw HTML are dropped. The result flattens to itself. Never throws: input
 * the lexer rejects is indexed as literal text.
 */
export function toPlainText(markdown: string): string {
  let text = flattenOnce(markdown);
  for (let pass = 1; pass < MAX_FLATTEN_PASSES; pass++) {
    const next = flattenOnce(text);
    if (next === text) {
      break;
    }
    text = next;
  }
  return text;
}
