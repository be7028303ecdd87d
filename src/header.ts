import { MalformedHeaderError } from './errors.js';

const DELIMITER = '---';

/**
 * Header block and body split out of a source document.
 */
export interface ExtractedHeader {
  /** YAML text between the delimiters, trimmed */
  block: string;
  /** Markdown after the closing delimiter, trimmed */
  body: string;
}

/**
 * Split a document into its metadata block and body.
 *
 * The text must open with `---` at offset 0. The block ends at the first
 * `---` that starts a line. A YAML value containing a line that begins with
 * `---` (such as a literal block holding a horizontal rule) ends the block
 * early; this is a known limitation of the delimiter convention.
 */
export function extractHeader(text: string, source: string): ExtractedHeader {
  if (!text.startsWith(DELIMITER)) {
    throw new MalformedHeaderError(source, `expected '${DELIMITER}' at the start of the file`);
  }

  const rest = text.slice(DELIMITER.length);
  const closing = rest.indexOf(`\n${DELIMITER}`);
  if (closing === -1) {
    throw new MalformedHeaderError(source, `no closing '${DELIMITER}' line`);
  }

  const block = rest.slice(0, closing).trim();
  const body = rest
    .slice(closing + 1 + DELIMITER.length)
    .replace(/^[\r\n]+/, '')
    .trim();

  return { block, body };
}

/**
 * Join a metadata block and a body into a document that `extractHeader` accepts.
 */
export function composeDocument(block: string, body: string): string {
  return `${DELIMITER}\n${block.trim()}\n${DELIMITER}\n\n${body.trim()}\n`;
}
