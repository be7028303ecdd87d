import { Metadata, MdRecord, RecordId } from './types.js';
import { extractHeader } from './header.js';
import { DecodeOptions, decodeMetadata } from './metadata.js';
import { toHtml, toPlainText } from './renderer.js';

/**
 * Last path segment of a locator, accepting both separators.
 */
export function filenameFromLocator(source: string): string {
  const segments = source.split(/[\\/]/);
  return segments[segments.length - 1] ?? source;
}

/**
 * Derive a record identifier from the filename stem.
 *
 * No collision detection: two locators with the same stem yield the same id,
 * and aggregations count them under it.
 */
export function recordIdFromLocator(source: string): RecordId {
  const filename = filenameFromLocator(source);
  const dot = filename.lastIndexOf('.');
  const stem = dot > 0 ? filename.slice(0, dot) : filename;
  return stem || 'unknown';
}

export interface RecordParts {
  source: string;
  metadata: Metadata;
  bodyMarkdown: string;
  bodyHtml: string;
  bodyText: string;
}

/**
 * Combine decoded metadata and rendered body into a frozen record.
 */
export function assembleRecord(parts: RecordParts): MdRecord {
  const metadata: Metadata = {
    ...parts.metadata,
    tags: [...parts.metadata.tags],
    technologies: [...parts.metadata.technologies],
    audience: [...parts.metadata.audience],
    related: [...parts.metadata.related]
  };
  Object.freeze(metadata.tags);
  Object.freeze(metadata.technologies);
  Object.freeze(metadata.audience);
  Object.freeze(metadata.related);

  return Object.freeze({
    id: recordIdFromLocator(parts.source),
    filename: filenameFromLocator(parts.source),
    source: parts.source,
    metadata: Object.freeze(metadata),
    bodyMarkdown: parts.bodyMarkdown,
    bodyHtml: parts.bodyHtml,
    bodyText: parts.bodyText
  });
}

/**
 * Parse one source document into a record.
 * Throws MalformedHeaderError, SchemaError, MissingFieldError or DateParseError.
 */
export function parseRecord(source: string, text: string, options: DecodeOptions = {}): MdRecord {
  const { block, body } = extractHeader(text, source);
  const metadata = decodeMetadata(block, source, options);

  return assembleRecord({
    source,
    metadata,
    bodyMarkdown: body,
    bodyHtml: toHtml(body),
    bodyText: toPlainText(body)
  });
}

/**
 * JSON form of a record handed to viewers: the raw markdown stays server side.
 */
export function publicRecord(record: MdRecord): Omit<MdRecord, 'bodyMarkdown'> {
  const { bodyMarkdown: _bodyMarkdown, ...rest } = record;
  return rest;
}
