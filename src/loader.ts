import * as path from 'node:path';
import fs from 'fs-extra';
import fg from 'fast-glob';
import { MdRecord, SourceDocument, Status } from './types.js';
import { RecordError, SourceReadError, isRecordError } from './errors.js';
import { DecodeOptions } from './metadata.js';
import { parseRecord } from './parser.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('[Loader] ');

export const DEFAULT_PATTERN = '**/*.md';

/**
 * A source that could not be turned into a record.
 */
export interface DecodeFailure {
  source: string;
  error: RecordError;
}

/**
 * JSON-friendly view of a failure
 */
export function failureSummary(failure: DecodeFailure) {
  return { source: failure.source, kind: failure.error.kind, message: failure.error.message };
}

/**
 * Result of parsing a batch of sources
 */
export interface Batch {
  /** Successfully assembled records, in input order */
  records: MdRecord[];
  /** Sources that were skipped, with the reason */
  failures: DecodeFailure[];
}

/**
 * Options for loading records from disk
 */
export interface LoadOptions extends DecodeOptions {
  /** Directory to scan */
  inputDir: string;
  /** Glob pattern relative to inputDir (default: **\/*.md) */
  pattern?: string;
}

/**
 * Parse every source into a record. Per-source failures are collected, never
 * retried and never replaced with a default record.
 */
export function parseSources(sources: Iterable<SourceDocument>, options: DecodeOptions = {}): Batch {
  const records: MdRecord[] = [];
  const failures: DecodeFailure[] = [];

  for (const { source, text } of sources) {
    try {
      records.push(parseRecord(source, text, options));
    } catch (err) {
      if (!isRecordError(err)) {
        throw err;
      }
      log.debug(err.message);
      failures.push({ source, error: err });
    }
  }

  return { records, failures };
}

/**
 * Find matching files under a directory, sorted for a stable batch order
 */
export async function findRecordFiles(inputDir: string, pattern: string = DEFAULT_PATTERN): Promise<string[]> {
  const files = await fg(pattern, { cwd: inputDir, onlyFiles: true, dot: false });
  return files.sort();
}

/**
 * Load and parse all record files from a directory.
 * Locators are the paths relative to the input directory.
 */
export async function loadRecords(options: LoadOptions): Promise<Batch> {
  const { inputDir, pattern = DEFAULT_PATTERN, ...decodeOptions } = options;
  const files = await findRecordFiles(inputDir, pattern);
  log.debug(`Found ${files.length} files matching ${pattern} in ${inputDir}`);

  const sources: SourceDocument[] = [];
  const readFailures: DecodeFailure[] = [];

  for (const file of files) {
    try {
      const text = await fs.readFile(path.join(inputDir, file), 'utf-8');
      sources.push({ source: file, text });
    } catch (err) {
      readFailures.push({ source: file, error: new SourceReadError(file, err) });
    }
  }

  const batch = parseSources(sources, decodeOptions);
  const failures = [...readFailures, ...batch.failures];

  log.info(`Loaded ${batch.records.length} records from ${inputDir}`);
  for (const failure of failures) {
    log.warn(failure.error.message);
  }

  return { records: batch.records, failures };
}

/**
 * Text search options
 */
export interface SearchOptions {
  /** Only return records with this status */
  status?: Status;
  /** Maximum number of results to return */
  limit?: number;
}

/**
 * A search hit with context
 */
export interface SearchResult {
  record: MdRecord;
  /** The matching text snippet */
  snippet: string;
  /** Relevance score (lower = better match) */
  score: number;
  /** Where the match was found */
  matchType: 'title' | 'metadata' | 'body';
}

const SNIPPET_LENGTH = 100;

function snippetAround(text: string, index: number): string {
  const start = Math.max(0, index - 30);
  const slice = text.slice(start, start + SNIPPET_LENGTH);
  return `${start > 0 ? '...' : ''}${slice}${start + SNIPPET_LENGTH < text.length ? '...' : ''}`;
}

/**
 * Case-insensitive search over titles, metadata and body text.
 * Results are sorted by: title matches first, then metadata, then body.
 */
export function searchRecords(
  query: string,
  records: readonly MdRecord[],
  options: SearchOptions = {}
): SearchResult[] {
  const { status, limit } = options;
  const results: SearchResult[] = [];
  const queryLower = query.toLowerCase();

  for (const record of records) {
    const { metadata } = record;
    if (status && metadata.status !== status) {
      continue;
    }

    if (metadata.title.toLowerCase().includes(queryLower)) {
      results.push({ record, snippet: metadata.title, score: 0, matchType: 'title' });
      continue;
    }

    const fields = [
      metadata.description,
      metadata.category,
      metadata.author,
      metadata.project,
      ...metadata.tags,
      ...metadata.technologies
    ];
    const field = fields.find(value => value.toLowerCase().includes(queryLower));
    if (field !== undefined) {
      results.push({ record, snippet: field.slice(0, SNIPPET_LENGTH), score: 1, matchType: 'metadata' });
      continue;
    }

    const index = record.bodyText.toLowerCase().indexOf(queryLower);
    if (index !== -1) {
      results.push({ record, snippet: snippetAround(record.bodyText, index), score: 2, matchType: 'body' });
    }
  }

  results.sort((a, b) => a.score - b.score);

  if (limit && results.length > limit) {
    return results.slice(0, limit);
  }
  return results;
}
