import { Logger } from '../logger.js';
import { Metadata, MdRecord } from '../types.js';
import { assembleRecord } from '../parser.js';

/**
 * Logger that keeps warnings for inspection
 */
export class RecordingLogger implements Logger {
  readonly warnings: string[] = [];

  debug(): void {
    // not recorded
  }

  info(): void {
    // not recorded
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(): void {
    // not recorded
  }

  setLevel(): void {
    // fixed level
  }
}

export function metadata(fields: Partial<Metadata> = {}): Metadata {
  return {
    title: 'Untitled',
    description: '',
    docType: 'adr',
    category: '',
    tags: [],
    status: 'proposed',
    author: '',
    project: '',
    technologies: [],
    audience: [],
    related: [],
    ...fields
  };
}

/**
 * A record built without going through the decoder
 */
export function makeRecord(source: string, fields: Partial<Metadata> = {}, body = ''): MdRecord {
  return assembleRecord({
    source,
    metadata: metadata(fields),
    bodyMarkdown: body,
    bodyHtml: '',
    bodyText: body
  });
}
