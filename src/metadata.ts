import * as yaml from 'js-yaml';
import AjvModule from 'ajv';
import type { ValidateFunction } from 'ajv';
import { format, isValid, parse } from 'date-fns';
import { Metadata, IsoDate } from './types.js';
import { DateParseError, MissingFieldError, SchemaError } from './errors.js';
import { StatusWarningTracker, decodeStatus, sharedStatusTracker } from './status.js';

const Ajv = AjvModule.default;

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

const DEFAULT_DOC_TYPE = 'adr';

type Scalar = string | number | boolean | null;

/**
 * Header mapping as loaded from YAML, after the shape check.
 */
interface RawMetadata {
  title?: Scalar;
  description?: Scalar;
  type?: Scalar;
  category?: Scalar;
  status?: Scalar;
  created?: Scalar;
  updated?: Scalar;
  author?: Scalar;
  project?: Scalar;
  tags?: Array<string | number | boolean> | null;
  technologies?: Array<string | number | boolean> | null;
  audience?: Array<string | number | boolean> | null;
  related?: Array<string | number | boolean> | null;
}

const SCALAR = { type: ['string', 'number', 'boolean', 'null'] };
const SEQUENCE = { type: ['array', 'null'], items: { type: ['string', 'number', 'boolean'] } };

// Unknown keys are allowed and ignored.
const METADATA_SCHEMA = {
  type: 'object',
  properties: {
    title: SCALAR,
    description: SCALAR,
    type: SCALAR,
    category: SCALAR,
    status: SCALAR,
    created: SCALAR,
    updated: SCALAR,
    author: SCALAR,
    project: SCALAR,
    tags: SEQUENCE,
    technologies: SEQUENCE,
    audience: SEQUENCE,
    related: SEQUENCE
  },
  additionalProperties: true
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateShape: ValidateFunction<RawMetadata> = ajv.compile<RawMetadata>(METADATA_SCHEMA);

export interface DecodeOptions {
  /** Receives unknown status values; defaults to the process-wide tracker */
  statusTracker?: StatusWarningTracker;
}

// Values are kept exactly as written; only absence maps to ''
function text(value: Scalar | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  return String(value);
}

function list(value: Array<string | number | boolean> | null | undefined): string[] {
  return value ? value.map(item => String(item)) : [];
}

/**
 * Parse a canonical `YYYY-MM-DD` date. Empty input means "no date".
 */
export function parseIsoDate(value: string, field: string, source: string): IsoDate | undefined {
  if (value === '') {
    return undefined;
  }
  const date = parse(value, ISO_DATE_FORMAT, new Date());
  if (!isValid(date) || format(date, ISO_DATE_FORMAT) !== value) {
    throw new DateParseError(source, field, value);
  }
  return value;
}

function loadYaml(block: string, source: string): unknown {
  try {
    return yaml.load(block, { schema: yaml.CORE_SCHEMA, filename: source });
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      const detail = err.mark ? `${err.reason} (line ${err.mark.line + 1})` : err.reason;
      throw new SchemaError(source, detail, { cause: err });
    }
    throw err;
  }
}

/**
 * Decode a YAML header block into metadata.
 *
 * Every field except `title` falls back to an empty default. Unknown status
 * values become `proposed`. Malformed non-empty dates are errors.
 */
export function decodeMetadata(block: string, source: string, options: DecodeOptions = {}): Metadata {
  const loaded = loadYaml(block, source) ?? {};

  if (!validateShape(loaded)) {
    throw new SchemaError(source, ajv.errorsText(validateShape.errors, { dataVar: 'metadata' }));
  }

  const title = text(loaded.title);
  if (title === '') {
    throw new MissingFieldError(source, 'title');
  }

  const metadata: Metadata = {
    title,
    description: text(loaded.description),
    docType: text(loaded.type) || DEFAULT_DOC_TYPE,
    category: text(loaded.category),
    tags: list(loaded.tags),
    status: decodeStatus(text(loaded.status), options.statusTracker ?? sharedStatusTracker),
    author: text(loaded.author),
    project: text(loaded.project),
    technologies: list(loaded.technologies),
    audience: list(loaded.audience),
    related: list(loaded.related)
  };

  const created = parseIsoDate(text(loaded.created), 'created', source);
  if (created) {
    metadata.created = created;
  }
  const updated = parseIsoDate(text(loaded.updated), 'updated', source);
  if (updated) {
    metadata.updated = updated;
  }

  return metadata;
}

/**
 * Serialize metadata back into a header block. Empty fields are omitted.
 */
export function encodeMetadata(metadata: Metadata): string {
  const out: Record<string, string | string[]> = { title: metadata.title };
  const scalars: Array<[string, string | undefined]> = [
    ['description', metadata.description],
    ['type', metadata.docType === DEFAULT_DOC_TYPE ? '' : metadata.docType],
    ['category', metadata.category],
    ['status', metadata.status],
    ['created', metadata.created],
    ['updated', metadata.updated],
    ['author', metadata.author],
    ['project', metadata.project]
  ];
  for (const [key, value] of scalars) {
    if (value) {
      out[key] = value;
    }
  }
  const sequences: Array<[string, string[]]> = [
    ['tags', metadata.tags],
    ['technologies', metadata.technologies],
    ['audience', metadata.audience],
    ['related', metadata.related]
  ];
  for (const [key, value] of sequences) {
    if (value.length > 0) {
      out[key] = value;
    }
  }
  return yaml.dump(out, { schema: yaml.CORE_SCHEMA, lineWidth: -1 }).trim();
}
