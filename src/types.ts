/**
 * Lifecycle status of a record.
 */
export type Status = 'proposed' | 'accepted' | 'deprecated' | 'superseded';

/**
 * A calendar date in canonical `YYYY-MM-DD` form.
 * Canonical strings compare chronologically.
 */
export type IsoDate = string;

/**
 * Identifier of a record, derived from its filename stem.
 */
export type RecordId = string;

/**
 * Structured metadata decoded from a record's header block.
 */
export interface Metadata {
  /** Short descriptive title (required, never empty) */
  title: string;

  /** One-sentence summary */
  description: string;

  /** Document type, from the `type` key */
  docType: string;

  /** Decision category, e.g. architecture or security */
  category: string;

  /** Keywords, in declaration order (duplicates kept) */
  tags: string[];

  /** Lifecycle status */
  status: Status;

  /** Date the record was created */
  created?: IsoDate;

  /** Date the record was last modified */
  updated?: IsoDate;

  /** Author or team responsible */
  author: string;

  /** Project the record applies to */
  project: string;

  /** Technologies affected */
  technologies: string[];

  /** Intended readers */
  audience: string[];

  /** Raw references to other records, by filename or bare identifier */
  related: string[];
}

/**
 * A fully decoded and rendered record. Frozen after assembly.
 */
export interface MdRecord {
  /** Identifier derived from the filename stem */
  readonly id: RecordId;

  /** Last path segment of the source locator */
  readonly filename: string;

  /** Source locator, used for messages and for reading the original content */
  readonly source: string;

  readonly metadata: Readonly<Metadata>;

  /** Markdown body without the header block */
  readonly bodyMarkdown: string;

  /** Rendered HTML body */
  readonly bodyHtml: string;

  /** Flattened single-line text of the body, for search indexing */
  readonly bodyText: string;
}

/**
 * Raw input handed to the batch parser.
 */
export interface SourceDocument {
  /** Source locator (a path, or any string ending in a filename) */
  source: string;

  /** Full text including the header block */
  text: string;
}

export type EdgeType = 'related' | 'supersedes';

/**
 * A node of the relationship graph.
 */
export interface GraphNode {
  id: RecordId;

  /** Status name, copied from the record (or the default for placeholders) */
  status: string;

  /** Display title; absent on placeholder nodes */
  title?: string;
}

/**
 * A directed relationship between two records.
 */
export interface GraphEdge {
  source: RecordId;
  target: RecordId;
  type: EdgeType;
}

export interface Graph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface FacetValue {
  value: string;
  count: number;
}

/**
 * A named facet dimension with its sorted values.
 */
export interface Facet {
  name: string;
  values: FacetValue[];
}

/**
 * The fixed bundle of facet dimensions, each sorted by count descending
 * then value ascending.
 */
export interface Facets {
  statuses: FacetValue[];
  categories: FacetValue[];
  tags: FacetValue[];
  authors: FacetValue[];
  projects: FacetValue[];
  technologies: FacetValue[];
}

export type CountMap = Record<string, number>;

/**
 * Aggregate statistics over a batch of records.
 */
export interface Statistics {
  totalCount: number;
  byStatus: CountMap;
  byCategory: CountMap;
  byAuthor: CountMap;
  byTag: CountMap;
  byTechnology: CountMap;
  byProject: CountMap;

  /** Count of records per four-digit year of `created` */
  byYear: Record<number, number>;

  /** Earliest `created` date; present exactly when `latestDate` is */
  earliestDate?: IsoDate;

  latestDate?: IsoDate;
}

export type Severity = 'warning' | 'error';

/**
 * A single problem found by a validation rule.
 */
export interface ValidationIssue {
  severity: Severity;

  /** Source locator of the offending record */
  source: string;

  message: string;

  /** Name of the rule that produced this issue */
  rule: string;

  /** Line number, reserved for per-line checks */
  line?: number;
}
