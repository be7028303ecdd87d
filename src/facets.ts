import { Facet, FacetValue, Facets, MdRecord } from './types.js';
import { ALL_STATUSES } from './status.js';

/**
 * Add one to `key`, ignoring empty values.
 */
export function increment(counts: Map<string, number>, key: string): void {
  if (key === '') {
    return;
  }
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function compareValues(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Count descending, then value ascending.
 */
export function sortFacetValues(values: FacetValue[]): FacetValue[] {
  return [...values].sort((a, b) => b.count - a.count || compareValues(a.value, b.value));
}

function toFacetValues(counts: Map<string, number>): FacetValue[] {
  return sortFacetValues(Array.from(counts, ([value, count]) => ({ value, count })));
}

/**
 * Count every facet dimension in one pass over the batch.
 * Statuses are pre-seeded so all four appear even at zero.
 */
export function computeFacets(records: readonly MdRecord[]): Facets {
  const statuses = new Map<string, number>(ALL_STATUSES.map((status): [string, number] => [status, 0]));
  const categories = new Map<string, number>();
  const tags = new Map<string, number>();
  const authors = new Map<string, number>();
  const projects = new Map<string, number>();
  const technologies = new Map<string, number>();

  for (const { metadata } of records) {
    increment(statuses, metadata.status);
    increment(categories, metadata.category);
    for (const tag of metadata.tags) {
      increment(tags, tag);
    }
    increment(authors, metadata.author);
    increment(projects, metadata.project);
    for (const technology of metadata.technologies) {
      increment(technologies, technology);
    }
  }

  return {
    statuses: toFacetValues(statuses),
    categories: toFacetValues(categories),
    tags: toFacetValues(tags),
    authors: toFacetValues(authors),
    projects: toFacetValues(projects),
    technologies: toFacetValues(technologies)
  };
}

/**
 * The bundle as named facets, in a fixed dimension order.
 */
export function facetList(facets: Facets): Facet[] {
  return [
    { name: 'status', values: facets.statuses },
    { name: 'category', values: facets.categories },
    { name: 'tag', values: facets.tags },
    { name: 'author', values: facets.authors },
    { name: 'project', values: facets.projects },
    { name: 'technology', values: facets.technologies }
  ];
}
