import { CountMap, IsoDate, MdRecord, Statistics } from './types.js';
import { ALL_STATUSES } from './status.js';
import { increment } from './facets.js';

export type StatsFormat = 'text' | 'json' | 'markdown';

/**
 * Parse a `--format` value; `md` is accepted for markdown.
 */
export function parseStatsFormat(value: string): StatsFormat | undefined {
  switch (value.toLowerCase()) {
    case 'text':
      return 'text';
    case 'json':
      return 'json';
    case 'markdown':
    case 'md':
      return 'markdown';
    default:
      return undefined;
  }
}

function yearOf(date: IsoDate): number {
  return Number(date.split('-')[0]);
}

/**
 * Compute totals, per-field counts, per-year counts and the `created` date
 * range of a batch.
 */
export function computeStatistics(records: readonly MdRecord[]): Statistics {
  const byStatus = new Map<string, number>(ALL_STATUSES.map((status): [string, number] => [status, 0]));
  const byCategory = new Map<string, number>();
  const byAuthor = new Map<string, number>();
  const byTag = new Map<string, number>();
  const byTechnology = new Map<string, number>();
  const byProject = new Map<string, number>();
  const byYear = new Map<number, number>();
  let earliest: IsoDate | undefined;
  let latest: IsoDate | undefined;

  for (const { metadata } of records) {
    increment(byStatus, metadata.status);
    increment(byCategory, metadata.category);
    increment(byAuthor, metadata.author);
    for (const tag of metadata.tags) {
      increment(byTag, tag);
    }
    for (const technology of metadata.technologies) {
      increment(byTechnology, technology);
    }
    increment(byProject, metadata.project);

    const created = metadata.created;
    if (created) {
      const year = yearOf(created);
      byYear.set(year, (byYear.get(year) ?? 0) + 1);
      // strict comparisons: the first date seen wins ties
      if (earliest === undefined || created < earliest) {
        earliest = created;
      }
      if (latest === undefined || created > latest) {
        latest = created;
      }
    }
  }

  const stats: Statistics = {
    totalCount: records.length,
    byStatus: Object.fromEntries(byStatus),
    byCategory: Object.fromEntries(byCategory),
    byAuthor: Object.fromEntries(byAuthor),
    byTag: Object.fromEntries(byTag),
    byTechnology: Object.fromEntries(byTechnology),
    byProject: Object.fromEntries(byProject),
    byYear: Object.fromEntries(byYear)
  };
  if (earliest !== undefined && latest !== undefined) {
    stats.earliestDate = earliest;
    stats.latestDate = latest;
  }
  return stats;
}

/**
 * The `n` entries with the highest counts.
 *
 * Equal counts keep the mapping's own iteration order, which for string keys
 * is insertion order. Callers that need a stable tie-break should re-sort.
 */
export function topN(counts: CountMap, n: number): Array<[string, number]> {
  return Object.entries(counts)
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, n));
}

function joinCounts(entries: Array<[string, number]>): string {
  return entries.map(([key, count]) => `${key} (${count})`).join(', ');
}

/**
 * Plain-text summary for terminals.
 */
export function formatSummary(stats: Statistics): string {
  const lines = ['Record Statistics', '=================', `Total: ${stats.totalCount} records`];

  const statusParts = ALL_STATUSES
    .map((status): [string, number] => [status, stats.byStatus[status] ?? 0])
    .filter(([, count]) => count > 0);
  if (statusParts.length > 0) {
    lines.push(`By Status: ${joinCounts(statusParts)}`);
  }
  if (Object.keys(stats.byCategory).length > 0) {
    lines.push(`By Category: ${joinCounts(topN(stats.byCategory, 5))}`);
  }
  if (Object.keys(stats.byAuthor).length > 0) {
    lines.push(`Authors: ${joinCounts(topN(stats.byAuthor, 5))}`);
  }
  if (stats.earliestDate && stats.latestDate) {
    lines.push(`Date Range: ${stats.earliestDate} -> ${stats.latestDate}`);
  }
  return lines.join('\n') + '\n';
}

function markdownTable(label: string, counts: CountMap): string[] {
  const rows = Object.entries(counts).map(([key, count]) => `| ${key} | ${count} |`);
  return [`| ${label} | Count |`, '|---|---|', ...rows];
}

export function formatMarkdown(stats: Statistics): string {
  const lines = ['# Record Statistics', '', `**Total records:** ${stats.totalCount}`, '', '## By Status', ''];
  lines.push(...markdownTable('Status', stats.byStatus));

  if (Object.keys(stats.byCategory).length > 0) {
    lines.push('', '## By Category', '', ...markdownTable('Category', stats.byCategory));
  }
  if (Object.keys(stats.byAuthor).length > 0) {
    lines.push('', '## By Author', '', ...markdownTable('Author', stats.byAuthor));
  }
  if (stats.earliestDate && stats.latestDate) {
    lines.push('', '## Date Range', '', `- **Earliest:** ${stats.earliestDate}`, `- **Latest:** ${stats.latestDate}`);
  }
  return lines.join('\n') + '\n';
}

export function formatJson(stats: Statistics): string {
  return JSON.stringify(stats, null, 2);
}

export function formatStatistics(stats: Statistics, format: StatsFormat): string {
  switch (format) {
    case 'text':
      return formatSummary(stats);
    case 'json':
      return formatJson(stats);
    case 'markdown':
      return formatMarkdown(stats);
  }
}
